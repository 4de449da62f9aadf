import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import type { BoxEncoding } from '../decode/decoder.js';
import type { Anchor, LossWeights } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DecodeConfig = {
  confidenceThreshold?: number;
  inferenceThreshold?: number;
  iouThreshold?: number;
  classAware?: boolean;
  maxDetections?: number;
  boxEncoding?: BoxEncoding;
};

export type DetectorConfig = {
  name?: string;
  gridHeight: number;
  gridWidth: number;
  numClasses: number;
  anchors: Anchor[];
  loss?: Partial<LossWeights>;
  decode?: DecodeConfig;
};

export type GridboxConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  detector: DetectorConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const anchorSchema: JsonSchema = {
  type: 'object',
  required: ['width', 'height'],
  additionalProperties: false,
  properties: {
    width: { type: 'number', minimum: 0 },
    height: { type: 'number', minimum: 0 }
  }
};

const lossSchema: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    box: { type: 'number', minimum: 0 },
    objectness: { type: 'number', minimum: 0 },
    noObjectness: { type: 'number', minimum: 0 },
    classification: { type: 'number', minimum: 0 }
  }
};

const decodeSchema: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    confidenceThreshold: { type: 'number', minimum: 0 },
    inferenceThreshold: { type: 'number', minimum: 0 },
    iouThreshold: { type: 'number', minimum: 0, maximum: 1 },
    classAware: { type: 'boolean' },
    maxDetections: { type: 'number', minimum: 1 },
    boxEncoding: { type: 'string', enum: ['raw', 'cell-offset'] }
  }
};

const gridboxConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'detector'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['silent', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']
        }
      }
    },
    detector: {
      type: 'object',
      required: ['gridHeight', 'gridWidth', 'numClasses', 'anchors'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        gridHeight: { type: 'number', minimum: 1 },
        gridWidth: { type: 'number', minimum: 1 },
        numClasses: { type: 'number', minimum: 1 },
        anchors: { type: 'array', items: anchorSchema },
        loss: lossSchema,
        decode: decodeSchema
      }
    }
  }
};

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    const obj = value as Record<string, unknown>;
    for (const key of schema.required ?? []) {
      if (!(key in obj)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(obj)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(obj)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(schema.additionalProperties, obj[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in obj) {
        errors.push(...validateAgainstSchema(childSchema, obj[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean' && typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }

  return errors;
}

export function validateConfig(config: unknown): asserts config is GridboxConfig {
  const errors = validateAgainstSchema(gridboxConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config as GridboxConfig);
}

export function parseConfig(contents: string): GridboxConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): GridboxConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: GridboxConfig) {
  const messages: string[] = [];
  const detector = config.detector;

  for (const field of ['gridHeight', 'gridWidth', 'numClasses'] as const) {
    if (!Number.isInteger(detector[field])) {
      messages.push(`config.detector.${field} must be an integer`);
    }
  }

  if (detector.anchors.length === 0) {
    messages.push('config.detector.anchors must contain at least one anchor');
  }
  detector.anchors.forEach((anchor, index) => {
    if (anchor.width <= 0 || anchor.height <= 0) {
      messages.push(`config.detector.anchors[${index}] must have positive width and height`);
    }
  });

  const decode = detector.decode;
  if (decode) {
    if (typeof decode.inferenceThreshold === 'number' && decode.inferenceThreshold > 1) {
      messages.push('config.detector.decode.inferenceThreshold must be <= 1');
    }
    if (typeof decode.maxDetections === 'number' && !Number.isInteger(decode.maxDetections)) {
      messages.push('config.detector.decode.maxDetections must be an integer');
    }
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type ConfigReloadEvent = {
  previous: GridboxConfig;
  next: GridboxConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: GridboxConfig;
  private readonly filePath: string;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    this.currentConfig = loadConfigFromFile(this.filePath);
  }

  getConfig(): GridboxConfig {
    return this.currentConfig;
  }

  getDetectorConfig(): DetectorConfig {
    return this.currentConfig.detector;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): GridboxConfig {
    const next = loadConfigFromFile(this.filePath);
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }
}

let defaultManager: ConfigManager | null = null;

/** Manager for `config/default.json` under the working directory, created on first use. */
export function getConfigManager(): ConfigManager {
  if (!defaultManager) {
    defaultManager = new ConfigManager();
  }
  return defaultManager;
}

export { gridboxConfigSchema };
