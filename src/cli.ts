import process from 'node:process';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import { getConfigManager, loadConfigFromFile, type GridboxConfig } from './config/index.js';
import { GridDetector } from './detector.js';
import { loadYoloLabels } from './labels.js';
import { batchFromJson, tensorToJson } from './tensor/gridTensor.js';
import type { DecodeOptions } from './decode/decoder.js';
import type { Detection } from './types.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type OptionSpec = {
  values: Record<string, string>;
  flags: Record<string, string>;
};

type ParsedArgs = {
  values: Record<string, string[]>;
  flags: Set<string>;
  help: boolean;
  errors: string[];
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'gridbox CLI',
  '',
  'Usage:',
  '  gridbox assign --labels <file> [--config path]            Build the target tensor for one label file',
  '  gridbox decode --input <tensor.json> [options]             Decode detections from a prediction tensor',
  '  gridbox loss --input <tensor.json> --labels <file>... [--config path]  Compute the weighted loss terms',
  '  gridbox config [--config path]                             Print the validated configuration',
  '  gridbox metrics [--prometheus]                             Print the metrics snapshot',
  '  gridbox log-level [get|set <level>]                        Get or set the active log level'
];

const DECODE_USAGE = [
  'Usage: gridbox decode --input <tensor.json> [options]',
  '',
  'Options:',
  '  -i, --input <file>        Prediction tensor JSON ({ "dims": [...], "data": [...] })',
  '  -c, --config <file>       Configuration file (default: config/default.json)',
  '  -t, --threshold <value>   Confidence threshold (default from config)',
  '      --iou <value>         IoU suppression threshold (default from config)',
  '      --max <count>         Keep at most this many detections per image',
  '      --class-aware         Only suppress overlaps within the same class',
  '      --infer               Use the inference confidence threshold',
  '  -h, --help                Show this help message'
].join('\n');

const ASSIGN_USAGE = [
  'Usage: gridbox assign --labels <file> [--config path]',
  '',
  'Options:',
  '  -l, --labels <file>   YOLO label file (class cx cy width height per line)',
  '  -c, --config <file>   Configuration file (default: config/default.json)',
  '  -h, --help            Show this help message'
].join('\n');

const LOSS_USAGE = [
  'Usage: gridbox loss --input <tensor.json> --labels <file>... [--config path]',
  '',
  'Options:',
  '  -i, --input <file>    Prediction tensor JSON',
  '  -l, --labels <file>   YOLO label file, one per batch image in order',
  '  -c, --config <file>   Configuration file (default: config/default.json)',
  '  -h, --help            Show this help message'
].join('\n');

const LOG_LEVEL_USAGE = [
  'Usage: gridbox log-level [get|set <level>|<level>]',
  '',
  `Levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

const CONFIG_OPTION: OptionSpec['values'] = { '--config': 'config', '-c': 'config' };

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const [command = 'help', ...rest] = argv;

  switch (command) {
    case 'assign': {
      return runAssignCommand(rest, io);
    }
    case 'decode': {
      return runDecodeCommand(rest, io);
    }
    case 'loss': {
      return runLossCommand(rest, io);
    }
    case 'config': {
      return runConfigCommand(rest, io);
    }
    case 'metrics': {
      return runMetricsCommand(rest, io);
    }
    case 'log-level': {
      return runLogLevelCommand(rest, io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
    }
  }
}

function isOptionToken(token: string) {
  return token.startsWith('-') && !Number.isFinite(Number(token));
}

function parseCommandArgs(args: string[], spec: OptionSpec): ParsedArgs {
  const result: ParsedArgs = { values: {}, flags: new Set(), help: false, errors: [] };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }

    const flag = spec.flags[token];
    if (flag) {
      result.flags.add(flag);
      continue;
    }

    const option = spec.values[token];
    if (option) {
      const value = args[index + 1];
      if (!value || isOptionToken(value)) {
        result.errors.push(`Missing value for ${token}`);
      } else {
        const bucket = result.values[option] ?? [];
        bucket.push(value);
        result.values[option] = bucket;
        index += 1;
      }
      continue;
    }

    result.errors.push(`Unknown option: ${token}`);
  }

  return result;
}

function lastValue(parsed: ParsedArgs, option: string) {
  const values = parsed.values[option];
  return values ? values[values.length - 1] : undefined;
}

function parseNumberOption(parsed: ParsedArgs, option: string, label: string) {
  const raw = lastValue(parsed, option);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid value for ${label}: ${raw}`);
  }
  return value;
}

function resolveConfig(parsed: ParsedArgs): GridboxConfig {
  const configPath = lastValue(parsed, 'config');
  return configPath ? loadConfigFromFile(configPath) : getConfigManager().getConfig();
}

function readTensorFile(filePath: string) {
  const contents = fs.readFileSync(path.resolve(filePath), 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse tensor file ${filePath}: ${message}`);
  }
  return batchFromJson(parsed);
}

function reportUsageErrors(parsed: ParsedArgs, usage: string, io: CliIo) {
  parsed.errors.forEach(error => io.stderr.write(`${error}\n`));
  io.stderr.write(`${usage}\n`);
  return 1;
}

function reportFailure(io: CliIo, error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  io.stderr.write(`${message}\n`);
  return 1;
}

function writeJson(io: CliIo, payload: unknown) {
  io.stdout.write(`${JSON.stringify(payload)}\n`);
}

async function runAssignCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseCommandArgs(args, {
    values: { ...CONFIG_OPTION, '--labels': 'labels', '-l': 'labels' },
    flags: {}
  });
  if (parsed.help) {
    io.stdout.write(`${ASSIGN_USAGE}\n`);
    return 0;
  }
  const labelsPath = lastValue(parsed, 'labels');
  if (!labelsPath) {
    parsed.errors.push('Missing required --labels option');
  }
  if (parsed.errors.length > 0 || !labelsPath) {
    return reportUsageErrors(parsed, ASSIGN_USAGE, io);
  }

  try {
    const detector = GridDetector.fromConfig(resolveConfig(parsed));
    const report = detector.assignWithReport(loadYoloLabels(labelsPath));
    writeJson(io, {
      tensor: tensorToJson(report.targets),
      assignments: report.assignments,
      collisions: report.collisions
    });
    return 0;
  } catch (error) {
    return reportFailure(io, error);
  }
}

async function runDecodeCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseCommandArgs(args, {
    values: {
      ...CONFIG_OPTION,
      '--input': 'input',
      '-i': 'input',
      '--threshold': 'threshold',
      '-t': 'threshold',
      '--iou': 'iou',
      '--max': 'max'
    },
    flags: { '--class-aware': 'class-aware', '--infer': 'infer' }
  });
  if (parsed.help) {
    io.stdout.write(`${DECODE_USAGE}\n`);
    return 0;
  }
  const inputPath = lastValue(parsed, 'input');
  if (!inputPath) {
    parsed.errors.push('Missing required --input option');
  }
  if (parsed.errors.length > 0 || !inputPath) {
    return reportUsageErrors(parsed, DECODE_USAGE, io);
  }

  try {
    const detector = GridDetector.fromConfig(resolveConfig(parsed));
    const batch = readTensorFile(inputPath);
    const overrides: DecodeOptions = {};
    const threshold = parseNumberOption(parsed, 'threshold', '--threshold');
    if (threshold !== undefined) {
      overrides.confidenceThreshold = threshold;
    }
    const iouThreshold = parseNumberOption(parsed, 'iou', '--iou');
    if (iouThreshold !== undefined) {
      overrides.iouThreshold = iouThreshold;
    }
    const maxDetections = parseNumberOption(parsed, 'max', '--max');
    if (maxDetections !== undefined) {
      overrides.maxDetections = maxDetections;
    }
    if (parsed.flags.has('class-aware')) {
      overrides.classAware = true;
    }
    const detections: Detection[][] = parsed.flags.has('infer')
      ? detector.infer(batch, overrides)
      : detector.decodeBatch(batch, overrides);
    writeJson(io, detections);
    return 0;
  } catch (error) {
    return reportFailure(io, error);
  }
}

async function runLossCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseCommandArgs(args, {
    values: { ...CONFIG_OPTION, '--input': 'input', '-i': 'input', '--labels': 'labels', '-l': 'labels' },
    flags: {}
  });
  if (parsed.help) {
    io.stdout.write(`${LOSS_USAGE}\n`);
    return 0;
  }
  const inputPath = lastValue(parsed, 'input');
  const labelPaths = parsed.values.labels ?? [];
  if (!inputPath) {
    parsed.errors.push('Missing required --input option');
  }
  if (labelPaths.length === 0) {
    parsed.errors.push('Missing required --labels option');
  }
  if (parsed.errors.length > 0 || !inputPath) {
    return reportUsageErrors(parsed, LOSS_USAGE, io);
  }

  try {
    const detector = GridDetector.fromConfig(resolveConfig(parsed));
    const batch = readTensorFile(inputPath);
    const terms = detector.trainingLoss(batch, labelPaths.map(loadYoloLabels));
    writeJson(io, terms);
    return 0;
  } catch (error) {
    return reportFailure(io, error);
  }
}

async function runConfigCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseCommandArgs(args, { values: CONFIG_OPTION, flags: {} });
  if (parsed.help) {
    io.stdout.write('Usage: gridbox config [--config path]\n');
    return 0;
  }
  if (parsed.errors.length > 0) {
    return reportUsageErrors(parsed, 'Usage: gridbox config [--config path]', io);
  }

  try {
    writeJson(io, resolveConfig(parsed));
    return 0;
  } catch (error) {
    io.stderr.write('Failed to load configuration: ');
    return reportFailure(io, error);
  }
}

async function runMetricsCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseCommandArgs(args, { values: {}, flags: { '--prometheus': 'prometheus' } });
  if (parsed.help) {
    io.stdout.write('Usage: gridbox metrics [--prometheus]\n');
    return 0;
  }
  if (parsed.errors.length > 0) {
    return reportUsageErrors(parsed, 'Usage: gridbox metrics [--prometheus]', io);
  }

  if (parsed.flags.has('prometheus')) {
    io.stdout.write(`${metrics.exportPrometheus()}\n`);
  } else {
    writeJson(io, metrics.snapshot());
  }
  return 0;
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    return reportFailure(io, error);
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'gridbox CLI failed');
      process.exit(1);
    }
  );
}
