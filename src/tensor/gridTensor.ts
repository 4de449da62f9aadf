import { Tensor } from 'onnxruntime-common';
import type { GridSpec } from '../types.js';

export const BOX_CHANNELS = 4;
export const OBJECTNESS_INDEX = 4;
export const CLASS_START_INDEX = 5;

export type GridDims = readonly [anchors: number, gridHeight: number, gridWidth: number, channels: number];
export type BatchDims = readonly [
  batch: number,
  anchors: number,
  gridHeight: number,
  gridWidth: number,
  channels: number
];

export function assertGridSpec(spec: GridSpec) {
  const fields: Array<keyof GridSpec> = ['gridHeight', 'gridWidth', 'numAnchors', 'numClasses'];
  for (const field of fields) {
    const value = spec[field];
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`GridSpec.${field} must be a positive integer (received ${value})`);
    }
  }
}

export function channelCount(spec: GridSpec) {
  return CLASS_START_INDEX + spec.numClasses;
}

export function sameGridSpec(a: GridSpec, b: GridSpec) {
  return (
    a.gridHeight === b.gridHeight &&
    a.gridWidth === b.gridWidth &&
    a.numAnchors === b.numAnchors &&
    a.numClasses === b.numClasses
  );
}

function gridSize(spec: GridSpec) {
  return spec.numAnchors * spec.gridHeight * spec.gridWidth * channelCount(spec);
}

/**
 * Dense prediction or target slice for a single image, laid out
 * `(anchors, gridHeight, gridWidth, 5 + numClasses)` in row-major order.
 */
export class GridTensor {
  readonly spec: GridSpec;
  readonly data: Float32Array;

  constructor(spec: GridSpec, data?: Float32Array) {
    assertGridSpec(spec);
    this.spec = { ...spec };
    const expected = gridSize(spec);
    if (data && data.length !== expected) {
      throw new Error(
        `Grid tensor data length ${data.length} does not match shape ${formatDims(dimsOf(spec))}`
      );
    }
    this.data = data ?? new Float32Array(expected);
  }

  static zeros(spec: GridSpec) {
    return new GridTensor(spec);
  }

  get channels() {
    return channelCount(this.spec);
  }

  get dims(): GridDims {
    return dimsOf(this.spec);
  }

  get cellCount() {
    return this.spec.numAnchors * this.spec.gridHeight * this.spec.gridWidth;
  }

  offset(anchor: number, row: number, col: number, channel = 0) {
    const { gridHeight, gridWidth } = this.spec;
    return ((anchor * gridHeight + row) * gridWidth + col) * this.channels + channel;
  }

  get(anchor: number, row: number, col: number, channel: number) {
    return this.data[this.offset(anchor, row, col, channel)];
  }

  set(anchor: number, row: number, col: number, channel: number, value: number) {
    this.data[this.offset(anchor, row, col, channel)] = value;
  }

  /** Live view of one (anchor, cell) channel vector. */
  cell(anchor: number, row: number, col: number) {
    const start = this.offset(anchor, row, col);
    return this.data.subarray(start, start + this.channels);
  }

  clone() {
    return new GridTensor(this.spec, Float32Array.from(this.data));
  }
}

/**
 * Batch of grid tensors, `(batch, anchors, gridHeight, gridWidth, 5 + numClasses)`.
 * Image views share the batch storage.
 */
export class BatchTensor {
  readonly spec: GridSpec;
  readonly batchSize: number;
  readonly data: Float32Array;

  constructor(batchSize: number, spec: GridSpec, data?: Float32Array) {
    assertGridSpec(spec);
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new Error(`Batch size must be a positive integer (received ${batchSize})`);
    }
    this.spec = { ...spec };
    this.batchSize = batchSize;
    const expected = batchSize * gridSize(spec);
    if (data && data.length !== expected) {
      throw new Error(
        `Batch tensor data length ${data.length} does not match shape ${formatDims([batchSize, ...dimsOf(spec)])}`
      );
    }
    this.data = data ?? new Float32Array(expected);
  }

  static stack(images: GridTensor[]) {
    if (images.length === 0) {
      throw new Error('Cannot stack an empty list of grid tensors');
    }
    const spec = images[0].spec;
    const stride = gridSize(spec);
    const batch = new BatchTensor(images.length, spec);
    images.forEach((image, index) => {
      if (!sameGridSpec(spec, image.spec)) {
        throw new Error(
          `Grid tensor ${index} has shape ${formatDims(image.dims)}, expected ${formatDims(dimsOf(spec))}`
        );
      }
      batch.data.set(image.data, index * stride);
    });
    return batch;
  }

  get dims(): BatchDims {
    return [this.batchSize, ...dimsOf(this.spec)];
  }

  image(index: number) {
    if (!Number.isInteger(index) || index < 0 || index >= this.batchSize) {
      throw new Error(`Batch index ${index} is out of range for batch size ${this.batchSize}`);
    }
    const stride = gridSize(this.spec);
    return new GridTensor(this.spec, this.data.subarray(index * stride, (index + 1) * stride));
  }

  images() {
    return Array.from({ length: this.batchSize }, (_, index) => this.image(index));
  }
}

export function dimsOf(spec: GridSpec): GridDims {
  return [spec.numAnchors, spec.gridHeight, spec.gridWidth, channelCount(spec)];
}

export function formatDims(dims: readonly number[]) {
  return `(${dims.join(', ')})`;
}

export function specFromDims(dims: readonly number[]): { batchSize: number; spec: GridSpec } {
  const normalized = dims.length === 4 ? [1, ...dims] : [...dims];
  if (normalized.length !== 5) {
    throw new Error(
      `Prediction tensor must have 4 or 5 dimensions (received ${formatDims(dims)})`
    );
  }
  const [batchSize, numAnchors, gridHeight, gridWidth, channels] = normalized;
  if (channels <= CLASS_START_INDEX) {
    throw new Error(
      `Prediction tensor needs more than ${CLASS_START_INDEX} channels per cell (received ${channels})`
    );
  }
  const spec: GridSpec = {
    numAnchors,
    gridHeight,
    gridWidth,
    numClasses: channels - CLASS_START_INDEX
  };
  assertGridSpec(spec);
  return { batchSize, spec };
}

export function fromOnnxTensor(tensor: Tensor): BatchTensor {
  const { batchSize, spec } = specFromDims(tensor.dims);
  const data = tensor.data;
  if (data instanceof Float32Array) {
    return new BatchTensor(batchSize, spec, data);
  }
  if (data instanceof Float64Array) {
    return new BatchTensor(batchSize, spec, Float32Array.from(data));
  }
  throw new Error(`Unsupported prediction tensor type "${tensor.type}" (expected float32)`);
}

export function toOnnxTensor(tensor: GridTensor | BatchTensor) {
  return new Tensor('float32', tensor.data, [...tensor.dims]);
}

/** Reads `{ dims, data }` JSON as produced by dumping an ONNX output. */
export function batchFromJson(value: unknown): BatchTensor {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('Tensor JSON must be an object with "dims" and "data"');
  }
  const candidate = value as Record<string, unknown>;
  const { dims, data } = candidate;
  if (!Array.isArray(dims) || !dims.every(isFiniteNumber)) {
    throw new Error('Tensor JSON "dims" must be an array of numbers');
  }
  if (!Array.isArray(data) || !data.every(isFiniteNumber)) {
    throw new Error('Tensor JSON "data" must be an array of finite numbers');
  }
  const { batchSize, spec } = specFromDims(dims);
  return new BatchTensor(batchSize, spec, Float32Array.from(data));
}

export function tensorToJson(tensor: GridTensor | BatchTensor) {
  return { dims: [...tensor.dims], data: Array.from(tensor.data) };
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
