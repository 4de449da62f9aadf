import { toCorner } from '../geometry/boxes.js';
import { BatchTensor, CLASS_START_INDEX, GridTensor, OBJECTNESS_INDEX } from '../tensor/gridTensor.js';
import type { Detection } from '../types.js';
import { DEFAULT_NMS_IOU_THRESHOLD, nonMaxSuppression } from './nms.js';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;
export const INFERENCE_CONFIDENCE_THRESHOLD = 0.4;

/**
 * `raw` reads the box channels as absolute centers in grid units.
 * `cell-offset` treats the center channels as offsets within their cell, the
 * encoding target assignment writes, and shifts them by the cell position.
 */
export type BoxEncoding = 'raw' | 'cell-offset';

export interface DecodeOptions {
  confidenceThreshold?: number;
  iouThreshold?: number;
  classAware?: boolean;
  maxDetections?: number;
  boxEncoding?: BoxEncoding;
}

type ResolvedDecodeOptions = Required<Omit<DecodeOptions, 'maxDetections'>> & {
  maxDetections: number | null;
};

export function resolveDecodeOptions(options: DecodeOptions = {}): ResolvedDecodeOptions {
  const confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const iouThreshold = options.iouThreshold ?? DEFAULT_NMS_IOU_THRESHOLD;
  if (!Number.isFinite(confidenceThreshold)) {
    throw new Error(`Confidence threshold must be a finite number (received ${confidenceThreshold})`);
  }
  if (!Number.isFinite(iouThreshold)) {
    throw new Error(`IoU threshold must be a finite number (received ${iouThreshold})`);
  }

  const maxDetections = options.maxDetections ?? null;
  if (maxDetections !== null && (!Number.isInteger(maxDetections) || maxDetections <= 0)) {
    throw new Error(`maxDetections must be a positive integer (received ${maxDetections})`);
  }

  return {
    confidenceThreshold,
    iouThreshold,
    classAware: options.classAware ?? false,
    maxDetections,
    boxEncoding: options.boxEncoding ?? 'raw'
  };
}

/**
 * Flattens the grid in (anchor, row, col) order and keeps candidates whose
 * objectness × best class score is strictly above the threshold.
 */
export function collectCandidates(
  prediction: GridTensor,
  confidenceThreshold = DEFAULT_CONFIDENCE_THRESHOLD,
  boxEncoding: BoxEncoding = 'raw'
): Detection[] {
  const { numAnchors, gridHeight, gridWidth } = prediction.spec;
  const candidates: Detection[] = [];

  for (let anchor = 0; anchor < numAnchors; anchor += 1) {
    for (let row = 0; row < gridHeight; row += 1) {
      for (let col = 0; col < gridWidth; col += 1) {
        const cell = prediction.cell(anchor, row, col);

        let classId = 0;
        let classConfidence = cell[CLASS_START_INDEX];
        for (let channel = CLASS_START_INDEX + 1; channel < cell.length; channel += 1) {
          if (cell[channel] > classConfidence) {
            classConfidence = cell[channel];
            classId = channel - CLASS_START_INDEX;
          }
        }

        const objectness = cell[OBJECTNESS_INDEX];
        const score = objectness * classConfidence;
        if (!(score > confidenceThreshold)) {
          continue;
        }

        const shiftX = boxEncoding === 'cell-offset' ? col : 0;
        const shiftY = boxEncoding === 'cell-offset' ? row : 0;
        const box = toCorner({
          cx: cell[0] + shiftX,
          cy: cell[1] + shiftY,
          width: cell[2],
          height: cell[3]
        });

        candidates.push({
          box,
          score,
          classId,
          objectness,
          classConfidence,
          anchor,
          cell: { row, col }
        });
      }
    }
  }

  return candidates;
}

export type DecodeReport = {
  detections: Detection[];
  candidates: number;
  suppressed: number;
};

export function decodeDetections(prediction: GridTensor, options: DecodeOptions = {}): Detection[] {
  return decodeWithReport(prediction, options).detections;
}

/**
 * Same as `decodeDetections`, also counting the candidates that passed the
 * confidence threshold and how many of them suppression removed.
 */
export function decodeWithReport(prediction: GridTensor, options: DecodeOptions = {}): DecodeReport {
  const resolved = resolveDecodeOptions(options);
  const candidates = collectCandidates(prediction, resolved.confidenceThreshold, resolved.boxEncoding);
  if (candidates.length === 0) {
    return { detections: [], candidates: 0, suppressed: 0 };
  }

  const kept = nonMaxSuppression(candidates, resolved.iouThreshold, {
    classAware: resolved.classAware
  });
  return {
    detections: resolved.maxDetections === null ? kept : kept.slice(0, resolved.maxDetections),
    candidates: candidates.length,
    suppressed: candidates.length - kept.length
  };
}

/** Decodes every image of the batch independently. */
export function decodeBatchDetections(batch: BatchTensor, options: DecodeOptions = {}): Detection[][] {
  return batch.images().map(image => decodeDetections(image, options));
}
