import { assignBatchTargets } from '../assignment/targetAssigner.js';
import {
  BatchTensor,
  CLASS_START_INDEX,
  GridTensor,
  OBJECTNESS_INDEX,
  formatDims
} from '../tensor/gridTensor.js';
import type { Anchor, GroundTruthBox, LossTerms, LossWeights } from '../types.js';

export const DEFAULT_LOSS_WEIGHTS: Readonly<LossWeights> = Object.freeze({
  box: 5.0,
  objectness: 1.0,
  noObjectness: 0.5,
  classification: 1.0
});

const LOSS_WEIGHT_KEYS = ['box', 'objectness', 'noObjectness', 'classification'] as const;

export function resolveLossWeights(overrides: Partial<LossWeights> = {}): LossWeights {
  const weights: LossWeights = { ...DEFAULT_LOSS_WEIGHTS };
  for (const key of LOSS_WEIGHT_KEYS) {
    const value = overrides[key];
    if (value === undefined) {
      continue;
    }
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Loss weight "${key}" must be a non-negative finite number (received ${value})`);
    }
    weights[key] = value;
  }
  return weights;
}

type LossInput = GridTensor | BatchTensor;

/**
 * Summed (not averaged) loss terms over every batch element, anchor and cell.
 * Box, objectness and class terms count only where the target marks an
 * object; the no-object term counts everywhere else.
 */
export function computeLossTerms(
  predictions: LossInput,
  targets: LossInput,
  weights: Partial<LossWeights> = {}
): LossTerms {
  assertSameShape(predictions, targets);
  const lambda = resolveLossWeights(weights);

  const pred = predictions.data;
  const target = targets.data;
  const channels = CLASS_START_INDEX + predictions.spec.numClasses;

  let box = 0;
  let objectness = 0;
  let noObjectness = 0;
  let classification = 0;

  for (let base = 0; base < pred.length; base += channels) {
    const mask = target[base + OBJECTNESS_INDEX];
    const predObj = pred[base + OBJECTNESS_INDEX];

    noObjectness += (1 - mask) * predObj * predObj;
    if (mask === 0) {
      continue;
    }

    let boxError = 0;
    for (let channel = 0; channel < OBJECTNESS_INDEX; channel += 1) {
      const delta = pred[base + channel] - target[base + channel];
      boxError += delta * delta;
    }
    box += mask * boxError;

    objectness += mask * (predObj - 1) * (predObj - 1);

    let classError = 0;
    for (let channel = CLASS_START_INDEX; channel < channels; channel += 1) {
      const delta = pred[base + channel] - target[base + channel];
      classError += delta * delta;
    }
    classification += mask * classError;
  }

  const terms = {
    box: lambda.box * box,
    objectness: lambda.objectness * objectness,
    noObjectness: lambda.noObjectness * noObjectness,
    classification: lambda.classification * classification
  };

  return {
    ...terms,
    total: terms.box + terms.objectness + terms.noObjectness + terms.classification
  };
}

export function computeLoss(
  predictions: LossInput,
  targets: LossInput,
  weights: Partial<LossWeights> = {}
): number {
  return computeLossTerms(predictions, targets, weights).total;
}

/** Assigns targets for every image of the batch, then aggregates the loss. */
export function computeBatchLoss(
  predictions: BatchTensor,
  groundTruth: readonly (readonly GroundTruthBox[])[],
  anchors: readonly Anchor[],
  weights: Partial<LossWeights> = {}
): LossTerms {
  if (groundTruth.length !== predictions.batchSize) {
    throw new Error(
      `Expected ground truth for ${predictions.batchSize} images, received ${groundTruth.length}`
    );
  }
  const targets = assignBatchTargets(groundTruth, predictions.spec, anchors);
  return computeLossTerms(predictions, targets, weights);
}

function assertSameShape(predictions: LossInput, targets: LossInput) {
  const predDims: readonly number[] = predictions.dims;
  const targetDims: readonly number[] = targets.dims;
  const matches =
    predDims.length === targetDims.length &&
    predDims.every((value, index) => value === targetDims[index]);
  if (!matches) {
    throw new Error(
      `Prediction shape ${formatDims(predDims)} does not match target shape ${formatDims(targetDims)}`
    );
  }
}
