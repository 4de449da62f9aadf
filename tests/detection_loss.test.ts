import { describe, expect, it } from 'vitest';
import {
  DEFAULT_LOSS_WEIGHTS,
  computeBatchLoss,
  computeLoss,
  computeLossTerms,
  resolveLossWeights
} from '../src/loss/detectionLoss.js';
import { BatchTensor, GridTensor } from '../src/tensor/gridTensor.js';
import { writeCell } from './helpers/grid.js';

const spec = { gridHeight: 1, gridWidth: 2, numAnchors: 1, numClasses: 2 };
const anchors = [{ width: 1, height: 1 }];

function buildTargets() {
  return writeCell(GridTensor.zeros(spec), 0, 0, 0, {
    cx: 0.5,
    cy: 0.5,
    width: 1,
    height: 1,
    objectness: 1,
    classes: [1, 0]
  });
}

function buildPredictions() {
  const predictions = GridTensor.zeros(spec);
  writeCell(predictions, 0, 0, 0, {
    cx: 0.25,
    cy: 0.5,
    width: 1.5,
    height: 1,
    objectness: 0.5,
    classes: [0.5, 0.5]
  });
  writeCell(predictions, 0, 0, 1, {
    cx: 3,
    cy: 3,
    width: 3,
    height: 3,
    objectness: 0.5,
    classes: [1, 1]
  });
  return predictions;
}

describe('DetectionLoss', () => {
  it('LossZero when predictions equal targets', () => {
    const targets = buildTargets();
    expect(computeLoss(targets.clone(), targets)).toBe(0);
    expect(computeLoss(GridTensor.zeros(spec), GridTensor.zeros(spec))).toBe(0);
  });

  it('LossTerms sum masked errors with the default weights', () => {
    const terms = computeLossTerms(buildPredictions(), buildTargets());
    expect(terms).toEqual({
      box: 5 * 0.3125,
      objectness: 0.25,
      noObjectness: 0.5 * 0.25,
      classification: 0.5,
      total: 2.4375
    });
    expect(computeLoss(buildPredictions(), buildTargets())).toBe(2.4375);
  });

  it('LossWeights override individual terms', () => {
    const terms = computeLossTerms(buildPredictions(), buildTargets(), { box: 1, noObjectness: 2 });
    expect(terms).toEqual({
      box: 0.3125,
      objectness: 0.25,
      noObjectness: 0.5,
      classification: 0.5,
      total: 1.5625
    });
    expect(resolveLossWeights()).toEqual(DEFAULT_LOSS_WEIGHTS);
    expect(() => resolveLossWeights({ box: -1 })).toThrow(
      'Loss weight "box" must be a non-negative finite number (received -1)'
    );
  });

  it('LossShapeMismatch fails before computing anything', () => {
    expect(() =>
      computeLoss(GridTensor.zeros({ ...spec, numClasses: 3 }), GridTensor.zeros(spec))
    ).toThrow('Prediction shape (1, 1, 2, 8) does not match target shape (1, 1, 2, 7)');
  });

  it('BatchLoss assigns targets per image and sums without normalizing', () => {
    const predictions = BatchTensor.stack([buildPredictions(), GridTensor.zeros(spec)]);
    const terms = computeBatchLoss(
      predictions,
      [[{ classId: 0, cx: 0.25, cy: 0.5, width: 0.5, height: 1 }], []],
      anchors
    );
    expect(terms.total).toBe(2.4375);

    const doubled = BatchTensor.stack([buildPredictions(), buildPredictions()]);
    const box = { classId: 0, cx: 0.25, cy: 0.5, width: 0.5, height: 1 };
    expect(computeBatchLoss(doubled, [[box], [box]], anchors).total).toBe(2 * 2.4375);

    expect(() => computeBatchLoss(predictions, [[]], anchors)).toThrow(
      'Expected ground truth for 2 images, received 1'
    );
  });
});
