import { describe, expect, it } from 'vitest';
import {
  IOU_EPSILON,
  boxArea,
  boxFormat,
  convertBox,
  iou,
  toCenter,
  toCorner
} from '../src/geometry/boxes.js';
import { anchorShapeIoU, assertAnchors, selectBestAnchor } from '../src/geometry/anchors.js';
import type { CornerBox } from '../src/types.js';

const unit: CornerBox = { x1: 0, y1: 0, x2: 2, y2: 2 };
const shifted: CornerBox = { x1: 1, y1: 1, x2: 3, y2: 3 };
const distant: CornerBox = { x1: 10, y1: 10, x2: 12, y2: 12 };

describe('BoxConversion', () => {
  it('ConvertCenterToCorner computes half extents around the center', () => {
    expect(toCorner({ cx: 2, cy: 3, width: 4, height: 2 })).toEqual({ x1: 0, y1: 2, x2: 4, y2: 4 });
    expect(convertBox({ cx: 2, cy: 3, width: 4, height: 2 }, 'corner')).toEqual({
      x1: 0,
      y1: 2,
      x2: 4,
      y2: 4
    });
  });

  it('ConvertCornerToCenter inverts the corner conversion', () => {
    expect(toCenter({ x1: 0, y1: 2, x2: 4, y2: 4 })).toEqual({ cx: 2, cy: 3, width: 4, height: 2 });
    expect(convertBox(convertBox({ cx: 1.5, cy: 0.5, width: 1, height: 3 }, 'corner'), 'center')).toEqual({
      cx: 1.5,
      cy: 0.5,
      width: 1,
      height: 3
    });
  });

  it('ConvertSameFormat returns a copy', () => {
    const copy = convertBox(unit, 'corner');
    expect(copy).toEqual(unit);
    expect(copy).not.toBe(unit);
    expect(boxFormat(unit)).toBe('corner');
    expect(boxFormat({ cx: 0, cy: 0, width: 1, height: 1 })).toBe('center');
  });

  it('BoxArea clamps inverted extents to zero', () => {
    expect(boxArea(unit)).toBe(4);
    expect(boxArea({ x1: 3, y1: 0, x2: 1, y2: 2 })).toBe(0);
    expect(boxArea({ cx: 0, cy: 0, width: -2, height: 5 })).toBe(0);
  });
});

describe('IntersectionOverUnion', () => {
  it('IoUSelf is one within epsilon for boxes with area', () => {
    expect(iou(unit, unit)).toBeCloseTo(1, 6);
    expect(iou(distant, distant)).toBeCloseTo(1, 6);
    expect(iou({ cx: 1, cy: 1, width: 2, height: 2 }, unit)).toBeCloseTo(1, 6);
  });

  it('IoUSymmetric gives the same value in both orders', () => {
    expect(iou(unit, shifted)).toBe(iou(shifted, unit));
    const small: CornerBox = { x1: 0.5, y1: 0.25, x2: 1.75, y2: 3 };
    expect(iou(small, unit)).toBe(iou(unit, small));
  });

  it('IoUPartialOverlap divides intersection by union plus epsilon', () => {
    expect(iou(unit, shifted)).toBe(1 / (7 + IOU_EPSILON));
  });

  it('IoUDisjoint is exactly zero, including boxes that only touch', () => {
    expect(iou(unit, distant)).toBe(0);
    expect(iou(unit, { x1: 2, y1: 0, x2: 4, y2: 2 })).toBe(0);
  });

  it('IoUContainment equals the inner area over the outer area', () => {
    const outer: CornerBox = { x1: 0, y1: 0, x2: 4, y2: 4 };
    const inner: CornerBox = { x1: 1, y1: 1, x2: 3, y2: 3 };
    expect(iou(inner, outer)).toBeCloseTo(boxArea(inner) / boxArea(outer), 6);
  });

  it('IoUDegenerate returns zero for zero-area boxes', () => {
    const point: CornerBox = { x1: 1, y1: 1, x2: 1, y2: 1 };
    expect(iou(point, point)).toBe(0);
    expect(iou(point, unit)).toBe(0);
  });

  it('IoUBroadcast compares one box against many', () => {
    expect(iou(unit, [unit, shifted, distant])).toEqual([
      4 / (4 + IOU_EPSILON),
      1 / (7 + IOU_EPSILON),
      0
    ]);
    expect(iou([unit, distant], shifted)).toEqual([1 / (7 + IOU_EPSILON), 0]);
    expect(iou([shifted], [unit, distant])).toEqual([1 / (7 + IOU_EPSILON), 0]);
  });

  it('IoUPairwise matches lists element by element', () => {
    expect(iou([unit, distant], [shifted, distant])).toEqual([
      1 / (7 + IOU_EPSILON),
      4 / (4 + IOU_EPSILON)
    ]);
    expect(iou([], [])).toEqual([]);
  });

  it('IoUBroadcastMismatch rejects lists of different lengths', () => {
    expect(() => iou([unit, shifted], [unit, shifted, distant])).toThrow(
      'Cannot broadcast IoU between 2 and 3 boxes'
    );
  });
});

describe('AnchorComparator', () => {
  it('AnchorShapeIoU compares sizes with both boxes centered on the origin', () => {
    expect(anchorShapeIoU(2, 2, { width: 2, height: 2 })).toBeCloseTo(1, 6);
    expect(anchorShapeIoU(2, 2, { width: 1, height: 1 })).toBe(1 / (4 + IOU_EPSILON));
    expect(anchorShapeIoU(1, 4, { width: 4, height: 1 })).toBe(1 / (7 + IOU_EPSILON));
  });

  it('AnchorShapeIoU clamps negative sizes to zero', () => {
    expect(anchorShapeIoU(-1, 3, { width: 1, height: 1 })).toBe(0);
  });

  it('SelectBestAnchor prefers the closest shape', () => {
    const anchors = [
      { width: 1, height: 1 },
      { width: 2, height: 2 },
      { width: 3, height: 3 }
    ];
    expect(selectBestAnchor(1.3, 1.3, anchors).index).toBe(0);
    expect(selectBestAnchor(2.1, 1.9, anchors).index).toBe(1);
    expect(selectBestAnchor(5, 5, anchors).index).toBe(2);
    expect(selectBestAnchor(1.3, 1.3, anchors).ious).toHaveLength(3);
  });

  it('SelectBestAnchor breaks ties by the lowest index', () => {
    const anchors = [
      { width: 1, height: 2 },
      { width: 2, height: 1 }
    ];
    const match = selectBestAnchor(1, 1, anchors);
    expect(match.ious[0]).toBe(match.ious[1]);
    expect(match.index).toBe(0);
  });

  it('AssertAnchors rejects empty and non-positive anchor sets', () => {
    expect(() => assertAnchors([])).toThrow('Anchor set must not be empty');
    expect(() => selectBestAnchor(1, 1, [])).toThrow('Anchor set must not be empty');
    expect(() => assertAnchors([{ width: 1, height: 0 }])).toThrow(
      'Anchor 0 must have positive finite width and height (received 1x0)'
    );
  });
});
