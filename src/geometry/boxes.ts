import type { BoundingBox, BoxFormat, CenterBox, CornerBox } from '../types.js';

export const IOU_EPSILON = 1e-7;

export function isCornerBox(box: BoundingBox): box is CornerBox {
  return 'x1' in box;
}

export function boxFormat(box: BoundingBox): BoxFormat {
  return isCornerBox(box) ? 'corner' : 'center';
}

export function toCorner(box: BoundingBox): CornerBox {
  if (isCornerBox(box)) {
    return { x1: box.x1, y1: box.y1, x2: box.x2, y2: box.y2 };
  }
  const halfWidth = box.width / 2;
  const halfHeight = box.height / 2;
  return {
    x1: box.cx - halfWidth,
    y1: box.cy - halfHeight,
    x2: box.cx + halfWidth,
    y2: box.cy + halfHeight
  };
}

export function toCenter(box: BoundingBox): CenterBox {
  if (!isCornerBox(box)) {
    return { cx: box.cx, cy: box.cy, width: box.width, height: box.height };
  }
  return {
    cx: (box.x1 + box.x2) / 2,
    cy: (box.y1 + box.y2) / 2,
    width: box.x2 - box.x1,
    height: box.y2 - box.y1
  };
}

export function convertBox(box: BoundingBox, to: 'corner'): CornerBox;
export function convertBox(box: BoundingBox, to: 'center'): CenterBox;
export function convertBox(box: BoundingBox, to: BoxFormat): BoundingBox;
export function convertBox(box: BoundingBox, to: BoxFormat): BoundingBox {
  return to === 'corner' ? toCorner(box) : toCenter(box);
}

export function boxArea(box: BoundingBox) {
  const corner = toCorner(box);
  return Math.max(0, corner.x2 - corner.x1) * Math.max(0, corner.y2 - corner.y1);
}

function cornerIoU(a: CornerBox, b: CornerBox) {
  const interWidth = Math.max(0, Math.min(a.x2, b.x2) - Math.max(a.x1, b.x1));
  const interHeight = Math.max(0, Math.min(a.y2, b.y2) - Math.max(a.y1, b.y1));
  const intersection = interWidth * interHeight;
  const union = boxArea(a) + boxArea(b) - intersection + IOU_EPSILON;
  return intersection / union;
}

/**
 * Intersection over union. Either side may be a list, in which case one IoU
 * is returned per pair; a single-element list broadcasts against the other side.
 */
export function iou(a: BoundingBox, b: BoundingBox): number;
export function iou(a: BoundingBox, b: readonly BoundingBox[]): number[];
export function iou(a: readonly BoundingBox[], b: BoundingBox | readonly BoundingBox[]): number[];
export function iou(
  a: BoundingBox | readonly BoundingBox[],
  b: BoundingBox | readonly BoundingBox[]
): number | number[] {
  if (!isBoxList(a) && !isBoxList(b)) {
    return cornerIoU(toCorner(a), toCorner(b));
  }

  const left = (isBoxList(a) ? a : [a]).map(toCorner);
  const right = (isBoxList(b) ? b : [b]).map(toCorner);

  if (left.length === 1) {
    return right.map(box => cornerIoU(left[0], box));
  }
  if (right.length === 1) {
    return left.map(box => cornerIoU(box, right[0]));
  }
  if (left.length !== right.length) {
    throw new Error(
      `Cannot broadcast IoU between ${left.length} and ${right.length} boxes`
    );
  }
  return left.map((box, index) => cornerIoU(box, right[index]));
}

function isBoxList(value: BoundingBox | readonly BoundingBox[]): value is readonly BoundingBox[] {
  return Array.isArray(value);
}
