import type { Anchor } from '../types.js';
import { IOU_EPSILON } from './boxes.js';

export type AnchorMatch = {
  index: number;
  iou: number;
  ious: number[];
};

export function assertAnchors(anchors: readonly Anchor[]) {
  if (anchors.length === 0) {
    throw new Error('Anchor set must not be empty');
  }
  anchors.forEach((anchor, index) => {
    if (
      !Number.isFinite(anchor.width) ||
      !Number.isFinite(anchor.height) ||
      anchor.width <= 0 ||
      anchor.height <= 0
    ) {
      throw new Error(
        `Anchor ${index} must have positive finite width and height (received ${anchor.width}x${anchor.height})`
      );
    }
  });
}

/**
 * Shape similarity between a box and an anchor with both centered on the
 * origin. Position plays no part; only width and height are compared.
 */
export function anchorShapeIoU(width: number, height: number, anchor: Anchor) {
  const w = Math.max(0, width);
  const h = Math.max(0, height);
  const intersection = Math.min(w, anchor.width) * Math.min(h, anchor.height);
  const union = w * h + anchor.width * anchor.height - intersection + IOU_EPSILON;
  return intersection / union;
}

/** Best matching anchor by shape IoU; the lowest index wins ties. */
export function selectBestAnchor(width: number, height: number, anchors: readonly Anchor[]): AnchorMatch {
  if (anchors.length === 0) {
    throw new Error('Anchor set must not be empty');
  }

  const ious = anchors.map(anchor => anchorShapeIoU(width, height, anchor));
  let index = 0;
  for (let candidate = 1; candidate < ious.length; candidate += 1) {
    if (ious[candidate] > ious[index]) {
      index = candidate;
    }
  }

  return { index, iou: ious[index], ious };
}
