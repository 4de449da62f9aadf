import { iou } from '../geometry/boxes.js';
import type { Detection } from '../types.js';

export const DEFAULT_NMS_IOU_THRESHOLD = 0.5;

export type SuppressionOptions = {
  /** Compare overlaps only between candidates of the same class. */
  classAware?: boolean;
};

/**
 * Greedy non-maximum suppression. Candidates are visited by descending score
 * (ties keep their input order); each kept candidate removes every remaining
 * one whose IoU with it exceeds `iouThreshold`.
 */
export function nonMaxSuppression(
  candidates: readonly Detection[],
  iouThreshold = DEFAULT_NMS_IOU_THRESHOLD,
  options: SuppressionOptions = {}
): Detection[] {
  if (!Number.isFinite(iouThreshold)) {
    throw new Error(`IoU threshold must be a finite number (received ${iouThreshold})`);
  }

  const classAware = options.classAware ?? false;
  const kept: Detection[] = [];
  let remaining = [...candidates].sort((a, b) => b.score - a.score);

  while (remaining.length > 0) {
    const [head, ...rest] = remaining;
    kept.push(head);
    remaining = rest.filter(candidate => {
      if (classAware && candidate.classId !== head.classId) {
        return true;
      }
      return !(iou(head.box, candidate.box) > iouThreshold);
    });
  }

  return kept;
}
