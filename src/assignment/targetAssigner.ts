import logger from '../logger.js';
import { assertAnchors, selectBestAnchor } from '../geometry/anchors.js';
import {
  BatchTensor,
  CLASS_START_INDEX,
  GridTensor,
  OBJECTNESS_INDEX,
  assertGridSpec
} from '../tensor/gridTensor.js';
import type { Anchor, GridSpec, GroundTruthBox } from '../types.js';

export type AssignmentRecord = {
  boxIndex: number;
  classId: number;
  anchor: number;
  anchorIoU: number;
  row: number;
  col: number;
};

export type AssignmentCollision = {
  anchor: number;
  row: number;
  col: number;
  overwrittenBoxIndex: number;
  boxIndex: number;
};

export type AssignmentReport = {
  targets: GridTensor;
  assignments: AssignmentRecord[];
  collisions: AssignmentCollision[];
};

export function assignTargets(
  groundTruth: readonly GroundTruthBox[],
  gridSpec: GridSpec,
  anchors: readonly Anchor[]
): GridTensor {
  return assignTargetsWithReport(groundTruth, gridSpec, anchors).targets;
}

/**
 * Builds the dense target tensor for one image. Each box goes to the cell
 * holding its center and to the anchor whose shape matches it best. Two boxes
 * landing on the same anchor and cell resolve last-write-wins; every such
 * overwrite is listed in `collisions`.
 */
export function assignTargetsWithReport(
  groundTruth: readonly GroundTruthBox[],
  gridSpec: GridSpec,
  anchors: readonly Anchor[]
): AssignmentReport {
  assertAssignmentInputs(gridSpec, anchors);

  const targets = GridTensor.zeros(gridSpec);
  const assignments: AssignmentRecord[] = [];
  const collisions: AssignmentCollision[] = [];
  const owners = new Map<number, number>();
  const { gridWidth, gridHeight } = gridSpec;

  groundTruth.forEach((box, boxIndex) => {
    assertGroundTruthBox(box, boxIndex, gridSpec.numClasses);

    const gx = box.cx * gridWidth;
    const gy = box.cy * gridHeight;
    const col = Math.min(Math.floor(gx), gridWidth - 1);
    const row = Math.min(Math.floor(gy), gridHeight - 1);
    const boxWidth = box.width * gridWidth;
    const boxHeight = box.height * gridHeight;

    const match = selectBestAnchor(boxWidth, boxHeight, anchors);
    const slot = targets.offset(match.index, row, col);
    const previousOwner = owners.get(slot);
    if (previousOwner !== undefined) {
      collisions.push({
        anchor: match.index,
        row,
        col,
        overwrittenBoxIndex: previousOwner,
        boxIndex
      });
    }
    owners.set(slot, boxIndex);

    const cell = targets.cell(match.index, row, col);
    cell.fill(0);
    cell[0] = gx - col;
    cell[1] = gy - row;
    cell[2] = boxWidth;
    cell[3] = boxHeight;
    cell[OBJECTNESS_INDEX] = 1;
    cell[CLASS_START_INDEX + box.classId] = 1;

    assignments.push({
      boxIndex,
      classId: box.classId,
      anchor: match.index,
      anchorIoU: match.iou,
      row,
      col
    });
  });

  if (collisions.length > 0) {
    logger.warn(
      { detector: 'assignment', collisions: collisions.length, boxes: groundTruth.length },
      'Ground-truth boxes overwrote earlier assignments in the same anchor and cell'
    );
  }

  return { targets, assignments, collisions };
}

export function assignBatchTargets(
  batch: readonly (readonly GroundTruthBox[])[],
  gridSpec: GridSpec,
  anchors: readonly Anchor[]
): BatchTensor {
  if (batch.length === 0) {
    throw new Error('Cannot assign targets for an empty batch');
  }
  return BatchTensor.stack(batch.map(groundTruth => assignTargets(groundTruth, gridSpec, anchors)));
}

function assertAssignmentInputs(gridSpec: GridSpec, anchors: readonly Anchor[]) {
  assertGridSpec(gridSpec);
  assertAnchors(anchors);
  if (gridSpec.numAnchors !== anchors.length) {
    throw new Error(
      `GridSpec.numAnchors (${gridSpec.numAnchors}) does not match the anchor set size (${anchors.length})`
    );
  }
}

function assertGroundTruthBox(box: GroundTruthBox, index: number, numClasses: number) {
  if (!Number.isInteger(box.classId) || box.classId < 0 || box.classId >= numClasses) {
    throw new Error(
      `Ground-truth box ${index} has class id ${box.classId} outside [0, ${numClasses})`
    );
  }
  for (const field of ['cx', 'cy'] as const) {
    const value = box[field];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new Error(`Ground-truth box ${index} has ${field}=${value} outside [0, 1]`);
    }
  }
  for (const field of ['width', 'height'] as const) {
    const value = box[field];
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Ground-truth box ${index} has negative or non-finite ${field} (${value})`);
    }
  }
}
