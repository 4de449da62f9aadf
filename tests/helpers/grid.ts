import { GridTensor } from '../../src/tensor/gridTensor.js';
import type { Anchor, GridSpec } from '../../src/types.js';

export const SCENARIO_ANCHORS: Anchor[] = [
  { width: 1, height: 1 },
  { width: 2, height: 2 },
  { width: 3, height: 3 }
];

export const SCENARIO_SPEC: GridSpec = {
  gridHeight: 13,
  gridWidth: 13,
  numAnchors: 3,
  numClasses: 4
};

export type CellValues = {
  cx: number;
  cy: number;
  width: number;
  height: number;
  objectness: number;
  classes: number[];
};

export function writeCell(
  tensor: GridTensor,
  anchor: number,
  row: number,
  col: number,
  values: CellValues
) {
  const cell = tensor.cell(anchor, row, col);
  cell.set([values.cx, values.cy, values.width, values.height, values.objectness, ...values.classes]);
  return tensor;
}

export function objectnessLocations(tensor: GridTensor) {
  const locations: Array<{ anchor: number; row: number; col: number; value: number }> = [];
  const { numAnchors, gridHeight, gridWidth } = tensor.spec;
  for (let anchor = 0; anchor < numAnchors; anchor += 1) {
    for (let row = 0; row < gridHeight; row += 1) {
      for (let col = 0; col < gridWidth; col += 1) {
        const value = tensor.get(anchor, row, col, 4);
        if (value !== 0) {
          locations.push({ anchor, row, col, value });
        }
      }
    }
  }
  return locations;
}
