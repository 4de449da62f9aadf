export type BoxFormat = 'center' | 'corner';

export interface CenterBox {
  cx: number;
  cy: number;
  width: number;
  height: number;
}

export interface CornerBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export type BoundingBox = CenterBox | CornerBox;

export interface Anchor {
  width: number;
  height: number;
}

export interface GridSpec {
  gridHeight: number;
  gridWidth: number;
  numAnchors: number;
  numClasses: number;
}

export interface GroundTruthBox {
  classId: number;
  cx: number;
  cy: number;
  width: number;
  height: number;
}

export type GridCell = {
  row: number;
  col: number;
};

export interface Detection {
  box: CornerBox;
  score: number;
  classId: number;
  objectness: number;
  classConfidence: number;
  anchor: number;
  cell: GridCell;
}

export type LossWeights = {
  box: number;
  objectness: number;
  noObjectness: number;
  classification: number;
};

export type LossTerms = {
  box: number;
  objectness: number;
  noObjectness: number;
  classification: number;
  total: number;
};
