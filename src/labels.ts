import fs from 'node:fs';
import path from 'node:path';
import type { GroundTruthBox } from './types.js';

const LABEL_FIELDS = 5;

/**
 * Parses YOLO label text: one `class cx cy width height` line per box with
 * normalized coordinates. Lines with another field count or a non-numeric
 * field are skipped.
 */
export function parseYoloLabels(contents: string): GroundTruthBox[] {
  const boxes: GroundTruthBox[] = [];

  for (const line of contents.split(/\r?\n/)) {
    const parts = line.trim().split(/\s+/).filter(Boolean);
    if (parts.length !== LABEL_FIELDS) {
      continue;
    }

    const values = parts.map(Number);
    if (!values.every(Number.isFinite)) {
      continue;
    }

    const [classValue, cx, cy, width, height] = values;
    boxes.push({ classId: Math.trunc(classValue), cx, cy, width, height });
  }

  return boxes;
}

export function loadYoloLabels(filePath: string): GroundTruthBox[] {
  return parseYoloLabels(fs.readFileSync(path.resolve(filePath), 'utf-8'));
}
