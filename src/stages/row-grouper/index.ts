/**
 * Row Grouper
 *
 * Greedy single-pass clustering of detections into printed lines.
 * Each detection is compared against the mean centerY of the row being
 * built, not its nearest neighbour, so a slow vertical drift starts a new
 * row once it strays past the tolerance.
 */

import type { Detection, Row } from '../../types';
import { DEFAULT_EXTRACTOR_CONFIG } from '../../config';
import { mean } from '../../utils';

function closeRow(buffer: Detection[], index: number): Row {
  return {
    index,
    centerY: mean(buffer.map((d) => d.centerY)),
    detections: [...buffer].sort((a, b) => a.leftX - b.leftX),
  };
}

/**
 * Cluster detections into rows, top to bottom, each row left to right.
 */
export function groupRows(
  detections: readonly Detection[],
  rowTolerance: number = DEFAULT_EXTRACTOR_CONFIG.rowTolerance
): Row[] {
  if (detections.length === 0) return [];

  const sorted = [...detections].sort(
    (a, b) => a.centerY - b.centerY || a.leftX - b.leftX
  );

  const rows: Row[] = [];
  let buffer: Detection[] = [];

  for (const detection of sorted) {
    if (buffer.length > 0) {
      const rowCenterY = mean(buffer.map((d) => d.centerY));
      if (Math.abs(detection.centerY - rowCenterY) > rowTolerance) {
        rows.push(closeRow(buffer, rows.length + 1));
        buffer = [];
      }
    }
    buffer.push(detection);
  }

  rows.push(closeRow(buffer, rows.length + 1));

  return rows;
}

export function rowText(row: Row): string {
  return row.detections.map((d) => d.text).join(' ');
}
