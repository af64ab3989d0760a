import type { Polygon } from './types';

function assertNonEmpty(polygon: Polygon): void {
  if (polygon.length === 0) {
    throw new Error('Bounding polygon has no points');
  }
}

export function polygonLeftX(polygon: Polygon): number {
  assertNonEmpty(polygon);
  return Math.min(...polygon.map(([x]) => x));
}

export function polygonCenterY(polygon: Polygon): number {
  assertNonEmpty(polygon);
  return polygon.reduce((sum, [, y]) => sum + y, 0) / polygon.length;
}

export function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}
