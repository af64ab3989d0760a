/**
 * Detection Normalizer
 *
 * Turns raw OCR triples into Detections anchored at their left edge and
 * vertical center. Spans at or below the confidence floor are dropped.
 */

import type { Detection, RawDetection } from '../../types';
import { DEFAULT_EXTRACTOR_CONFIG } from '../../config';
import { polygonCenterY, polygonLeftX } from '../../utils';

export function toDetection([polygon, text, confidence]: RawDetection): Detection {
  return Object.freeze({
    text: text.trim(),
    confidence,
    leftX: polygonLeftX(polygon),
    centerY: polygonCenterY(polygon),
  });
}

/**
 * Keep detections strictly above `confidenceFloor`, in input order.
 */
export function normalizeDetections(
  raw: readonly RawDetection[],
  confidenceFloor: number = DEFAULT_EXTRACTOR_CONFIG.confidenceFloor
): Detection[] {
  const detections: Detection[] = [];
  for (const entry of raw) {
    const [, , confidence] = entry;
    // NaN never clears the floor
    if (!(confidence > confidenceFloor)) continue;
    detections.push(toDetection(entry));
  }
  return detections;
}
