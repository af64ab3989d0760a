/**
 * Extraction Pipeline
 *
 * normalize -> group rows -> tokenize -> assemble, for one screenshot.
 * Pure and synchronous. Images share no state; team results are merged by
 * concatenation in submission order.
 */

import type {
  ExtractionResult,
  ExtractionStats,
  ExtractorConfig,
  Logger,
  PlayerRecord,
  RawDetection,
  RowDiagnostic,
  TeamExtraction,
} from './types';
import { resolveExtractorConfig } from './config';
import { consoleLogger } from './logger';
import { normalizeDetections } from './stages/detection-normalizer';
import { groupRows } from './stages/row-grouper';
import { tokenizeRow } from './stages/row-tokenizer';
import { assembleRow } from './stages/row-assembler';

export interface ExtractOptions {
  config?: Partial<ExtractorConfig>;
  log?: Logger;
}

export function extractScoreboard(
  raw: readonly RawDetection[],
  options: ExtractOptions = {}
): ExtractionResult {
  const startTime = performance.now();
  const config = resolveExtractorConfig(options.config);
  const log = options.log ?? consoleLogger;

  const detections = normalizeDetections(raw, config.confidenceFloor);
  const stats: ExtractionStats = {
    totalDetections: raw.length,
    retainedDetections: detections.length,
    rowsFound: 0,
    rowsAccepted: 0,
    rowsRejected: 0,
  };

  if (detections.length === 0) {
    log(
      'warn',
      `No text detected: 0 of ${raw.length} detections above confidence ${config.confidenceFloor}`
    );
    return { success: false, error: 'no-detections', message: 'No text detected', stats };
  }

  const rows = groupRows(detections, config.rowTolerance);
  stats.rowsFound = rows.length;

  if (config.debug) {
    log('debug', `Grouped ${detections.length} detections into ${rows.length} rows`);
  }

  const records: PlayerRecord[] = [];
  const skipped: RowDiagnostic[] = [];

  for (const row of rows) {
    const tokens = tokenizeRow(row);

    if (config.debug) {
      log('debug', `Row ${row.index}: ${tokens.numbers.length} numbers, name "${tokens.nameCandidate}"`);
    }

    const outcome = assembleRow(tokens, row, {
      acceptedSoFar: records.length,
      minNumbers: config.minNumbers,
    });

    if (outcome.accepted) {
      records.push(outcome.record);
    } else {
      skipped.push(outcome.diagnostic);
    }
  }

  stats.rowsAccepted = records.length;
  stats.rowsRejected = skipped.length;

  const latencyMs = performance.now() - startTime;
  log(
    'info',
    `Extracted ${records.length} of ${rows.length} rows from ${detections.length} detections in ${latencyMs.toFixed(1)}ms`
  );

  if (records.length === 0) {
    return {
      success: false,
      error: 'no-valid-rows',
      message: `No valid player rows among ${rows.length} detected rows`,
      diagnostics: skipped,
      stats,
    };
  }

  return { success: true, records, skipped, stats };
}

/**
 * Concatenate accepted records of several images in submission order.
 * No de-duplication across images.
 */
export function mergeTeamResults(results: ExtractionResult[]): TeamExtraction {
  return {
    records: results.flatMap((result) => (result.success ? result.records : [])),
    images: results,
  };
}

export function extractTeam(
  images: readonly (readonly RawDetection[])[],
  options: ExtractOptions = {}
): TeamExtraction {
  return mergeTeamResults(images.map((raw) => extractScoreboard(raw, options)));
}
