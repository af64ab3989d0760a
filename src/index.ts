/**
 * scoreboard-ocr
 *
 * Rebuilds a post-match scoreboard (player name + 8 stats per row) from
 * OCR text detections, using only their geometry and text.
 */

// =============================================================================
// Types
// =============================================================================
export type {
  Point,
  Polygon,
  RawDetection,
  Detection,
  Row,
  RowTokens,
  StatField,
  PlayerStats,
  PlayerRecord,
  RowRejectionReason,
  RowDiagnostic,
  ExtractionStats,
  ExtractionError,
  ExtractionSuccess,
  NoDetectionsFailure,
  NoValidRowsFailure,
  ExtractionResult,
  TeamExtraction,
  ConfigFieldType,
  ConfigField,
  ConfigSchema,
  ExtractorConfig,
  LogLevel,
  Logger,
  ExtractorEvent,
  ExtractorEventData,
  IScoreboardExtractor,
} from './types';

export { STAT_FIELDS, validateConfig } from './types';

// =============================================================================
// Configuration & Logging
// =============================================================================
export {
  extractorConfigSchema,
  DEFAULT_EXTRACTOR_CONFIG,
  validateExtractorConfig,
  resolveExtractorConfig,
} from './config';

export { consoleLogger } from './logger';

// =============================================================================
// Input Validation
// =============================================================================
export {
  rawDetectionSchema,
  ocrOutputSchema,
  playerRecordSchema,
  parseOcrOutput,
  OcrInputError,
} from './schemas';

// =============================================================================
// Utilities
// =============================================================================
export { polygonLeftX, polygonCenterY } from './utils';

// =============================================================================
// Pipeline Stages
// =============================================================================
export { normalizeDetections, toDetection } from './stages/detection-normalizer';
export { groupRows, rowText } from './stages/row-grouper';
export { tokenizeRow, tokenizeText, type TextTokens } from './stages/row-tokenizer';
export {
  assembleRow,
  describeDiagnostic,
  formatDiagnostics,
  type AssemblyOutcome,
  type AssembleOptions,
} from './stages/row-assembler';

// =============================================================================
// Pipeline & Runtime
// =============================================================================
export { extractScoreboard, extractTeam, mergeTeamResults, type ExtractOptions } from './pipeline';
export { ScoreboardExtractor } from './runtime';

// =============================================================================
// Record Sheets
// =============================================================================
export {
  PLAYER_RECORD_COLUMNS,
  MAX_SHEET_PLAYERS,
  createBlankSheet,
  validatePlayerRecords,
  toTableRow,
  normalizeMatchId,
  type PlayerRecordColumn,
  type MatchId,
} from './sheet';
