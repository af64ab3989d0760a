/**
 * Scoreboard OCR Types
 *
 * Value types flowing through the extraction pipeline:
 * raw OCR triples -> detections -> rows -> tokens -> player records.
 */

// =============================================================================
// Geometry
// =============================================================================

/** Image pixel coordinate. */
export type Point = [x: number, y: number];

/** Corner points of an OCR bounding polygon (4 for EasyOCR-style output). */
export type Polygon = Point[];

// =============================================================================
// Upstream OCR Output
// =============================================================================

/**
 * One text span as reported by the OCR engine: `[polygon, text, confidence]`.
 * Confidence is in [0, 1].
 */
export type RawDetection = [polygon: Polygon, text: string, confidence: number];

// =============================================================================
// Pipeline Values
// =============================================================================

export interface Detection {
  readonly text: string;
  readonly confidence: number;
  /** Minimum x of the polygon corners */
  readonly leftX: number;
  /** Mean y of the polygon corners */
  readonly centerY: number;
}

export interface Row {
  /** 1-indexed position, top to bottom */
  index: number;
  /** Mean centerY of the member detections */
  centerY: number;
  /** Sorted by leftX ascending */
  detections: Detection[];
}

export interface RowTokens {
  /** Digit strings in reading order */
  numbers: string[];
  /** Space-joined name fragments, '' when none */
  nameCandidate: string;
}

// =============================================================================
// Player Records (single source of truth for stat column order)
// =============================================================================

/**
 * Stat columns in scoreboard order. Numbers read from a row are assigned to
 * these fields left to right.
 */
export const STAT_FIELDS = [
  'defeated',
  'assist',
  'defeated_2',
  'fun_coin',
  'damage',
  'tank',
  'heal',
  'siege_damage',
] as const;

export type StatField = typeof STAT_FIELDS[number];

export type PlayerStats = Record<StatField, number>;

export interface PlayerRecord extends PlayerStats {
  player_name: string;
}

// =============================================================================
// Diagnostics & Results
// =============================================================================

export type RowRejectionReason = 'insufficient-numbers' | 'malformed-number';

export interface RowDiagnostic {
  rowIndex: number;
  /** Detection texts joined with spaces */
  text: string;
  numbers: string[];
  numberCount: number;
  reason: RowRejectionReason;
  /** The numeric string that failed to parse (malformed-number only) */
  malformedToken?: string;
}

export interface ExtractionStats {
  totalDetections: number;
  retainedDetections: number;
  rowsFound: number;
  rowsAccepted: number;
  rowsRejected: number;
}

export type ExtractionError = 'no-detections' | 'no-valid-rows';

export interface ExtractionSuccess {
  success: true;
  records: PlayerRecord[];
  /** Rows that produced no record, in row order */
  skipped: RowDiagnostic[];
  stats: ExtractionStats;
}

export interface NoDetectionsFailure {
  success: false;
  error: 'no-detections';
  message: string;
  stats: ExtractionStats;
}

export interface NoValidRowsFailure {
  success: false;
  error: 'no-valid-rows';
  message: string;
  diagnostics: RowDiagnostic[];
  stats: ExtractionStats;
}

export type ExtractionResult = ExtractionSuccess | NoDetectionsFailure | NoValidRowsFailure;

export interface TeamExtraction {
  /** Accepted records of every image, in submission order */
  records: PlayerRecord[];
  /** Per-image results, same order as the input images */
  images: ExtractionResult[];
}

// =============================================================================
// Configuration Schema
// =============================================================================

export type ConfigFieldType = 'number' | 'boolean';

export interface ConfigField {
  type: ConfigFieldType;
  label: string;
  description?: string;
  default: number | boolean;
  min?: number;
  max?: number;
  step?: number;
  integer?: boolean;
}

export type ConfigSchema = Record<string, ConfigField>;

export interface ExtractorConfig {
  /** Detections with confidence at or below this are dropped. Default: 0.1 */
  confidenceFloor: number;

  /** Max distance from a row's mean centerY to join that row. Default: 30 */
  rowTolerance: number;

  /** Minimum numbers for a row to become a player record. Default: 4 */
  minNumbers: number;

  /** Log per-row tokenization details. Default: false */
  debug: boolean;
}

// =============================================================================
// Logging
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (level: LogLevel, message: string) => void;

// =============================================================================
// Extractor Events
// =============================================================================

export type ExtractorEvent =
  | 'extraction:started'
  | 'extraction:completed'
  | 'extraction:failed'
  | 'row:rejected';

export interface ExtractorEventData {
  'extraction:started': { detectionCount: number };
  'extraction:completed': { recordCount: number; skippedCount: number; stats: ExtractionStats; duration: number };
  'extraction:failed': { error: ExtractionError; message: string; stats: ExtractionStats; duration: number };
  'row:rejected': RowDiagnostic;
}

export interface IScoreboardExtractor {
  getConfig(): ExtractorConfig;
  extract(raw: readonly RawDetection[]): ExtractionResult;
  extractTeam(images: readonly (readonly RawDetection[])[]): TeamExtraction;
  on<E extends ExtractorEvent>(
    event: E,
    handler: (data: ExtractorEventData[E]) => void
  ): () => void;
}

// =============================================================================
// Config Validation
// =============================================================================

export function validateConfig(
  config: object,
  schema: ConfigSchema
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const values = new Map<string, unknown>(Object.entries(config));
  for (const [key, field] of Object.entries(schema)) {
    const value = values.get(key) ?? field.default;
    switch (field.type) {
      case 'number':
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          errors.push(`Field ${key} must be a number`);
        } else {
          if (field.integer && !Number.isInteger(value)) {
            errors.push(`Field ${key} must be an integer`);
          }
          if (field.min !== undefined && value < field.min) {
            errors.push(`Field ${key} must be >= ${field.min}`);
          }
          if (field.max !== undefined && value > field.max) {
            errors.push(`Field ${key} must be <= ${field.max}`);
          }
        }
        break;
      case 'boolean':
        if (typeof value !== 'boolean') errors.push(`Field ${key} must be a boolean`);
        break;
    }
  }
  return { valid: errors.length === 0, errors };
}
