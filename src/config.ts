import type { ConfigSchema, ExtractorConfig } from './types';
import { validateConfig } from './types';

export const extractorConfigSchema: ConfigSchema = {
  confidenceFloor: {
    type: 'number',
    default: 0.1,
    min: 0,
    max: 1,
    step: 0.01,
    label: 'Confidence Floor',
    description: 'Detections with confidence at or below this value are discarded',
  },
  rowTolerance: {
    type: 'number',
    default: 30,
    min: 1,
    max: 200,
    step: 1,
    label: 'Row Tolerance',
    description: 'Y-distance from the open row\'s mean center that still joins the row (pixels)',
  },
  minNumbers: {
    type: 'number',
    default: 4,
    min: 1,
    max: 8,
    step: 1,
    integer: true,
    label: 'Min Numbers',
    description: 'Numbers a row needs before it is accepted as a player',
  },
  debug: {
    type: 'boolean',
    default: false,
    label: 'Debug Mode',
    description: 'Log row grouping and tokenization details',
  },
};

export const DEFAULT_EXTRACTOR_CONFIG: Readonly<ExtractorConfig> = Object.freeze({
  confidenceFloor: 0.1,
  rowTolerance: 30,
  minNumbers: 4,
  debug: false,
});

export function validateExtractorConfig(
  config: Partial<ExtractorConfig>
): { valid: boolean; errors: string[] } {
  return validateConfig(config, extractorConfigSchema);
}

/**
 * Fill unset fields with defaults and validate.
 * @throws Error listing every invalid field
 */
export function resolveExtractorConfig(config: Partial<ExtractorConfig> = {}): ExtractorConfig {
  const resolved: ExtractorConfig = {
    confidenceFloor: config.confidenceFloor ?? DEFAULT_EXTRACTOR_CONFIG.confidenceFloor,
    rowTolerance: config.rowTolerance ?? DEFAULT_EXTRACTOR_CONFIG.rowTolerance,
    minNumbers: config.minNumbers ?? DEFAULT_EXTRACTOR_CONFIG.minNumbers,
    debug: config.debug ?? DEFAULT_EXTRACTOR_CONFIG.debug,
  };

  const { valid, errors } = validateExtractorConfig(resolved);
  if (!valid) {
    throw new Error(`Invalid extractor config: ${errors.join('; ')}`);
  }
  return resolved;
}
