import { z } from 'zod';
import type { RawDetection } from './types';

export const pointSchema = z.tuple([z.number(), z.number()]);

export const rawDetectionSchema = z.tuple([
  z.array(pointSchema).length(4).describe('Bounding polygon corners in image pixels'),
  z.string().describe('Recognized text'),
  z.number().min(0).max(1).describe('Recognition confidence'),
]);

export const ocrOutputSchema: z.ZodType<RawDetection[]> = z.array(rawDetectionSchema);

const statSchema = z.coerce.number().int().nonnegative();

export const playerRecordSchema = z.object({
  player_name: z.string(),
  defeated: statSchema,
  assist: statSchema,
  defeated_2: statSchema,
  fun_coin: statSchema,
  damage: statSchema,
  tank: statSchema,
  heal: statSchema,
  siege_damage: statSchema,
});

export class OcrInputError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid OCR output: ${issues.join('; ')}`);
    this.name = 'OcrInputError';
    this.issues = issues;
  }
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate untrusted OCR engine output (e.g. parsed JSON from a worker).
 * @throws OcrInputError with one entry per schema issue
 */
export function parseOcrOutput(value: unknown): RawDetection[] {
  const parsed = ocrOutputSchema.safeParse(value);
  if (!parsed.success) {
    throw new OcrInputError(formatIssues(parsed.error));
  }
  return parsed.data;
}
