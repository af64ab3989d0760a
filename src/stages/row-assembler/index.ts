/**
 * Row Validator / Assembler
 *
 * Accepts a row once it carries at least `minNumbers` numbers, pads the
 * missing trailing stats with 0 and maps the first eight numbers onto the
 * stat columns. Rejections become diagnostics; nothing here throws.
 */

import type { PlayerRecord, Row, RowDiagnostic, RowRejectionReason, RowTokens } from '../../types';
import { STAT_FIELDS } from '../../types';
import { DEFAULT_EXTRACTOR_CONFIG } from '../../config';
import { rowText } from '../row-grouper';

export type AssemblyOutcome =
  | { accepted: true; record: PlayerRecord }
  | { accepted: false; diagnostic: RowDiagnostic };

export interface AssembleOptions {
  /** Records accepted before this row (used for placeholder names) */
  acceptedSoFar: number;
  minNumbers?: number;
}

const DIGITS = /^\d+$/;

function parseStat(token: string): number | null {
  if (!DIGITS.test(token)) return null;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
}

function reject(
  row: Row,
  numbers: string[],
  reason: RowRejectionReason,
  malformedToken?: string
): AssemblyOutcome {
  return {
    accepted: false,
    diagnostic: {
      rowIndex: row.index,
      text: rowText(row),
      numbers: [...numbers],
      numberCount: numbers.length,
      reason,
      ...(malformedToken !== undefined && { malformedToken }),
    },
  };
}

export function assembleRow(
  tokens: RowTokens,
  row: Row,
  options: AssembleOptions
): AssemblyOutcome {
  const minNumbers = options.minNumbers ?? DEFAULT_EXTRACTOR_CONFIG.minNumbers;
  const { numbers } = tokens;

  if (numbers.length < minNumbers) {
    return reject(row, numbers, 'insufficient-numbers');
  }

  const padded = [...numbers];
  while (padded.length < STAT_FIELDS.length) {
    padded.push('0');
  }

  const values: number[] = [];
  for (const token of padded.slice(0, STAT_FIELDS.length)) {
    const value = parseStat(token);
    if (value === null) {
      return reject(row, numbers, 'malformed-number', token);
    }
    values.push(value);
  }

  const [defeated, assist, defeated_2, fun_coin, damage, tank, heal, siege_damage] = values;

  return {
    accepted: true,
    record: {
      player_name: tokens.nameCandidate || `Player_${options.acceptedSoFar + 1}`,
      defeated,
      assist,
      defeated_2,
      fun_coin,
      damage,
      tank,
      heal,
      siege_damage,
    },
  };
}

export function describeDiagnostic(diagnostic: RowDiagnostic): string {
  const prefix = `Row ${diagnostic.rowIndex}: "${diagnostic.text}"`;
  switch (diagnostic.reason) {
    case 'insufficient-numbers':
      return `${prefix} has only ${diagnostic.numberCount} numbers`;
    case 'malformed-number':
      return `${prefix} has an unreadable number "${diagnostic.malformedToken ?? ''}"`;
  }
}

/** One "skipped row" line per diagnostic, for display to an operator. */
export function formatDiagnostics(diagnostics: readonly RowDiagnostic[]): string[] {
  return diagnostics.map(describeDiagnostic);
}
