/**
 * Record sheet helpers: the table shape handed to whatever stores or
 * displays the extracted players.
 */

import { z } from 'zod';
import type { PlayerRecord } from './types';
import { STAT_FIELDS } from './types';
import { formatIssues, playerRecordSchema } from './schemas';

export const PLAYER_RECORD_COLUMNS = ['player_name', ...STAT_FIELDS] as const;

export type PlayerRecordColumn = typeof PLAYER_RECORD_COLUMNS[number];

export const MAX_SHEET_PLAYERS = 50;

/**
 * Blank records for manual entry when a screenshot can't be read.
 */
export function createBlankSheet(playerCount = 5): PlayerRecord[] {
  if (!Number.isInteger(playerCount) || playerCount < 1 || playerCount > MAX_SHEET_PLAYERS) {
    throw new Error(
      `Player count must be an integer between 1 and ${MAX_SHEET_PLAYERS}, got ${playerCount}`
    );
  }

  return Array.from({ length: playerCount }, () => ({
    player_name: '',
    defeated: 0,
    assist: 0,
    defeated_2: 0,
    fun_coin: 0,
    damage: 0,
    tank: 0,
    heal: 0,
    siege_damage: 0,
  }));
}

const tableSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Check a hand-edited or imported table against the record columns.
 * Extra columns are dropped; numeric strings are coerced.
 * @throws Error naming the first offending row
 */
export function validatePlayerRecords(value: unknown): PlayerRecord[] {
  const table = tableSchema.safeParse(value);
  if (!table.success) {
    throw new Error(`Invalid player table: ${formatIssues(table.error).join('; ')}`);
  }

  return table.data.map((row, i) => {
    const missing = PLAYER_RECORD_COLUMNS.filter((column) => !Object.hasOwn(row, column));
    if (missing.length > 0) {
      throw new Error(`Missing required columns in row ${i + 1}: ${missing.join(', ')}`);
    }

    const parsed = playerRecordSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Invalid player record in row ${i + 1}: ${formatIssues(parsed.error).join('; ')}`);
    }
    return parsed.data;
  });
}

export function toTableRow(record: PlayerRecord): (string | number)[] {
  return PLAYER_RECORD_COLUMNS.map((column) => record[column]);
}

export interface MatchId {
  /** YYYYMMDD */
  matchDate: string;
  /** Zero-padded, at least 2 digits */
  matchSession: string;
  /** `${matchDate}_${matchSession}` */
  value: string;
}

const matchIdSchema = z.object({
  matchDate: z.string().regex(/^\d{8}$/, 'Match date must be YYYYMMDD'),
  session: z.union([
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/, 'Session must be digits'),
  ]),
});

export function normalizeMatchId(matchDate: string, session: number | string): MatchId {
  const parsed = matchIdSchema.parse({ matchDate, session });
  const matchSession = String(parsed.session).padStart(2, '0');
  return {
    matchDate: parsed.matchDate,
    matchSession,
    value: `${parsed.matchDate}_${matchSession}`,
  };
}
