import { describe, it, expect, vi } from 'vitest';
import { extractScoreboard, extractTeam } from './pipeline';
import { STAT_FIELDS, type Polygon, type RawDetection } from './types';

function box(x: number, y: number, width = 40, height = 20): Polygon {
  return [
    [x, y - height / 2],
    [x + width, y - height / 2],
    [x + width, y + height / 2],
    [x, y + height / 2],
  ];
}

function raw(text: string, x: number, y: number, confidence = 0.9): RawDetection {
  return [box(x, y), text, confidence];
}

function line(y: number, cells: [text: string, x: number][]): RawDetection[] {
  return cells.map(([text, x]) => raw(text, x, y));
}

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest])
  );
}

const ROW_A = line(100, [
  ['Ztee', 10],
  ['16', 120],
  ['121', 180],
  ['3', 240],
  ['0', 280],
  ['6896682', 330],
  ['2071659', 420],
  ['0', 500],
  ['773143', 540],
]);

const ROW_B = line(160, [
  ['5', 120],
  ['7', 180],
]);

const ZTEE = {
  player_name: 'Ztee',
  defeated: 16,
  assist: 121,
  defeated_2: 3,
  fun_coin: 0,
  damage: 6896682,
  tank: 2071659,
  heal: 0,
  siege_damage: 773143,
};

describe('extractScoreboard', () => {
  it('reconstructs a scoreboard row and reports the short row', () => {
    const result = extractScoreboard([...ROW_A, ...ROW_B], { log: vi.fn() });

    expect(result).toEqual({
      success: true,
      records: [ZTEE],
      skipped: [
        {
          rowIndex: 2,
          text: '5 7',
          numbers: ['5', '7'],
          numberCount: 2,
          reason: 'insufficient-numbers',
        },
      ],
      stats: {
        totalDetections: 11,
        retainedDetections: 11,
        rowsFound: 2,
        rowsAccepted: 1,
        rowsRejected: 1,
      },
    });
  });

  it('reads a row written in fullwidth digits', () => {
    const row = line(100, [
      ['Ztee', 10],
      ['１６', 120],
      ['１２１', 180],
      ['３', 240],
      ['０', 280],
    ]);

    const result = extractScoreboard(row, { log: vi.fn() });

    expect(result).toEqual({
      success: true,
      records: [
        { ...ZTEE, damage: 0, tank: 0, heal: 0, siege_damage: 0 },
      ],
      skipped: [],
      stats: {
        totalDetections: 5,
        retainedDetections: 5,
        rowsFound: 1,
        rowsAccepted: 1,
        rowsRejected: 0,
      },
    });
  });

  it('fails with no-detections on empty input', () => {
    const result = extractScoreboard([], { log: vi.fn() });

    expect(result).toEqual({
      success: false,
      error: 'no-detections',
      message: 'No text detected',
      stats: {
        totalDetections: 0,
        retainedDetections: 0,
        rowsFound: 0,
        rowsAccepted: 0,
        rowsRejected: 0,
      },
    });
    expect('diagnostics' in result).toBe(false);
  });

  it('fails with no-detections when everything is below the confidence floor', () => {
    const result = extractScoreboard([raw('16', 10, 100, 0.1), raw('Ztee', 60, 100, 0.05)], {
      log: vi.fn(),
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe('no-detections');
    expect(result.stats.totalDetections).toBe(2);
    expect(result.stats.retainedDetections).toBe(0);
  });

  it('returns the diagnostics when no row qualifies', () => {
    const result = extractScoreboard(ROW_B, { log: vi.fn() });

    expect(result).toEqual({
      success: false,
      error: 'no-valid-rows',
      message: 'No valid player rows among 1 detected rows',
      diagnostics: [
        {
          rowIndex: 1,
          text: '5 7',
          numbers: ['5', '7'],
          numberCount: 2,
          reason: 'insufficient-numbers',
        },
      ],
      stats: {
        totalDetections: 2,
        retainedDetections: 2,
        rowsFound: 1,
        rowsAccepted: 0,
        rowsRejected: 1,
      },
    });
  });

  it('keeps good rows around a malformed one', () => {
    const result = extractScoreboard(
      [
        ...line(100, [['Alpha', 10], ['1', 120], ['2', 180], ['3', 240], ['4', 300]]),
        ...line(160, [['Bad', 10], ['1', 120], ['2', 180], ['3', 240], ['123456789012345678901', 300]]),
        ...line(220, [['Gamma', 10], ['5', 120], ['6', 180], ['7', 240], ['8', 300]]),
      ],
      { log: vi.fn() }
    );

    if (!result.success) throw new Error('expected partial success');
    expect(result.records.map((r) => r.player_name)).toEqual(['Alpha', 'Gamma']);
    expect(result.skipped.map((d) => [d.rowIndex, d.reason])).toEqual([[2, 'malformed-number']]);
  });

  it('does not depend on the order detections arrive in', () => {
    const ordered = [...ROW_A, ...ROW_B];
    const shuffled = [...ordered].reverse();

    expect(extractScoreboard(shuffled, { log: vi.fn() })).toEqual(
      extractScoreboard(ordered, { log: vi.fn() })
    );
  });

  it('emits records in top-to-bottom order', () => {
    const result = extractScoreboard(
      [
        ...line(300, [['Third', 10], ['3', 120], ['3', 180], ['3', 240], ['3', 300]]),
        ...line(100, [['First', 10], ['1', 120], ['1', 180], ['1', 240], ['1', 300]]),
        ...line(200, [['Second', 10], ['2', 120], ['2', 180], ['2', 240], ['2', 300]]),
      ],
      { log: vi.fn() }
    );

    if (!result.success) throw new Error('expected success');
    expect(result.records.map((r) => r.player_name)).toEqual(['First', 'Second', 'Third']);
  });

  it('rejects three numbers in every token order', () => {
    for (const order of permutations(['Name', '1', '2', '3'])) {
      const result = extractScoreboard(
        order.map((text, i) => raw(text, i * 60, 100)),
        { log: vi.fn() }
      );

      expect(result).toMatchObject({ success: false, error: 'no-valid-rows' });
      if (result.success || result.error !== 'no-valid-rows') continue;
      expect(result.diagnostics[0].numberCount).toBe(3);
    }
  });

  it('accepts four numbers in every token order', () => {
    for (const order of permutations(['Name', '1', '2', '3', '4'])) {
      const result = extractScoreboard(
        order.map((text, i) => raw(text, i * 60, 100)),
        { log: vi.fn() }
      );

      if (!result.success) throw new Error(`rejected order ${order.join(',')}`);
      const [record] = result.records;
      const expected = order.filter((t) => t !== 'Name').map(Number);
      expect(record.player_name).toBe('Name');
      expect(STAT_FIELDS.map((field) => record[field])).toEqual([...expected, 0, 0, 0, 0]);
    }
  });

  it('numbers anonymous players by accepted position', () => {
    const result = extractScoreboard(
      [
        ...line(100, [['1', 120], ['2', 180], ['3', 240], ['4', 300]]),
        ...line(160, [['9', 120]]),
        ...line(220, [['5', 120], ['6', 180], ['7', 240], ['8', 300]]),
      ],
      { log: vi.fn() }
    );

    if (!result.success) throw new Error('expected success');
    expect(result.records.map((r) => r.player_name)).toEqual(['Player_1', 'Player_2']);
  });

  it('applies a lower number threshold from config', () => {
    const result = extractScoreboard([...ROW_A, ...ROW_B], {
      config: { minNumbers: 2 },
      log: vi.fn(),
    });

    if (!result.success) throw new Error('expected success');
    expect(result.records).toHaveLength(2);
    expect(result.records[1]).toEqual({
      player_name: 'Player_2',
      defeated: 5,
      assist: 7,
      defeated_2: 0,
      fun_coin: 0,
      damage: 0,
      tank: 0,
      heal: 0,
      siege_damage: 0,
    });
  });

  it('throws on invalid config', () => {
    expect(() => extractScoreboard(ROW_A, { config: { rowTolerance: -5 }, log: vi.fn() })).toThrow(
      'Invalid extractor config: Field rowTolerance must be >= 1'
    );
  });

  it('logs grouping details in debug mode', () => {
    const log = vi.fn();
    extractScoreboard([...ROW_A, ...ROW_B], { config: { debug: true }, log });

    expect(log).toHaveBeenCalledWith('debug', 'Grouped 11 detections into 2 rows');
    expect(log).toHaveBeenCalledWith('debug', 'Row 1: 8 numbers, name "Ztee"');
    expect(log).toHaveBeenCalledWith('debug', 'Row 2: 2 numbers, name ""');
    expect(log).toHaveBeenCalledWith(
      'info',
      expect.stringContaining('Extracted 1 of 2 rows from 11 detections in ')
    );
  });

  it('stays quiet at debug level by default', () => {
    const log = vi.fn();
    extractScoreboard([...ROW_A, ...ROW_B], { log });

    expect(log.mock.calls.filter(([level]) => level === 'debug')).toEqual([]);
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('warns when nothing survives the confidence floor', () => {
    const log = vi.fn();
    extractScoreboard([], { log });

    expect(log).toHaveBeenCalledWith('warn', 'No text detected: 0 of 0 detections above confidence 0.1');
  });
});

describe('extractTeam', () => {
  it('concatenates accepted records in submission order', () => {
    const second = line(100, [['Bob', 10], ['1', 120], ['2', 180], ['3', 240], ['4', 300]]);
    const team = extractTeam([[...ROW_A, ...ROW_B], [], second], { log: vi.fn() });

    expect(team.records.map((r) => r.player_name)).toEqual(['Ztee', 'Bob']);
    expect(team.images).toHaveLength(3);
    expect(team.images[1]).toMatchObject({ success: false, error: 'no-detections' });
  });

  it('keeps duplicate players from different images', () => {
    const team = extractTeam([ROW_A, ROW_A], { log: vi.fn() });
    expect(team.records).toEqual([ZTEE, ZTEE]);
  });

  it('returns nothing for no images', () => {
    expect(extractTeam([])).toEqual({ records: [], images: [] });
  });
});
