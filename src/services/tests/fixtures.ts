import type { RawBoxScoreRow, RawPlayByPlayRow } from '../../types';

export function pbpRow(
  period: number,
  scoreMargin: string | number | null,
  clock: string = '06:00',
  description: string = ''
): RawPlayByPlayRow {
  return { period, scoreMargin, clock, description };
}

/**
 * Every regulation period present, margin never leaves 0.
 */
export function tiedGameRows(): RawPlayByPlayRow[] {
  const rows: RawPlayByPlayRow[] = [];
  for (let period = 1; period <= 4; period++) {
    rows.push(pbpRow(period, null, '12:00', 'Start of period'));
    rows.push(pbpRow(period, null, '06:00', 'Jump ball'));
    rows.push(pbpRow(period, null, '00:00', 'End of period'));
  }
  return rows;
}

export function playerLine(playerName: string, overrides: Partial<RawBoxScoreRow> = {}): RawBoxScoreRow {
  return {
    gameId: 'game-1',
    playerName,
    fgm: 0,
    fga: 0,
    fg3m: 0,
    fg3a: 0,
    pts: 0,
    ...overrides
  };
}

/**
 * Small deterministic generator for property-style tests.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 4294967296;
  };
}
