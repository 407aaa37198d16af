/**
 * Play-by-play normalization
 * Turns provider rows into events with a running margin on every row
 */

import { GameEvent, RawPlayByPlayRow } from '../../types';
import { clockToSeconds } from '../../utils/gameClock';

/**
 * Parse a provider score margin. "TIE" is 0, empty means "not reported".
 */
export function parseScoreMargin(margin: string | number | null | undefined): number | null {
  if (margin === null || margin === undefined) return null;
  if (typeof margin === 'number') return isFinite(margin) ? margin : null;

  const value = margin.trim();
  if (value === '') return null;
  if (value.toUpperCase() === 'TIE') return 0;

  const parsed = Number(value);
  return isFinite(parsed) ? parsed : null;
}

/**
 * Carry the last reported margin forward (0 at tip-off) so every event has one.
 * An event counts as scored when it reports a margin different from the running one.
 */
export function normalizePlayByPlay(rows: readonly RawPlayByPlayRow[]): GameEvent[] {
  let runningMargin = 0;

  return rows.map((row, index) => {
    const reported = parseScoreMargin(row.scoreMargin);
    const previousMargin = runningMargin;
    const scored = reported !== null && reported !== previousMargin;

    if (reported !== null) {
      runningMargin = reported;
    }

    return {
      index,
      period: Number.isFinite(row.period) ? row.period : 0,
      margin: runningMargin,
      previousMargin,
      scored,
      clockSeconds: clockToSeconds(row.clock),
      description: row.description ?? ''
    };
  });
}

export function eventsInPeriod(events: readonly GameEvent[], period: number): GameEvent[] {
  return events.filter(event => event.period === period);
}
