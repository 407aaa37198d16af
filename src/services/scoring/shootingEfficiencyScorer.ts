/**
 * Shooting efficiency normalized against a rolling recent-games baseline
 */

import { RawBoxScoreRow } from '../../types';
import { clamp, safeNumber, safeRatio } from '../../utils/safeNumber';

export interface ShootingPercentages {
  fgPct: number;
  fg3Pct: number;
}

export interface ShootingBaseline {
  games: number;
  fgPctMax: number;
  fg3PctMax: number;
}

export interface ShootingEfficiencyComponent extends ShootingPercentages {
  fgPctMax: number;
  fg3PctMax: number;
  score: number;
}

/**
 * Aggregate FG% and 3P% from summed makes and attempts.
 */
export function aggregateShooting(rows: readonly RawBoxScoreRow[]): ShootingPercentages {
  let fgm = 0;
  let fga = 0;
  let fg3m = 0;
  let fg3a = 0;

  for (const row of rows) {
    fgm += safeNumber(row.fgm);
    fga += safeNumber(row.fga);
    fg3m += safeNumber(row.fg3m);
    fg3a += safeNumber(row.fg3a);
  }

  return {
    fgPct: safeRatio(fgm, fga),
    fg3Pct: safeRatio(fg3m, fg3a)
  };
}

/**
 * Maximum per-game FG% and 3P% across the baseline, grouping rows by game id.
 * Built once per batch and treated as read-only.
 */
export function buildShootingBaseline(rows: readonly RawBoxScoreRow[]): ShootingBaseline {
  const byGame = new Map<string, RawBoxScoreRow[]>();
  for (const row of rows) {
    const gameRows = byGame.get(row.gameId);
    if (gameRows) {
      gameRows.push(row);
    } else {
      byGame.set(row.gameId, [row]);
    }
  }

  let fgPctMax = 0;
  let fg3PctMax = 0;
  for (const gameRows of byGame.values()) {
    const { fgPct, fg3Pct } = aggregateShooting(gameRows);
    fgPctMax = Math.max(fgPctMax, fgPct);
    fg3PctMax = Math.max(fg3PctMax, fg3Pct);
  }

  return Object.freeze({ games: byGame.size, fgPctMax, fg3PctMax });
}

/**
 * Score = (game 3P% / recent max 3P%) * weight, clipped to [0, weight].
 * An empty baseline falls back to the game's own percentages as the max.
 */
export function scoreShootingEfficiency(
  boxScore: readonly RawBoxScoreRow[],
  baseline: ShootingBaseline,
  weight: number
): ShootingEfficiencyComponent {
  const game = aggregateShooting(boxScore);
  const fgPctMax = baseline.games > 0 ? baseline.fgPctMax : game.fgPct;
  const fg3PctMax = baseline.games > 0 ? baseline.fg3PctMax : game.fg3Pct;

  return {
    ...game,
    fgPctMax,
    fg3PctMax,
    score: clamp(safeRatio(game.fg3Pct, fg3PctMax), 0, 1) * weight
  };
}
