/**
 * Final-margin closeness and star-performance scoring
 */

import { GameEvent, RawBoxScoreRow } from '../../types';
import { ScoringPolicy, WeightConfig } from '../../config/scoringWeights';
import { boundedFraction, mean } from '../../utils/safeNumber';
import { closeness } from './closeness';

export interface MarginStarScores {
  status: 'ok';
  finalMargin: number;
  averageMargin: number;
  marginScore: number;
  maxPoints: number;
  starPerformances: number;
  starPerformanceScore: number;
}

export interface MarginStarUnavailable {
  status: 'unavailable';
  reason: string;
}

export type MarginStarOutcome = MarginStarScores | MarginStarUnavailable;

const TRIPLE_DOUBLE_THRESHOLD = 10;
const SHOOTING_STATS = ['fgm', 'fga', 'fg3m', 'fg3a'] as const;

/**
 * A star line: points at or above the threshold, or a points/rebounds/assists
 * triple-double. Raising any stat never turns a star line into a non-star.
 */
export function isStarPerformance(row: RawBoxScoreRow, pointsThreshold: number): boolean {
  if (row.pts >= pointsThreshold) return true;

  return (
    row.pts >= TRIPLE_DOUBLE_THRESHOLD &&
    (row.reb ?? 0) >= TRIPLE_DOUBLE_THRESHOLD &&
    (row.ast ?? 0) >= TRIPLE_DOUBLE_THRESHOLD
  );
}

/**
 * Mean |margin| over the last period's closing window (clock at or under windowSeconds).
 */
export function closingAverageMargin(events: readonly GameEvent[], windowSeconds: number): number {
  if (events.length === 0) return 0;

  const lastPeriod = Math.max(...events.map(event => event.period));
  const closing = events.filter(
    event => event.period === lastPeriod && event.clockSeconds !== null && event.clockSeconds <= windowSeconds
  );
  return mean(closing.map(event => Math.abs(event.margin)));
}

function findInvalidStat(boxScore: readonly RawBoxScoreRow[]): string | null {
  for (const row of boxScore) {
    if (typeof row.pts !== 'number' || !isFinite(row.pts) || row.pts < 0) {
      return `unparseable points for ${row.playerName || 'unknown player'}`;
    }
    for (const stat of SHOOTING_STATS) {
      if (!isFinite(row[stat]) || row[stat] < 0) {
        return `unparseable ${stat} for ${row.playerName || 'unknown player'}`;
      }
    }
    for (const stat of ['reb', 'ast'] as const) {
      const value = row[stat];
      if (value !== undefined && !isFinite(value)) {
        return `unparseable ${stat} for ${row.playerName || 'unknown player'}`;
      }
    }
  }
  return null;
}

export function scoreMarginAndStars(
  events: readonly GameEvent[],
  boxScore: readonly RawBoxScoreRow[],
  weights: Pick<WeightConfig, 'marginWeight' | 'starPerformanceWeight'>,
  policy: Pick<ScoringPolicy, 'marginHalfLife' | 'starPointsThreshold' | 'starReference' | 'closingWindowSeconds'>
): MarginStarOutcome {
  if (events.length === 0) {
    return { status: 'unavailable', reason: 'no play-by-play events' };
  }
  if (boxScore.length === 0) {
    return { status: 'unavailable', reason: 'box score is empty' };
  }

  const invalid = findInvalidStat(boxScore);
  if (invalid) {
    return { status: 'unavailable', reason: invalid };
  }

  const finalMargin = events[events.length - 1].margin;
  const marginScore = closeness(finalMargin, policy.marginHalfLife) * weights.marginWeight;

  const maxPoints = Math.max(...boxScore.map(row => row.pts));
  const starPerformances = boxScore.filter(row => isStarPerformance(row, policy.starPointsThreshold)).length;
  const starPerformanceScore = boundedFraction(starPerformances, policy.starReference) * weights.starPerformanceWeight;

  return {
    status: 'ok',
    finalMargin,
    averageMargin: closingAverageMargin(events, policy.closingWindowSeconds),
    marginScore,
    maxPoints,
    starPerformances,
    starPerformanceScore
  };
}
