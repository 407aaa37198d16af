import { GameEvent, REGULATION_PERIODS } from '../../types';
import { WeightConfig } from '../../config/scoringWeights';
import { mean, safeRatio } from '../../utils/safeNumber';
import { eventsInPeriod } from '../data/playByPlayNormalizer';
import { closeness } from './closeness';

export interface PeriodScore {
  period: number;
  averageMargin: number;
  closeness: number;
  weight: number;
  score: number;              // closeness * weight
}

export interface PeriodComponent {
  periods: PeriodScore[];     // only periods that actually occurred
  periodsSeen: number;
  score: number;              // in [0, maxTotalScore]
}

/**
 * Score one period: its closeness scaled by the period's weight.
 * No events means the period did not happen and scores nothing.
 */
export function scorePeriod(
  period: number,
  events: readonly GameEvent[],
  weight: number,
  halfLife: number
): PeriodScore | null {
  if (events.length === 0) return null;

  const averageMargin = mean(events.map(event => Math.abs(event.margin)));
  const periodCloseness = closeness(averageMargin, halfLife);

  return {
    period,
    averageMargin,
    closeness: periodCloseness,
    weight,
    score: periodCloseness * weight
  };
}

/**
 * Weighted average of regulation-period closeness over the periods that occurred,
 * scaled to maxTotalScore. Overtime is left to the extra-period scorer.
 */
export function scorePeriods(
  events: readonly GameEvent[],
  weights: WeightConfig,
  halfLife: number
): PeriodComponent {
  const periods: PeriodScore[] = [];

  for (const period of REGULATION_PERIODS) {
    const result = scorePeriod(period, eventsInPeriod(events, period), weights.periodWeights[period], halfLife);
    if (result) periods.push(result);
  }

  const earned = periods.reduce((total, p) => total + p.score, 0);
  const available = periods.reduce((total, p) => total + p.weight, 0);

  return {
    periods,
    periodsSeen: periods.length,
    score: Math.min(weights.maxTotalScore, weights.maxTotalScore * safeRatio(earned, available))
  };
}
