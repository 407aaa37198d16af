import { FIRST_OVERTIME_PERIOD, GameEvent } from '../../types';
import { boundedFraction } from '../../utils/safeNumber';

export interface ExtraPeriodComponent {
  overtimePeriods: number;
  score: number;
}

/**
 * Any overtime earns the full weight; extra overtimes add nothing further.
 */
export function scoreExtraPeriods(events: readonly GameEvent[], weight: number): ExtraPeriodComponent {
  const overtimes = new Set(
    events.filter(event => event.period >= FIRST_OVERTIME_PERIOD).map(event => event.period)
  );

  return {
    overtimePeriods: overtimes.size,
    score: boundedFraction(overtimes.size, 1) * weight
  };
}
