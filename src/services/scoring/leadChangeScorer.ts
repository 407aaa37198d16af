import { GameEvent } from '../../types';
import { boundedFraction } from '../../utils/safeNumber';

export interface LeadChangeComponent {
  leadChanges: number;
  score: number;
}

/**
 * Count sign flips of the running margin. A tie is pending: it neither counts
 * as a sign nor resets the last leader, so +3, 0, -2 is one lead change.
 */
export function countLeadChanges(margins: readonly number[]): number {
  let leadChanges = 0;
  let lastSign = 0;

  for (const margin of margins) {
    const sign = Math.sign(margin);
    if (sign === 0 || isNaN(sign)) continue;

    if (lastSign !== 0 && sign !== lastSign) {
      leadChanges++;
    }
    lastSign = sign;
  }

  return leadChanges;
}

export function scoreLeadChanges(
  events: readonly GameEvent[],
  weight: number,
  reference: number
): LeadChangeComponent {
  const leadChanges = countLeadChanges(events.map(event => event.margin));

  return {
    leadChanges,
    score: boundedFraction(leadChanges, reference) * weight
  };
}
