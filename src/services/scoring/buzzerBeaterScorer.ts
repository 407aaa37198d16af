import { GameEvent } from '../../types';
import { boundedFraction } from '../../utils/safeNumber';

export interface BuzzerBeaterComponent {
  buzzerBeaters: GameEvent[];
  score: number;
}

const FINAL_REGULATION_PERIOD = 4;

/**
 * A game-deciding shot: it changed which team leads, or tied the game.
 */
export function isGameDeciding(event: GameEvent): boolean {
  return event.scored && Math.sign(event.margin) !== Math.sign(event.previousMargin);
}

/**
 * Scoring plays inside the final seconds of the fourth period or any overtime
 * that flipped or erased the lead. Events with an unreadable clock never qualify.
 */
export function findBuzzerBeaters(events: readonly GameEvent[], windowSeconds: number): GameEvent[] {
  return events.filter(event =>
    event.period >= FINAL_REGULATION_PERIOD &&
    event.clockSeconds !== null &&
    event.clockSeconds <= windowSeconds &&
    isGameDeciding(event)
  );
}

export function scoreBuzzerBeaters(
  events: readonly GameEvent[],
  weight: number,
  windowSeconds: number
): BuzzerBeaterComponent {
  const buzzerBeaters = findBuzzerBeaters(events, windowSeconds);

  return {
    buzzerBeaters,
    score: boundedFraction(buzzerBeaters.length, 1) * weight
  };
}
