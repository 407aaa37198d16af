// Core types for game excitement scoring

export type Grade = 'A+' | 'A' | 'B+' | 'B' | 'C+' | 'C' | 'D';
export type GradeLabel = Grade | 'N/A';

export const GRADE_ORDER: readonly GradeLabel[] = ['A+', 'A', 'B+', 'B', 'C+', 'C', 'D', 'N/A'];

/** Regulation periods carry their own weights; anything above is overtime. */
export type RegulationPeriod = 1 | 2 | 3 | 4;
export const REGULATION_PERIODS: readonly RegulationPeriod[] = [1, 2, 3, 4];
export const FIRST_OVERTIME_PERIOD = 5;

/**
 * One play-by-play event as the provider sends it.
 * scoreMargin is home minus away: "TIE", "+5", "-3", or empty on non-scoring plays.
 */
export interface RawPlayByPlayRow {
  period: number;
  scoreMargin: string | number | null;
  clock: string;              // time remaining in the period, "MM:SS"
  description: string;
  eventType?: number;
  score?: string | null;      // "AWAY - HOME"
}

/** One player's stat line. Unparseable provider values arrive as NaN. */
export interface RawBoxScoreRow {
  gameId: string;
  teamId?: number;
  teamAbbreviation?: string;
  playerName: string;
  fgm: number;
  fga: number;
  fg3m: number;
  fg3a: number;
  pts: number;
  reb?: number;
  ast?: number;
}

/** A play-by-play row after margin carry-forward and clock parsing. */
export interface GameEvent {
  index: number;
  period: number;
  margin: number;             // running margin after this event
  previousMargin: number;     // running margin before this event
  scored: boolean;
  clockSeconds: number | null;   // null when the clock could not be read
  description: string;
}

export interface GameInfo {
  gameId: string;
  gameDate: string;
  matchup: string;
}

/** The three tables the analyzer consumes for one game. */
export interface GameData {
  playByPlay: RawPlayByPlayRow[];
  boxScore: RawBoxScoreRow[];
}

export interface GameScoreResult extends GameInfo {
  periodScore: number;
  extraPeriodScore: number;
  leadChangeScore: number;
  buzzerBeaterScore: number;
  fg3PctScore: number;
  starPerformanceScore: number;
  marginScore: number;
  totalScore: number;
  grade: GradeLabel;

  // Diagnostics
  averageMargin: number;
  leadChanges: number;
  overtimePeriods: number;
  buzzerBeaters: number;
  fgPctMax: number;
  fg3PctMax: number;
  maxPoints: number;
  starPerformances: number;
  warnings: readonly string[];
}

/** Columns handed to presentation, keyed by their display labels. */
export interface GameResultRow {
  'Game ID': string;
  'Game Date': string;
  'Teams': string;
  'Period Scores': number;
  'Extra Periods': number;
  'Lead Changes': number;
  'Buzzer Beater': number;
  'FG3_PCT': number;
  'Star Performance': number;
  'Margin': number;
  'Total Score': number;
  'Grade': GradeLabel;
  'Average Margin': number;
}

export interface GradeSummary {
  grade: GradeLabel;
  count: number;
  averageTotalScore: number;
}
