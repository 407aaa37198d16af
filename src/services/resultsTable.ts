/**
 * Result set handed to presentation: labeled columns, fixed precision,
 * ordering and a per-grade summary
 */

import { GRADE_ORDER, GameResultRow, GameScoreResult, GradeSummary } from '../types';
import { mean, roundTo } from '../utils/safeNumber';

export const DISPLAY_PRECISION = 2;

export function toResultRow(result: GameScoreResult, decimals: number = DISPLAY_PRECISION): GameResultRow {
  return {
    'Game ID': result.gameId,
    'Game Date': result.gameDate,
    'Teams': result.matchup,
    'Period Scores': roundTo(result.periodScore, decimals),
    'Extra Periods': roundTo(result.extraPeriodScore, decimals),
    'Lead Changes': roundTo(result.leadChangeScore, decimals),
    'Buzzer Beater': roundTo(result.buzzerBeaterScore, decimals),
    'FG3_PCT': roundTo(result.fg3PctScore, decimals),
    'Star Performance': roundTo(result.starPerformanceScore, decimals),
    'Margin': roundTo(result.marginScore, decimals),
    'Total Score': roundTo(result.totalScore, decimals),
    'Grade': result.grade,
    'Average Margin': roundTo(result.averageMargin, decimals)
  };
}

/**
 * Highest total first; ties keep a stable order by game id.
 */
export function sortByTotalScore(results: readonly GameScoreResult[]): GameScoreResult[] {
  return [...results].sort((a, b) => b.totalScore - a.totalScore || a.gameId.localeCompare(b.gameId));
}

export function toResultTable(results: readonly GameScoreResult[]): GameResultRow[] {
  return sortByTotalScore(results).map(result => toResultRow(result));
}

/**
 * Count and mean total per grade, in display order, including empty grades.
 */
export function summarizeByGrade(results: readonly GameScoreResult[]): GradeSummary[] {
  return GRADE_ORDER.map(grade => {
    const totals = results.filter(result => result.grade === grade).map(result => result.totalScore);
    return {
      grade,
      count: totals.length,
      averageTotalScore: roundTo(mean(totals), DISPLAY_PRECISION)
    };
  });
}
