/**
 * Game Analyzer
 * Runs every scoring component over one game's tables, sums and grades the result
 */

import { GameData, GameInfo, GameScoreResult, RawBoxScoreRow } from '../types';
import { ScoringConfig, defaultScoringConfig } from '../config/scoringWeights';
import { ErrorHandler, errorHandler as sharedErrorHandler } from '../utils/errorHandler';
import { normalizePlayByPlay } from './data/playByPlayNormalizer';
import {
  ShootingBaseline,
  assignGrade,
  buildShootingBaseline,
  scoreBuzzerBeaters,
  scoreExtraPeriods,
  scoreLeadChanges,
  scoreMarginAndStars,
  scorePeriods,
  scoreShootingEfficiency
} from './scoring';

export interface BatchGame extends GameInfo {
  data: GameData | null;      // null when the data collaborator could not fetch the game
}

export function emptyGameResult(game: GameInfo, warning?: string): GameScoreResult {
  const result: GameScoreResult = {
    gameId: game.gameId,
    gameDate: game.gameDate,
    matchup: game.matchup,
    periodScore: 0,
    extraPeriodScore: 0,
    leadChangeScore: 0,
    buzzerBeaterScore: 0,
    fg3PctScore: 0,
    starPerformanceScore: 0,
    marginScore: 0,
    totalScore: 0,
    grade: 'N/A',
    averageMargin: 0,
    leadChanges: 0,
    overtimePeriods: 0,
    buzzerBeaters: 0,
    fgPctMax: 0,
    fg3PctMax: 0,
    maxPoints: 0,
    starPerformances: 0,
    warnings: Object.freeze(warning ? [warning] : [])
  };
  return Object.freeze(result);
}

export class GameAnalyzer {
  private config: ScoringConfig;
  private errors: ErrorHandler;

  constructor(config: ScoringConfig = defaultScoringConfig, errors: ErrorHandler = sharedErrorHandler) {
    this.config = config;
    this.errors = errors;
  }

  /**
   * Score one game. Missing play-by-play short-circuits to an N/A result.
   */
  analyze(game: GameInfo, data: GameData, baseline: ShootingBaseline): GameScoreResult {
    if (data.playByPlay.length === 0) {
      this.errors.handleWarning('No play-by-play data, grading as N/A', { gameId: game.gameId });
      return emptyGameResult(game, 'play-by-play unavailable');
    }

    const { weights, policy } = this.config;
    const events = normalizePlayByPlay(data.playByPlay);
    const warnings: string[] = [];

    const periods = scorePeriods(events, weights, policy.periodHalfLife);
    const extraPeriods = scoreExtraPeriods(events, weights.extraPeriodWeight);
    const leadChanges = scoreLeadChanges(events, weights.leadChangeWeight, policy.leadChangeReference);
    const buzzerBeaters = scoreBuzzerBeaters(events, weights.buzzerBeaterWeight, policy.buzzerBeaterSeconds);
    const shooting = scoreShootingEfficiency(data.boxScore, baseline, weights.fg3PctWeight);
    const marginStar = scoreMarginAndStars(events, data.boxScore, weights, policy);

    let fgPctMax = shooting.fgPctMax;
    let fg3PctMax = shooting.fg3PctMax;
    let marginScore = 0;
    let starPerformanceScore = 0;
    let averageMargin = 0;
    let maxPoints = 0;
    let starPerformances = 0;

    switch (marginStar.status) {
      case 'ok':
        marginScore = marginStar.marginScore;
        starPerformanceScore = marginStar.starPerformanceScore;
        averageMargin = marginStar.averageMargin;
        maxPoints = marginStar.maxPoints;
        starPerformances = marginStar.starPerformances;
        break;
      case 'unavailable':
        // fg-max, fg3-max, margin and star all fall back to 0
        fgPctMax = 0;
        fg3PctMax = 0;
        warnings.push(`margin/star unavailable: ${marginStar.reason}`);
        this.errors.handleWarning(`Margin/star performance unavailable: ${marginStar.reason}`, {
          gameId: game.gameId
        });
        break;
    }

    const totalScore =
      periods.score +
      extraPeriods.score +
      leadChanges.score +
      buzzerBeaters.score +
      shooting.score +
      marginScore +
      starPerformanceScore;

    const result: GameScoreResult = {
      gameId: game.gameId,
      gameDate: game.gameDate,
      matchup: game.matchup,
      periodScore: periods.score,
      extraPeriodScore: extraPeriods.score,
      leadChangeScore: leadChanges.score,
      buzzerBeaterScore: buzzerBeaters.score,
      fg3PctScore: shooting.score,
      starPerformanceScore,
      marginScore,
      totalScore,
      grade: assignGrade(totalScore, policy.gradeThresholds),
      averageMargin,
      leadChanges: leadChanges.leadChanges,
      overtimePeriods: extraPeriods.overtimePeriods,
      buzzerBeaters: buzzerBeaters.buzzerBeaters.length,
      fgPctMax,
      fg3PctMax,
      maxPoints,
      starPerformances,
      warnings: Object.freeze(warnings)
    };
    return Object.freeze(result);
  }

  /**
   * Analyze a batch against one baseline. A game that throws or has no data
   * still gets an N/A row; the batch never aborts.
   */
  analyzeBatch(games: readonly BatchGame[], baselineRows: readonly RawBoxScoreRow[]): GameScoreResult[] {
    const baseline = buildShootingBaseline(baselineRows);

    return games.map(game => {
      if (!game.data) {
        return emptyGameResult(game, 'game data unavailable');
      }
      try {
        return this.analyze(game, game.data, baseline);
      } catch (error) {
        this.errors.handleError(error, { gameId: game.gameId });
        return emptyGameResult(game, 'analysis failed');
      }
    });
  }
}
