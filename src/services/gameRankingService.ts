/**
 * Game Ranking Service
 * Fetches recent games, scores each against a shared shooting baseline and ranks them
 */

import { GameInfo, GameScoreResult, RawBoxScoreRow } from '../types';
import { ErrorHandler, errorHandler as sharedErrorHandler } from '../utils/errorHandler';
import { GameAnalyzer, BatchGame } from './gameAnalyzer';
import { NbaStatsClient, GameFinderQuery, TeamGameLog } from './nba/nbaStatsClient';
import { TeamGameLogEntry } from './nba/resultSetParser';
import { sortByTotalScore } from './resultsTable';

export interface RankingOptions extends GameFinderQuery {
  maxGames?: number;
  baselineGames?: number;     // recent games the shooting baseline covers, defaults to maxGames
}

/**
 * Log rows of the most recent baselineGames distinct games; entries arrive newest first.
 */
export function selectBaselineRows(log: TeamGameLog, baselineGames: number): RawBoxScoreRow[] {
  const recent = new Set<string>();
  for (const entry of log.entries) {
    if (recent.size >= baselineGames) break;
    recent.add(entry.gameId);
  }
  return log.boxScores.filter(row => recent.has(row.gameId));
}

/**
 * One row per game: away-team rows ("@" in the matchup) name the game,
 * falling back to any row when a game has no away row in the log.
 */
export function selectUniqueGames(entries: readonly TeamGameLogEntry[], maxGames: number): GameInfo[] {
  const pick = (rows: readonly TeamGameLogEntry[]): GameInfo[] => {
    const seen = new Set<string>();
    const games: GameInfo[] = [];
    for (const row of rows) {
      if (seen.has(row.gameId)) continue;
      seen.add(row.gameId);
      games.push({ gameId: row.gameId, gameDate: row.gameDate, matchup: row.matchup });
    }
    return games;
  };

  const awayGames = pick(entries.filter(entry => entry.matchup.includes('@')));
  if (awayGames.length > 0) {
    return awayGames.slice(0, maxGames);
  }

  console.log('No away matchups found, using all recent games instead.');
  return pick(entries).slice(0, maxGames);
}

export class GameRankingService {
  private client: NbaStatsClient;
  private analyzer: GameAnalyzer;
  private errors: ErrorHandler;

  constructor(client: NbaStatsClient, analyzer: GameAnalyzer, errors: ErrorHandler = sharedErrorHandler) {
    this.client = client;
    this.analyzer = analyzer;
    this.errors = errors;
  }

  /**
   * Fetch one game's tables; a fetch failure becomes a null so the game
   * still shows up as an N/A row.
   */
  private async fetchGame(game: GameInfo): Promise<BatchGame> {
    try {
      const playByPlay = await this.client.fetchPlayByPlay(game.gameId);
      const boxScore = await this.client.fetchBoxScore(game.gameId);
      return { ...game, data: { playByPlay, boxScore } };
    } catch (error) {
      this.errors.handleError(error, { gameId: game.gameId });
      return { ...game, data: null };
    }
  }

  async rankRecentGames(options: RankingOptions = {}): Promise<GameScoreResult[]> {
    const { maxGames = 20, baselineGames = maxGames, ...query } = options;

    console.log('\n📊 Fetching recent games...');
    const log = await this.client.fetchTeamGameLog(query);
    const games = selectUniqueGames(log.entries, maxGames);
    console.log(`  Analyzing ${games.length} games`);

    // Sequential: the stats API throttles parallel requests
    const batch: BatchGame[] = [];
    for (const game of games) {
      batch.push(await this.fetchGame(game));
    }

    // Team rows of the recent window double as the shooting baseline
    const baselineRows = selectBaselineRows(log, baselineGames);
    console.log(`  Shooting baseline: ${baselineRows.length} team-game rows`);
    const results = this.analyzer.analyzeBatch(batch, baselineRows);
    return sortByTotalScore(results);
  }
}
