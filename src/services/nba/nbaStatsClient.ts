/**
 * NBA Stats API client
 * Fetches team game logs, play-by-play and box scores from stats.nba.com
 */

import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';
import { RawBoxScoreRow, RawPlayByPlayRow } from '../../types';
import { DEFAULT_NBA_STATS_BASE_URL } from '../../config/env';
import { ErrorHandler, errorHandler as sharedErrorHandler } from '../../utils/errorHandler';
import {
  TeamGameLogEntry,
  parseResultSet,
  toBoxScoreRow,
  toPlayByPlayRow,
  toTeamGameLogEntry
} from './resultSetParser';

export interface NbaStatsClientConfig {
  baseURL?: string;
  requestDelayMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  adapter?: CreateAxiosDefaults['adapter'];
  errorHandler?: ErrorHandler;
}

export interface TeamGameLog {
  entries: TeamGameLogEntry[];
  boxScores: RawBoxScoreRow[];    // one team-level row per entry, same schema as player rows
}

export interface GameFinderQuery {
  season?: string;
  dateFrom?: string;              // MM/DD/YYYY
  dateTo?: string;
}

// stats.nba.com rejects requests that do not look like a browser
const STATS_HEADERS = {
  'Accept': 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
  'Origin': 'https://www.nba.com',
  'Referer': 'https://www.nba.com/',
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  'x-nba-stats-origin': 'stats',
  'x-nba-stats-token': 'true'
};

export class NbaStatsClient {
  private http: AxiosInstance;
  private requestDelayMs: number;
  private maxRetries: number;
  private retryDelayMs: number;
  private errors: ErrorHandler;
  private lastRequestAt = 0;

  constructor(config: NbaStatsClientConfig = {}) {
    this.requestDelayMs = config.requestDelayMs ?? 600;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.errors = config.errorHandler ?? sharedErrorHandler;

    this.http = axios.create({
      baseURL: config.baseURL ?? DEFAULT_NBA_STATS_BASE_URL,
      timeout: config.timeoutMs ?? 30000,
      headers: STATS_HEADERS,
      ...(config.adapter ? { adapter: config.adapter } : {})
    });
  }

  /**
   * Space requests out so the API does not throttle us
   */
  private async throttle(): Promise<void> {
    const wait = this.lastRequestAt + this.requestDelayMs - Date.now();
    if (wait > 0) {
      await new Promise(resolve => setTimeout(resolve, wait));
    }
    this.lastRequestAt = Date.now();
  }

  /**
   * GET an endpoint, retrying API failures with backoff
   */
  private async makeRequest(endpoint: string, params: Record<string, string | number>): Promise<unknown> {
    return this.errors.withRetry(
      async () => {
        await this.throttle();
        try {
          const response = await this.http.get<unknown>(`/${endpoint}`, { params });
          return response.data;
        } catch (error) {
          throw this.errors.wrapError(error);
        }
      },
      { maxRetries: this.maxRetries, delay: this.retryDelayMs }
    );
  }

  /**
   * Team-level game log, newest first
   */
  async fetchTeamGameLog(query: GameFinderQuery = {}): Promise<TeamGameLog> {
    const params: Record<string, string> = {
      LeagueID: '00',
      PlayerOrTeam: 'T'
    };
    if (query.season) params.Season = query.season;
    if (query.dateFrom) params.DateFrom = query.dateFrom;
    if (query.dateTo) params.DateTo = query.dateTo;

    const data = await this.makeRequest('leaguegamefinder', params);
    const records = parseResultSet(data, 'LeagueGameFinderResults');

    const rows = records
      .map(record => ({ entry: toTeamGameLogEntry(record), boxScore: toBoxScoreRow(record) }))
      .filter(row => row.entry.gameId !== '')
      .sort((a, b) =>
        b.entry.gameDate.localeCompare(a.entry.gameDate) || b.entry.gameId.localeCompare(a.entry.gameId)
      );

    console.log(`  ✓ Game finder returned ${rows.length} team-game rows`);
    return {
      entries: rows.map(row => row.entry),
      boxScores: rows.map(row => row.boxScore)
    };
  }

  async fetchPlayByPlay(gameId: string): Promise<RawPlayByPlayRow[]> {
    const data = await this.makeRequest('playbyplayv2', {
      GameID: gameId,
      StartPeriod: 0,
      EndPeriod: 10
    });
    return parseResultSet(data, 'PlayByPlay').map(toPlayByPlayRow);
  }

  async fetchBoxScore(gameId: string): Promise<RawBoxScoreRow[]> {
    const data = await this.makeRequest('boxscoretraditionalv2', {
      GameID: gameId,
      StartPeriod: 0,
      EndPeriod: 10,
      StartRange: 0,
      EndRange: 28800,
      RangeType: 0
    });
    return parseResultSet(data, 'PlayerStats').map(record => toBoxScoreRow(record, gameId));
  }
}
