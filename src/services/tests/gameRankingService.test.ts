import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { GameRankingService, selectBaselineRows, selectUniqueGames } from '../gameRankingService';
import { GameAnalyzer } from '../gameAnalyzer';
import { NbaStatsClient } from '../nba/nbaStatsClient';
import { TeamGameLogEntry } from '../nba/resultSetParser';
import { defaultScoringConfig } from '../../config/scoringWeights';
import { ErrorHandler } from '../../utils/errorHandler';

function entry(gameId: string, matchup: string, gameDate: string = '2024-01-15'): TeamGameLogEntry {
  return { gameId, gameDate, matchup, teamAbbreviation: matchup.slice(0, 3) };
}

describe('selectUniqueGames', () => {
  it('should name each game by its away row', () => {
    const games = selectUniqueGames(
      [entry('2', 'NYK vs. BOS'), entry('2', 'BOS @ NYK'), entry('1', 'LAL @ GSW'), entry('1', 'GSW vs. LAL')],
      10
    );
    expect(games).toEqual([
      { gameId: '2', gameDate: '2024-01-15', matchup: 'BOS @ NYK' },
      { gameId: '1', gameDate: '2024-01-15', matchup: 'LAL @ GSW' }
    ]);
  });

  it('should fall back to all rows when there are no away matchups', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const games = selectUniqueGames([entry('2', 'NYK vs. BOS'), entry('2', 'BOS vs. NYK'), entry('1', 'GSW vs. LAL')], 10);
    expect(games.map(g => g.gameId)).toEqual(['2', '1']);
    vi.restoreAllMocks();
  });

  it('should cap the number of games', () => {
    const games = selectUniqueGames([entry('3', 'A @ B'), entry('2', 'C @ D'), entry('1', 'E @ F')], 2);
    expect(games.map(g => g.gameId)).toEqual(['3', '2']);
  });
});

const FINDER_HEADERS = ['TEAM_ABBREVIATION', 'GAME_ID', 'GAME_DATE', 'MATCHUP', 'FGM', 'FGA', 'FG3M', 'FG3A', 'PTS'];
const PBP_HEADERS = ['EVENTMSGTYPE', 'PERIOD', 'PCTIMESTRING', 'HOMEDESCRIPTION', 'NEUTRALDESCRIPTION', 'VISITORDESCRIPTION', 'SCORE', 'SCOREMARGIN'];
const BOX_HEADERS = ['GAME_ID', 'TEAM_ABBREVIATION', 'PLAYER_NAME', 'FGM', 'FGA', 'FG3M', 'FG3A', 'REB', 'AST', 'PTS'];

const payloads: Record<string, unknown> = {
  leaguegamefinder: {
    resultSets: [{
      name: 'LeagueGameFinderResults',
      headers: FINDER_HEADERS,
      rowSet: [
        ['LAL', '0022300001', '2024-01-14', 'LAL @ GSW', 40, 90, 12, 36, 108],
        ['GSW', '0022300001', '2024-01-14', 'GSW vs. LAL', 41, 88, 14, 38, 110],
        ['BOS', '0022300002', '2024-01-15', 'BOS @ NYK', 42, 85, 15, 40, 115],
        ['NYK', '0022300002', '2024-01-15', 'NYK vs. BOS', 43, 86, 11, 30, 115]
      ]
    }]
  },
  'playbyplayv2:0022300002': {
    resultSets: [{
      name: 'PlayByPlay',
      headers: PBP_HEADERS,
      rowSet: [1, 2, 3, 4].flatMap(period => [
        [12, period, '12:00', null, 'Start of period', null, null, null],
        [1, period, '00:30', 'Layup', null, null, '100 - 100', 'TIE']
      ])
    }]
  },
  'boxscoretraditionalv2:0022300002': {
    resultSets: [{
      name: 'PlayerStats',
      headers: BOX_HEADERS,
      rowSet: [
        ['0022300002', 'BOS', 'Away Star', 14, 25, 5, 10, 6, 4, 38],
        ['0022300002', 'NYK', 'Home Guard', 10, 20, 3, 8, 3, 9, 27]
      ]
    }]
  }
};

function stubAdapter(responses: Record<string, unknown> = payloads) {
  return vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const endpoint = (config.url ?? '').replace(/^\//, '');
    const params: Record<string, unknown> = config.params ?? {};
    const key = params.GameID ? `${endpoint}:${String(params.GameID)}` : endpoint;
    const data = responses[key];
    if (data === undefined) {
      throw new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', config, null, {
        data: {},
        status: 404,
        statusText: 'Not Found',
        headers: {},
        config
      });
    }
    return { data, status: 200, statusText: 'OK', headers: {}, config };
  });
}

describe('selectBaselineRows', () => {
  it('should keep rows of the most recent distinct games only', () => {
    const log = {
      entries: [entry('3', 'A @ B'), entry('3', 'B vs. A'), entry('2', 'C @ D'), entry('1', 'E @ F')],
      boxScores: ['3', '3', '2', '1'].map(gameId => ({
        gameId, playerName: 'team', fgm: 1, fga: 2, fg3m: 1, fg3a: 2, pts: 3
      }))
    };
    expect(selectBaselineRows(log, 2).map(row => row.gameId)).toEqual(['3', '3', '2']);
    expect(selectBaselineRows(log, 0)).toEqual([]);
  });
});

describe('GameRankingService', () => {
  let errors: ErrorHandler;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    errors = new ErrorHandler();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should rank fetched games and keep failed fetches as N/A rows', async () => {
    const adapter = stubAdapter();
    const client = new NbaStatsClient({ requestDelayMs: 0, retryDelayMs: 0, adapter, errorHandler: errors });
    const service = new GameRankingService(client, new GameAnalyzer(defaultScoringConfig, errors), errors);

    const results = await service.rankRecentGames({ season: '2023-24' });

    expect(results.map(r => r.gameId)).toEqual(['0022300002', '0022300001']);
    expect(results[0].matchup).toBe('BOS @ NYK');
    expect(results[0].grade).not.toBe('N/A');
    expect(results[0].marginScore).toBeCloseTo(0.25, 10);
    expect(results[0].starPerformances).toBe(1);
    expect(results[1].grade).toBe('N/A');
    expect(results[1].warnings).toEqual(['game data unavailable']);
    expect(errors.getRecentErrors().map(e => e.context)).toContainEqual({ gameId: '0022300001' });
  });

  it('should fetch games one at a time', async () => {
    const adapter = stubAdapter();
    const client = new NbaStatsClient({ requestDelayMs: 0, retryDelayMs: 0, adapter, errorHandler: errors });
    const service = new GameRankingService(client, new GameAnalyzer(defaultScoringConfig, errors), errors);

    await service.rankRecentGames({ maxGames: 1 });

    expect(adapter.mock.calls.map(([config]) => config.url)).toEqual([
      '/leaguegamefinder',
      '/playbyplayv2',
      '/boxscoretraditionalv2'
    ]);
  });

  it('should build the shooting baseline from the recent window only', async () => {
    const oldSeasonRows = Array.from({ length: 50 }, (_, i) => [
      'LAL', `00214000${String(i).padStart(2, '0')}`, '2015-01-10', 'LAL @ GSW', 30, 60, i === 7 ? 27 : 5, 30, 100
    ]);
    const windowed: Record<string, unknown> = {
      leaguegamefinder: {
        resultSets: [{
          name: 'LeagueGameFinderResults',
          headers: FINDER_HEADERS,
          rowSet: [
            ['BOS', '0022300010', '2024-01-15', 'BOS @ NYK', 40, 80, 10, 30, 110],
            ['NYK', '0022300010', '2024-01-15', 'NYK vs. BOS', 40, 80, 10, 30, 108],
            ...oldSeasonRows
          ]
        }]
      },
      'playbyplayv2:0022300010': payloads['playbyplayv2:0022300002'],
      'boxscoretraditionalv2:0022300010': {
        resultSets: [{
          name: 'PlayerStats',
          headers: BOX_HEADERS,
          rowSet: [
            ['0022300010', 'BOS', 'Away Wing', 9, 20, 5, 15, 4, 2, 24],
            ['0022300010', 'NYK', 'Home Wing', 9, 20, 5, 15, 4, 2, 24]
          ]
        }]
      }
    };
    const client = new NbaStatsClient({ requestDelayMs: 0, retryDelayMs: 0, adapter: stubAdapter(windowed), errorHandler: errors });
    const service = new GameRankingService(client, new GameAnalyzer(defaultScoringConfig, errors), errors);

    const [result] = await service.rankRecentGames({ maxGames: 1 });

    expect(result.gameId).toBe('0022300010');
    expect(result.fg3PctMax).toBeCloseTo(1 / 3, 10);
    expect(result.fg3PctScore).toBeCloseTo(0.05, 10);
  });
});
