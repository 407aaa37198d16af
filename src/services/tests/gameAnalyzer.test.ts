import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GameAnalyzer, BatchGame } from '../gameAnalyzer';
import { buildShootingBaseline } from '../scoring';
import { defaultScoringConfig, defaultWeights } from '../../config/scoringWeights';
import { ErrorHandler } from '../../utils/errorHandler';
import { GameInfo, RawPlayByPlayRow } from '../../types';
import { pbpRow, playerLine, seededRandom, tiedGameRows } from './fixtures';

const GAME: GameInfo = { gameId: 'game-1', gameDate: '2024-01-15', matchup: 'BOS @ NYK' };

const BOX = [
  playerLine('Guard', { fgm: 4, fga: 8, fg3m: 1, fg3a: 4, pts: 20 }),
  playerLine('Forward', { fgm: 4, fga: 8, fg3m: 1, fg3a: 4, pts: 20 })
];

const BASELINE_ROWS = [playerLine('Earlier Game', { gameId: 'g-prev', fg3m: 5, fg3a: 10 })];

describe('GameAnalyzer', () => {
  let errors: ErrorHandler;
  let analyzer: GameAnalyzer;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    errors = new ErrorHandler();
    analyzer = new GameAnalyzer(defaultScoringConfig, errors);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('analyze', () => {
    it('should grade a game without play-by-play as N/A', () => {
      const result = analyzer.analyze(GAME, { playByPlay: [], boxScore: BOX }, buildShootingBaseline([]));

      expect(result.grade).toBe('N/A');
      expect(result.totalScore).toBe(0);
      expect(result.periodScore).toBe(0);
      expect(result.marginScore).toBe(0);
      expect(result.warnings).toEqual(['play-by-play unavailable']);
      expect(errors.getRecentErrors()[0].context).toEqual({ gameId: 'game-1' });
    });

    it('should score a tied game from every component', () => {
      const result = analyzer.analyze(
        GAME,
        { playByPlay: tiedGameRows(), boxScore: BOX },
        buildShootingBaseline(BASELINE_ROWS)
      );

      expect(result.periodScore).toBeCloseTo(0.5, 10);
      expect(result.extraPeriodScore).toBe(0);
      expect(result.leadChangeScore).toBe(0);
      expect(result.buzzerBeaterScore).toBe(0);
      expect(result.fg3PctScore).toBeCloseTo(0.025, 10);
      expect(result.marginScore).toBeCloseTo(0.25, 10);
      expect(result.starPerformanceScore).toBe(0);
      expect(result.totalScore).toBeCloseTo(0.775, 10);
      expect(result.grade).toBe('B');
      expect(result.maxPoints).toBe(20);
      expect(result.fg3PctMax).toBe(0.5);
      expect(result.warnings).toEqual([]);
    });

    it('should zero margin, star and shooting maxima when the box score is empty', () => {
      const result = analyzer.analyze(
        GAME,
        { playByPlay: tiedGameRows(), boxScore: [] },
        buildShootingBaseline(BASELINE_ROWS)
      );

      expect(result.marginScore).toBe(0);
      expect(result.starPerformanceScore).toBe(0);
      expect(result.fgPctMax).toBe(0);
      expect(result.fg3PctMax).toBe(0);
      expect(result.periodScore).toBeCloseTo(0.5, 10);
      expect(result.grade).toBe('D');
      expect(result.warnings).toEqual(['margin/star unavailable: box score is empty']);
      expect(console.warn).toHaveBeenCalled();
    });

    it('should return frozen results', () => {
      const result = analyzer.analyze(GAME, { playByPlay: tiedGameRows(), boxScore: BOX }, buildShootingBaseline([]));
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should keep every component within its weight and sum to the total', () => {
      const random = seededRandom(42);
      const { weights } = defaultScoringConfig;

      for (let trial = 0; trial < 50; trial++) {
        const rows: RawPlayByPlayRow[] = [];
        const periods = 4 + Math.floor(random() * 3);
        for (let period = 1; period <= periods; period++) {
          for (let i = 0; i < 6; i++) {
            const margin = Math.round((random() - 0.5) * 30);
            const seconds = Math.floor(random() * 720);
            const clock = `${Math.floor(seconds / 60)}:${String(seconds % 60).padStart(2, '0')}`;
            rows.push(pbpRow(period, random() < 0.2 ? null : margin, clock));
          }
        }
        const box = [
          playerLine('A', { fgm: 8, fga: 17, fg3m: 2, fg3a: 6, pts: Math.floor(random() * 50), reb: 11, ast: 4 }),
          playerLine('B', { fgm: 5, fga: 12, fg3m: 3, fg3a: 5, pts: Math.floor(random() * 50) })
        ];

        const result = analyzer.analyze(GAME, { playByPlay: rows, boxScore: box }, buildShootingBaseline(BASELINE_ROWS));
        const components = [
          result.periodScore,
          result.extraPeriodScore,
          result.leadChangeScore,
          result.buzzerBeaterScore,
          result.fg3PctScore,
          result.starPerformanceScore,
          result.marginScore
        ];

        expect(result.totalScore).toBeCloseTo(components.reduce((a, b) => a + b, 0), 10);
        expect(result.periodScore).toBeLessThanOrEqual(weights.maxTotalScore + 1e-12);
        expect(result.extraPeriodScore).toBeLessThanOrEqual(weights.extraPeriodWeight);
        expect(result.leadChangeScore).toBeLessThanOrEqual(weights.leadChangeWeight);
        expect(result.fg3PctScore).toBeLessThanOrEqual(weights.fg3PctWeight);
        expect(result.starPerformanceScore).toBeLessThanOrEqual(weights.starPerformanceWeight);
        expect(result.marginScore).toBeLessThanOrEqual(weights.marginWeight);
        components.forEach(value => expect(value).toBeGreaterThanOrEqual(0));
      }
    });

    it('should follow custom weights', () => {
      const custom = new GameAnalyzer(
        { ...defaultScoringConfig, weights: { ...defaultWeights, marginWeight: 0.4 } },
        errors
      );
      const result = custom.analyze(GAME, { playByPlay: tiedGameRows(), boxScore: BOX }, buildShootingBaseline([]));
      expect(result.marginScore).toBeCloseTo(0.4, 10);
    });
  });

  describe('analyzeBatch', () => {
    it('should keep a row for every game even when one fails', () => {
      const games: BatchGame[] = [
        { ...GAME, data: { playByPlay: tiedGameRows(), boxScore: BOX } },
        { gameId: 'game-2', gameDate: '2024-01-14', matchup: 'LAL @ GSW', data: null },
        { gameId: 'game-3', gameDate: '2024-01-13', matchup: 'MIA @ CHI', data: { playByPlay: tiedGameRows(), boxScore: BOX } }
      ];
      const original = analyzer.analyze.bind(analyzer);
      vi.spyOn(analyzer, 'analyze').mockImplementation((game, data, baseline) => {
        if (game.gameId === 'game-3') throw new Error('corrupt table');
        return original(game, data, baseline);
      });

      const results = analyzer.analyzeBatch(games, BASELINE_ROWS);

      expect(results.map(r => r.grade)).toEqual(['B', 'N/A', 'N/A']);
      expect(results[1].warnings).toEqual(['game data unavailable']);
      expect(results[2].warnings).toEqual(['analysis failed']);
      expect(errors.getRecentErrors().at(-1)?.context).toEqual({ gameId: 'game-3' });
    });

    it('should share one baseline across the batch', () => {
      const games: BatchGame[] = [
        { ...GAME, data: { playByPlay: tiedGameRows(), boxScore: BOX } },
        { ...GAME, gameId: 'game-2', data: { playByPlay: tiedGameRows(), boxScore: BOX } }
      ];
      const results = analyzer.analyzeBatch(games, BASELINE_ROWS);
      expect(results[0].fg3PctScore).toBe(results[1].fg3PctScore);
    });
  });
});
