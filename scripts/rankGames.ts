#!/usr/bin/env tsx

/**
 * Rank recent NBA games by excitement
 * Run with: npm run rank
 *
 * Offline mode scores a single exported game instead of calling the API:
 *   npm run rank -- --pbp pbp.csv --box box.csv [--baseline recent.csv] [--game-id 0022300001]
 */

import * as fs from 'fs';
import * as path from 'path';
import { envValidator } from '../src/config/env';
import { loadScoringConfig } from '../src/config/scoringWeights';
import { GameScoreResult } from '../src/types';
import { GameAnalyzer } from '../src/services/gameAnalyzer';
import { GameRankingService } from '../src/services/gameRankingService';
import { NbaStatsClient } from '../src/services/nba/nbaStatsClient';
import { loadBoxScoreCsv, loadPlayByPlayCsv } from '../src/services/data/csvDataLoader';
import { summarizeByGrade, toResultTable } from '../src/services/resultsTable';

function readFlag(name: string): string | undefined {
  const index = process.argv.indexOf(`--${name}`);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

function scoreOfflineGame(analyzer: GameAnalyzer, pbpPath: string, boxPath: string): GameScoreResult[] {
  const gameId = readFlag('game-id') ?? path.basename(pbpPath, path.extname(pbpPath));
  const baselinePath = readFlag('baseline');

  const playByPlay = loadPlayByPlayCsv(pbpPath);
  const boxScore = loadBoxScoreCsv(boxPath, gameId);
  const baseline = baselinePath ? loadBoxScoreCsv(baselinePath) : [];

  console.log(`  ✓ Loaded ${playByPlay.length} events and ${boxScore.length} player rows`);
  return analyzer.analyzeBatch(
    [{ gameId, gameDate: readFlag('date') ?? '', matchup: readFlag('matchup') ?? gameId, data: { playByPlay, boxScore } }],
    baseline
  );
}

function saveResults(resultsDir: string, results: GameScoreResult[]): string {
  if (!fs.existsSync(resultsDir)) {
    fs.mkdirSync(resultsDir, { recursive: true });
  }
  const filename = `rankings_${new Date().toISOString().slice(0, 10)}.json`;
  const filepath = path.join(resultsDir, filename);
  fs.writeFileSync(filepath, JSON.stringify({ results, table: toResultTable(results) }, null, 2));
  return filepath;
}

async function main() {
  console.log('========================================');
  console.log('NBA Game Excitement Rankings');
  console.log('========================================');

  const env = envValidator.validateAndLoad();
  const scoringConfig = loadScoringConfig(readFlag('config') ?? env.SCORING_CONFIG_PATH);
  const analyzer = new GameAnalyzer(scoringConfig);

  const pbpPath = readFlag('pbp');
  const boxPath = readFlag('box');

  let results: GameScoreResult[];
  if (pbpPath && boxPath) {
    results = scoreOfflineGame(analyzer, pbpPath, boxPath);
  } else {
    const client = new NbaStatsClient({
      baseURL: env.NBA_STATS_BASE_URL,
      requestDelayMs: env.NBA_REQUEST_DELAY_MS,
      timeoutMs: env.NBA_REQUEST_TIMEOUT_MS
    });
    const service = new GameRankingService(client, analyzer);
    results = await service.rankRecentGames({
      season: env.NBA_SEASON,
      maxGames: env.RECENT_GAMES_LIMIT
    });
  }

  if (results.length === 0) {
    console.log('\nNo games found to analyze.');
    return;
  }

  console.log('\n🏀 Rankings');
  console.table(toResultTable(results));

  console.log('\n📈 Grade distribution');
  console.table(summarizeByGrade(results).filter(summary => summary.count > 0));

  const saved = saveResults(env.RESULTS_DIR, results);
  console.log(`\n  ✓ Saved: ${saved}`);
}

main().catch(error => {
  console.error('\n❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
