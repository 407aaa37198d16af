import { config as loadDotenv } from 'dotenv';
import { ValidationError } from '../utils/errorHandler';

interface EnvConfig {
  NBA_STATS_BASE_URL: string;
  NBA_REQUEST_DELAY_MS: number;
  NBA_REQUEST_TIMEOUT_MS: number;
  RECENT_GAMES_LIMIT: number;
  NBA_SEASON?: string;
  SCORING_CONFIG_PATH?: string;
  RESULTS_DIR: string;
}

export const DEFAULT_NBA_STATS_BASE_URL = 'https://stats.nba.com/stats';

class EnvValidator {
  private config: EnvConfig | null = null;

  /**
   * Read .env.local then .env (dotenv never overrides variables already set)
   * and validate once; later calls return the cached config.
   */
  validateAndLoad(env: NodeJS.ProcessEnv = process.env, loadFiles: boolean = true): EnvConfig {
    if (this.config) return this.config;

    if (loadFiles) {
      loadDotenv({ path: '.env.local' });
      loadDotenv();
    }

    const warnings: string[] = [];
    const season = env.NBA_SEASON?.trim() || undefined;
    if (season && !/^\d{4}-\d{2}$/.test(season)) {
      throw new ValidationError(`NBA_SEASON must look like 2023-24, got "${season}"`);
    }
    if (!season) {
      warnings.push('NBA_SEASON not set. The game finder will return games across all seasons.');
    }

    if (env.NODE_ENV === 'development' && warnings.length > 0) {
      console.warn('⚠️ Environment Configuration Warnings:');
      warnings.forEach(w => console.warn(`  - ${w}`));
      console.warn('Create a .env.local file based on .env.example to configure these features.');
    }

    this.config = {
      NBA_STATS_BASE_URL: env.NBA_STATS_BASE_URL || DEFAULT_NBA_STATS_BASE_URL,
      NBA_REQUEST_DELAY_MS: readInteger(env, 'NBA_REQUEST_DELAY_MS', 600),
      NBA_REQUEST_TIMEOUT_MS: readInteger(env, 'NBA_REQUEST_TIMEOUT_MS', 30000),
      RECENT_GAMES_LIMIT: readInteger(env, 'RECENT_GAMES_LIMIT', 20),
      NBA_SEASON: season,
      SCORING_CONFIG_PATH: env.SCORING_CONFIG_PATH || undefined,
      RESULTS_DIR: env.RESULTS_DIR || 'results'
    };

    return this.config;
  }

  get<K extends keyof EnvConfig>(key: K): EnvConfig[K] {
    return this.validateAndLoad()[key];
  }

  reset(): void {
    this.config = null;
  }
}

function readInteger(env: NodeJS.ProcessEnv, key: string, defaultValue: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return defaultValue;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export const envValidator = new EnvValidator();
export type { EnvConfig };
