/**
 * Externalized weight configuration for the game scoring engine
 * These weights can be tuned without modifying core scoring code
 */

import * as fs from 'fs';
import { GRADE_ORDER, Grade, RegulationPeriod } from '../types';
import { ValidationError } from '../utils/errorHandler';

export type PeriodWeights = Record<RegulationPeriod, number>;

export interface WeightConfig {
  periodWeights: PeriodWeights;
  extraPeriodWeight: number;
  leadChangeWeight: number;
  buzzerBeaterWeight: number;
  fg3PctWeight: number;
  starPerformanceWeight: number;
  marginWeight: number;
  maxTotalScore: number;      // cap for the whole period component
}

export interface GradeThreshold {
  grade: Grade;
  minScore: number;
}

/**
 * Policy constants the scorers take as configuration rather than hard-coding.
 */
export interface ScoringPolicy {
  periodHalfLife: number;         // mean |margin| at which a period's closeness halves
  marginHalfLife: number;         // final |margin| at which the margin closeness halves
  leadChangeReference: number;    // lead changes that earn the full weight
  buzzerBeaterSeconds: number;    // late-clock window for game-deciding shots
  starPointsThreshold: number;
  starReference: number;          // star performances that earn the full weight
  closingWindowSeconds: number;   // window for the average-margin diagnostic
  gradeThresholds: GradeThreshold[];  // highest grade first
}

export interface ScoringConfig {
  weights: WeightConfig;
  policy: ScoringPolicy;
}

/**
 * Default weights; the full period component is capped at maxTotalScore
 */
export const defaultWeights: WeightConfig = {
  periodWeights: { 1: 0.33, 2: 0.33, 3: 0.34, 4: 0 },
  extraPeriodWeight: 0.05,
  leadChangeWeight: 0.05,
  buzzerBeaterWeight: 0.0,
  fg3PctWeight: 0.05,
  starPerformanceWeight: 0.1,
  marginWeight: 0.25,
  maxTotalScore: 0.50
};

export const defaultGradeThresholds: GradeThreshold[] = [
  { grade: 'A+', minScore: 0.93 },
  { grade: 'A', minScore: 0.85 },
  { grade: 'B+', minScore: 0.80 },
  { grade: 'B', minScore: 0.75 },
  { grade: 'C+', minScore: 0.70 },
  { grade: 'C', minScore: 0.65 }
];

export const defaultPolicy: ScoringPolicy = {
  periodHalfLife: 8,
  marginHalfLife: 6,
  leadChangeReference: 12,
  buzzerBeaterSeconds: 24,
  starPointsThreshold: 35,
  starReference: 2,
  closingWindowSeconds: 300,
  gradeThresholds: defaultGradeThresholds
};

export const defaultScoringConfig: ScoringConfig = deepFreeze({
  weights: defaultWeights,
  policy: defaultPolicy
});

export interface WeightValidationResult {
  valid: boolean;
  warnings: string[];
}

/**
 * Validate weights: negative or non-finite values are rejected,
 * sums above 1.0 only produce warnings
 */
export function validateWeightConfig(weights: WeightConfig): WeightValidationResult {
  const entries: Array<[string, number]> = [
    ...Object.entries(weights.periodWeights).map(
      ([period, weight]): [string, number] => [`periodWeights.${period}`, weight]
    ),
    ['extraPeriodWeight', weights.extraPeriodWeight],
    ['leadChangeWeight', weights.leadChangeWeight],
    ['buzzerBeaterWeight', weights.buzzerBeaterWeight],
    ['fg3PctWeight', weights.fg3PctWeight],
    ['starPerformanceWeight', weights.starPerformanceWeight],
    ['marginWeight', weights.marginWeight],
    ['maxTotalScore', weights.maxTotalScore]
  ];

  for (const [name, value] of entries) {
    if (typeof value !== 'number' || !isFinite(value) || value < 0) {
      throw new ValidationError(`Weight ${name} must be a non-negative number`, { name, value });
    }
  }

  const warnings: string[] = [];
  const periodSum = Object.values(weights.periodWeights).reduce((a, b) => a + b, 0);
  if (periodSum > 1.0 + 1e-9) {
    warnings.push(`Period weights sum to ${periodSum.toFixed(2)}, above 1.0`);
  }

  const componentSum =
    weights.maxTotalScore +
    weights.extraPeriodWeight +
    weights.leadChangeWeight +
    weights.buzzerBeaterWeight +
    weights.fg3PctWeight +
    weights.starPerformanceWeight +
    weights.marginWeight;
  if (componentSum > 1.0 + 1e-9) {
    warnings.push(`Component weights sum to ${componentSum.toFixed(2)}, above 1.0`);
  }

  warnings.forEach(w => console.warn(`⚠️ ${w}`));
  return { valid: warnings.length === 0, warnings };
}

export function validatePolicy(policy: ScoringPolicy): void {
  const positive: Array<keyof Omit<ScoringPolicy, 'gradeThresholds'>> = [
    'periodHalfLife',
    'marginHalfLife',
    'leadChangeReference',
    'starReference',
    'starPointsThreshold'
  ];
  for (const key of positive) {
    if (!isFinite(policy[key]) || policy[key] <= 0) {
      throw new ValidationError(`Policy ${key} must be positive`, { value: policy[key] });
    }
  }
  if (policy.buzzerBeaterSeconds < 0 || policy.closingWindowSeconds < 0) {
    throw new ValidationError('Clock windows cannot be negative');
  }

  // Cut-offs and grades both descend
  const thresholds = policy.gradeThresholds;
  for (let i = 1; i < thresholds.length; i++) {
    if (thresholds[i].minScore >= thresholds[i - 1].minScore) {
      throw new ValidationError('Grade thresholds must be strictly descending', {
        grade: thresholds[i].grade,
        minScore: thresholds[i].minScore
      });
    }
    if (GRADE_ORDER.indexOf(thresholds[i].grade) <= GRADE_ORDER.indexOf(thresholds[i - 1].grade)) {
      throw new ValidationError('Grade thresholds must list each grade once, best grade first', {
        grade: thresholds[i].grade,
        previous: thresholds[i - 1].grade
      });
    }
  }
}

export interface ScoringConfigOverrides {
  weights?: Partial<Omit<WeightConfig, 'periodWeights'>> & {
    periodWeights?: Partial<PeriodWeights>;
  };
  policy?: Partial<ScoringPolicy>;
}

export function mergeScoringConfig(
  overrides: ScoringConfigOverrides,
  base: ScoringConfig = defaultScoringConfig
): ScoringConfig {
  const { periodWeights, ...weightOverrides } = overrides.weights ?? {};
  const config: ScoringConfig = {
    weights: {
      ...base.weights,
      ...weightOverrides,
      periodWeights: { ...base.weights.periodWeights, ...periodWeights }
    },
    policy: {
      ...base.policy,
      ...overrides.policy,
      gradeThresholds: (overrides.policy?.gradeThresholds ?? base.policy.gradeThresholds).map(t => ({ ...t }))
    }
  };

  validateWeightConfig(config.weights);
  validatePolicy(config.policy);
  return deepFreeze(config);
}

/**
 * Load JSON overrides if a path is given; read once at start-up.
 */
export function loadScoringConfig(configPath?: string): ScoringConfig {
  if (!configPath) {
    return defaultScoringConfig;
  }

  if (!fs.existsSync(configPath)) {
    throw new ValidationError(`Scoring config not found: ${configPath}`);
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  const overrides = readOverrides(parsed, configPath);

  console.log(`Loaded scoring config from ${configPath}`);
  return mergeScoringConfig(overrides);
}

const WEIGHT_KEYS = [
  'extraPeriodWeight',
  'leadChangeWeight',
  'buzzerBeaterWeight',
  'fg3PctWeight',
  'starPerformanceWeight',
  'marginWeight',
  'maxTotalScore'
] as const;

const POLICY_KEYS = [
  'periodHalfLife',
  'marginHalfLife',
  'leadChangeReference',
  'buzzerBeaterSeconds',
  'starPointsThreshold',
  'starReference',
  'closingWindowSeconds'
] as const;

const GRADES: readonly Grade[] = ['A+', 'A', 'B+', 'B', 'C+', 'C', 'D'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(source: Record<string, unknown>, key: string, file: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new ValidationError(`Invalid ${key} in ${file}: expected a number`, { value });
  }
  return value;
}

function readOverrides(raw: unknown, file: string): ScoringConfigOverrides {
  if (!isRecord(raw)) {
    throw new ValidationError(`Scoring config must be a JSON object: ${file}`);
  }

  const overrides: ScoringConfigOverrides = {};

  if (raw.weights !== undefined) {
    if (!isRecord(raw.weights)) {
      throw new ValidationError(`Invalid weights section in ${file}`);
    }
    const source = raw.weights;
    const weights: NonNullable<ScoringConfigOverrides['weights']> = {};
    for (const key of WEIGHT_KEYS) {
      const value = readNumber(source, key, file);
      if (value !== undefined) weights[key] = value;
    }
    if (source.periodWeights !== undefined) {
      if (!isRecord(source.periodWeights)) {
        throw new ValidationError(`Invalid periodWeights section in ${file}`);
      }
      const periods = source.periodWeights;
      const periodWeights: Partial<PeriodWeights> = {};
      for (const period of [1, 2, 3, 4] as const) {
        const value = readNumber(periods, String(period), file);
        if (value !== undefined) periodWeights[period] = value;
      }
      weights.periodWeights = periodWeights;
    }
    overrides.weights = weights;
  }

  if (raw.policy !== undefined) {
    if (!isRecord(raw.policy)) {
      throw new ValidationError(`Invalid policy section in ${file}`);
    }
    const source = raw.policy;
    const policy: Partial<ScoringPolicy> = {};
    for (const key of POLICY_KEYS) {
      const value = readNumber(source, key, file);
      if (value !== undefined) policy[key] = value;
    }
    if (source.gradeThresholds !== undefined) {
      policy.gradeThresholds = readGradeThresholds(source.gradeThresholds, file);
    }
    overrides.policy = policy;
  }

  return overrides;
}

function readGradeThresholds(raw: unknown, file: string): GradeThreshold[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError(`gradeThresholds in ${file} must be an array`);
  }
  return raw.map((entry: unknown) => {
    if (!isRecord(entry)) {
      throw new ValidationError(`Invalid grade threshold in ${file}`, { entry });
    }
    const grade = GRADES.find(g => g === entry.grade);
    const minScore = readNumber(entry, 'minScore', file);
    if (!grade || minScore === undefined) {
      throw new ValidationError(`Invalid grade threshold in ${file}`, { entry });
    }
    return { grade, minScore };
  });
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    Object.values(value).forEach(child => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
}
