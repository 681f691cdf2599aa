import type { ExperimentParameters, IdealVectorWeights, ScoringOptions } from './types'

// ─────────────────────────────────────────────────────────────────────────────
// Scoring Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_IDEAL_WEIGHTS: IdealVectorWeights = {
  base: 0.2,
  favoriteBoost: 1.0,
  avoidPenalty: -1.0,
}

export const DEFAULT_ALPHA = 0.5

export const DEFAULT_SCORING_OPTIONS: ScoringOptions = {
  alpha: DEFAULT_ALPHA,
  idealWeights: DEFAULT_IDEAL_WEIGHTS,
}

// ─────────────────────────────────────────────────────────────────────────────
// Evaluation Defaults
// ─────────────────────────────────────────────────────────────────────────────

export interface EvaluationConfig extends ScoringOptions {
  /** Most-sung pitches of a song that become synthetic favorites */
  topFavorites: number
  /** Least-sung pitches of a song that become synthetic avoids */
  bottomAvoids: number
  bootstrapSamples: number
  seed: number
  /** Minimum candidate-set size for a stability baseline or spread profile */
  minCandidates: number
  /** Self-retrieval queries with fewer candidates than this are trivial and skipped */
  selfRetrievalMinCandidates: number
  stabilityBaselines: number
  spreadProfiles: number
}

export const DEFAULT_EVALUATION_CONFIG: EvaluationConfig = {
  ...DEFAULT_SCORING_OPTIONS,
  topFavorites: 4,
  bottomAvoids: 2,
  bootstrapSamples: 10_000,
  seed: 42,
  minCandidates: 10,
  selfRetrievalMinCandidates: 2,
  stabilityBaselines: 5,
  spreadProfiles: 25,
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const COUNT_KEYS = [
  'topFavorites',
  'bottomAvoids',
  'bootstrapSamples',
  'minCandidates',
  'selfRetrievalMinCandidates',
  'stabilityBaselines',
  'spreadProfiles',
] as const satisfies ReadonlyArray<keyof EvaluationConfig>

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ConfigError for non-finite weights or counts that are not positive integers
 * (bottomAvoids may be 0).
 */
export function resolveEvaluationConfig(overrides: Partial<EvaluationConfig> = {}): EvaluationConfig {
  const config: EvaluationConfig = {
    ...DEFAULT_EVALUATION_CONFIG,
    ...overrides,
    idealWeights: { ...DEFAULT_IDEAL_WEIGHTS, ...overrides.idealWeights },
  }

  if (!Number.isFinite(config.alpha)) {
    throw new ConfigError(`alpha must be a finite number, got ${config.alpha}`)
  }
  for (const [key, weight] of Object.entries(config.idealWeights)) {
    if (!Number.isFinite(weight)) {
      throw new ConfigError(`idealWeights.${key} must be a finite number, got ${weight}`)
    }
  }
  if (!Number.isInteger(config.seed)) {
    throw new ConfigError(`seed must be an integer, got ${config.seed}`)
  }
  for (const key of COUNT_KEYS) {
    const value = config[key]
    const min = key === 'bottomAvoids' ? 0 : 1
    if (!Number.isInteger(value) || value < min) {
      throw new ConfigError(`${key} must be an integer >= ${min}, got ${value}`)
    }
  }

  return config
}

/**
 * Parameters block reported with every experiment result.
 */
export function toExperimentParameters(
  config: EvaluationConfig,
  extra: Pick<ExperimentParameters, 'minCandidates' | 'baselines' | 'profiles'> = {}
): ExperimentParameters {
  return {
    alpha: config.alpha,
    topFavorites: config.topFavorites,
    bottomAvoids: config.bottomAvoids,
    bootstrapSamples: config.bootstrapSamples,
    seed: config.seed,
    ...extra,
  }
}
