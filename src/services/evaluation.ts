import type {
  RankingStabilityOutcome,
  ScoreSpreadOutcome,
  SelfRetrievalOutcome,
  Song,
} from '../domain/types'
import { resolveEvaluationConfig, type EvaluationConfig } from '../domain/config'
import { createRng } from './bootstrap'
import { runSelfRetrieval } from './selfRetrieval'
import { runRankingStability } from './rankingStability'
import { runScoreSpread } from './scoreSpread'

export interface EvaluationReport {
  config: EvaluationConfig
  selfRetrieval: SelfRetrievalOutcome
  rankingStability: RankingStabilityOutcome
  scoreSpread: ScoreSpreadOutcome
}

/**
 * Run all three protocols over one library. Each protocol gets its own generator
 * seeded from config.seed, so their resampling is independent of run order.
 */
export function runAllExperiments(
  songs: readonly Song[],
  overrides: Partial<EvaluationConfig> = {},
  onProgress?: (message: string) => void
): EvaluationReport {
  const config = resolveEvaluationConfig(overrides)

  return {
    config,
    selfRetrieval: runSelfRetrieval(songs, config, { rng: createRng(config.seed), onProgress }),
    rankingStability: runRankingStability(songs, config, {
      rng: createRng(config.seed),
      onProgress,
    }),
    scoreSpread: runScoreSpread(songs, config, { rng: createRng(config.seed), onProgress }),
  }
}
