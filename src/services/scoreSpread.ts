import type { CorrelationSummary, RunRecord, ScoreSpreadOutcome, Song } from '../domain/types'
import {
  DEFAULT_EVALUATION_CONFIG,
  toExperimentParameters,
  type EvaluationConfig,
} from '../domain/config'
import { selectProfiles } from './syntheticProfile'
import { scoreSongs } from './scoringEngine'
import { buildIdealVectorForProfile } from './idealProfile'
import {
  createRng,
  bootstrapMeanCI,
  type ExperimentRunOptions,
  type RandomSource,
} from './bootstrap'
import { mean, pearsonCorrelation, range, roundTo, sampleStd, sampleVariance } from './statistics'

const EXPERIMENT = 'RQ3_score_spread_internal_validity'

function summarizeCorrelation(
  values: readonly number[],
  expectedSign: CorrelationSummary['expectedSign'],
  rng: RandomSource,
  samples: number
): CorrelationSummary {
  const [lo, hi] = bootstrapMeanCI(values, rng, samples)
  return {
    mean: roundTo(mean(values), 4),
    ci95: [roundTo(lo, 4), roundTo(hi, 4)],
    expectedSign,
  }
}

/**
 * Score spread and internal validity.
 *
 * For up to `spreadProfiles` synthetic profiles with at least `minCandidates`
 * candidates, measures how far final scores spread (variance, range) and whether
 * the score components correlate as the formula implies: final score with cosine
 * similarity (positive), final score with avoid penalty (negative), cosine
 * similarity with favorite overlap (positive).
 */
export function runScoreSpread(
  songs: readonly Song[],
  config: EvaluationConfig = DEFAULT_EVALUATION_CONFIG,
  options: ExperimentRunOptions = {}
): ScoreSpreadOutcome {
  const rng = options.rng ?? createRng(config.seed)
  const parameters = toExperimentParameters(config, {
    minCandidates: config.minCandidates,
    profiles: config.spreadProfiles,
  })

  const { selected, skippedMissingData } = selectProfiles(
    songs,
    config.spreadProfiles,
    config.minCandidates,
    config
  )

  if (selected.length === 0) {
    return {
      status: 'insufficient_data',
      experiment: EXPERIMENT,
      error: `No song yielded >= ${config.minCandidates} candidates. Library too small.`,
      parameters,
      dataSummary: { totalSongs: songs.length, eligibleSongs: songs.length - skippedMissingData },
    }
  }

  const perRun: RunRecord[] = selected.map(({ song, profile, candidates }) => {
    const results = scoreSongs(
      candidates,
      buildIdealVectorForProfile(profile, config.idealWeights),
      profile.rangeMin,
      profile.rangeMax,
      profile.avoids,
      profile.favorites,
      config.alpha
    )

    const finalScores = results.map((r) => r.finalScore)
    const cosines = results.map((r) => r.cosineSimilarity)
    const avoidPenalties = results.map((r) => r.avoidPenalty)
    const favoriteOverlaps = results.map((r) => r.favoriteOverlap)

    return {
      sourceSong: song.filename,
      composer: song.composer,
      songCount: results.length,
      varianceFinalScore: roundTo(sampleVariance(finalScores), 6),
      rangeFinalScore: roundTo(range(finalScores), 4),
      rFinalCosine: roundTo(pearsonCorrelation(finalScores, cosines), 4),
      rFinalAvoid: roundTo(pearsonCorrelation(finalScores, avoidPenalties), 4),
      rCosineFavoriteOverlap: roundTo(pearsonCorrelation(cosines, favoriteOverlaps), 4),
    }
  })
  options.onProgress?.(`${EXPERIMENT}: ${perRun.length} profiles scored`)

  const variances = perRun.map((r) => r.varianceFinalScore)
  const ranges = perRun.map((r) => r.rangeFinalScore)
  const samples = config.bootstrapSamples

  // Resampling order: variance, range, then the three correlations
  const [varianceLo, varianceHi] = bootstrapMeanCI(variances, rng, samples)
  const [rangeLo, rangeHi] = bootstrapMeanCI(ranges, rng, samples)
  const finalScoreCosine = summarizeCorrelation(
    perRun.map((r) => r.rFinalCosine),
    'positive',
    rng,
    samples
  )
  const finalScoreAvoidPenalty = summarizeCorrelation(
    perRun.map((r) => r.rFinalAvoid),
    'negative',
    rng,
    samples
  )
  const cosineFavoriteOverlap = summarizeCorrelation(
    perRun.map((r) => r.rCosineFavoriteOverlap),
    'positive',
    rng,
    samples
  )

  return {
    status: 'ok',
    experiment: EXPERIMENT,
    description:
      '(a) Spread of final_score (variance, range). (b) Internal validity: correlations between score parts and final_score.',
    parameters,
    dataSummary: {
      totalSongs: songs.length,
      skippedMissingData,
      profiles: perRun.length,
    },
    metrics: {
      spread: {
        meanVariance: roundTo(mean(variances), 6),
        stdVariance: roundTo(sampleStd(variances), 6),
        ci95Variance: [roundTo(varianceLo, 6), roundTo(varianceHi, 6)],
        meanRange: roundTo(mean(ranges), 4),
        stdRange: roundTo(sampleStd(ranges), 4),
        ci95Range: [roundTo(rangeLo, 4), roundTo(rangeHi, 4)],
      },
      correlations: { finalScoreCosine, finalScoreAvoidPenalty, cosineFavoriteOverlap },
    },
    perRun,
  }
}
