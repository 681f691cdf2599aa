import type { ExperimentRecord, SelfRetrievalOutcome, Song } from '../domain/types'
import {
  DEFAULT_EVALUATION_CONFIG,
  toExperimentParameters,
  type EvaluationConfig,
} from '../domain/config'
import { deriveSyntheticProfile } from './syntheticProfile'
import { filterByRange, scoreSongs } from './scoringEngine'
import { buildIdealVectorForProfile } from './idealProfile'
import { createRng, estimateMean, type ExperimentRunOptions } from './bootstrap'

const EXPERIMENT = 'RQ1_self_retrieval_accuracy'

/**
 * Self-retrieval accuracy: derive a profile from each song and check where
 * that song lands when the library is ranked against its own profile.
 *
 * Reports HR@1, HR@3, HR@5 and MRR with bootstrap 95% CIs. Songs without
 * range or tessituragram data, queries with fewer than
 * `selfRetrievalMinCandidates` candidates, and queries whose song is missing
 * from its own ranking are skipped and counted.
 */
export function runSelfRetrieval(
  songs: readonly Song[],
  config: EvaluationConfig = DEFAULT_EVALUATION_CONFIG,
  options: ExperimentRunOptions = {}
): SelfRetrievalOutcome {
  const rng = options.rng ?? createRng(config.seed)
  const parameters = toExperimentParameters(config, {
    minCandidates: config.selfRetrievalMinCandidates,
  })

  const records: ExperimentRecord[] = []
  let skippedMissingData = 0
  let skippedTooFewCandidates = 0
  let skippedNotRetrieved = 0

  for (const song of songs) {
    const profile = deriveSyntheticProfile(song, config)
    if (!profile) {
      skippedMissingData++
      continue
    }

    const candidates = filterByRange(songs, profile.rangeMin, profile.rangeMax)
    if (candidates.length < config.selfRetrievalMinCandidates) {
      skippedTooFewCandidates++
      continue
    }

    const ranking = scoreSongs(
      candidates,
      buildIdealVectorForProfile(profile, config.idealWeights),
      profile.rangeMin,
      profile.rangeMax,
      profile.avoids,
      profile.favorites,
      config.alpha
    )

    const hit = ranking.find((result) => result.filename === song.filename)
    if (!hit) {
      skippedNotRetrieved++
      continue
    }

    records.push({
      filename: song.filename,
      composer: song.composer,
      title: song.title,
      rank: hit.rank,
      hitAt1: hit.rank === 1 ? 1 : 0,
      hitAt3: hit.rank <= 3 ? 1 : 0,
      hitAt5: hit.rank <= 5 ? 1 : 0,
      reciprocalRank: 1 / hit.rank,
    })
  }

  options.onProgress?.(`${EXPERIMENT}: ${records.length} of ${songs.length} queries ranked`)

  if (records.length === 0) {
    return {
      status: 'insufficient_data',
      experiment: EXPERIMENT,
      error: 'No song produced a valid self-retrieval query.',
      parameters,
      dataSummary: { totalSongs: songs.length, eligibleSongs: songs.length - skippedMissingData },
    }
  }

  const samples = config.bootstrapSamples
  return {
    status: 'ok',
    experiment: EXPERIMENT,
    description:
      'When a synthetic user profile is derived from one song, does the system rank that song at position 1 or in the top 3/5?',
    parameters,
    dataSummary: {
      totalSongs: songs.length,
      validQueries: records.length,
      songsSkipped: songs.length - records.length,
      skippedMissingData,
      skippedTooFewCandidates,
      skippedNotRetrieved,
    },
    metrics: {
      hrAt1: estimateMean(records.map((r) => r.hitAt1), rng, samples),
      hrAt3: estimateMean(records.map((r) => r.hitAt3), rng, samples),
      hrAt5: estimateMean(records.map((r) => r.hitAt5), rng, samples),
      mrr: estimateMean(records.map((r) => r.reciprocalRank), rng, samples),
    },
    perQuery: records,
  }
}
