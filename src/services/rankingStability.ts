import type {
  BaselineSummary,
  PerturbationRecord,
  PerturbationType,
  PitchIndex,
  RankingStabilityOutcome,
  RangedSong,
  ScoredResult,
  Song,
  SyntheticProfile,
} from '../domain/types'
import {
  DEFAULT_EVALUATION_CONFIG,
  toExperimentParameters,
  type EvaluationConfig,
} from '../domain/config'
import { selectProfiles } from './syntheticProfile'
import { scoreSongs } from './scoringEngine'
import { buildIdealVector } from './idealProfile'
import { createRng, bootstrapMeanCI, type ExperimentRunOptions } from './bootstrap'
import { kendallTauB, mean, populationStd, roundTo, sampleStd } from './statistics'
import { midiToNoteName } from './noteUtils'

const EXPERIMENT = 'RQ2_ranking_stability'

export interface Perturbation {
  type: PerturbationType
  midi: PitchIndex
  favorites: PitchIndex[]
  avoids: PitchIndex[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Perturbations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Enumerate every one-note change to a profile's favorites or avoids, range unchanged:
 * add each in-range non-favorite to favorites, remove each favorite, add each in-range
 * pitch that is neither favorite nor avoid to avoids, remove each avoid.
 */
export function enumeratePerturbations(profile: SyntheticProfile): Perturbation[] {
  const { rangeMin, rangeMax, favorites, avoids } = profile
  const perturbations: Perturbation[] = []
  const inRange = Array.from({ length: rangeMax - rangeMin + 1 }, (_, i) => rangeMin + i)

  for (const midi of inRange) {
    if (!favorites.includes(midi)) {
      perturbations.push({ type: 'add_favorite', midi, favorites: [...favorites, midi], avoids })
    }
  }
  favorites.forEach((midi, i) => {
    const without = [...favorites.slice(0, i), ...favorites.slice(i + 1)]
    perturbations.push({ type: 'remove_favorite', midi, favorites: without, avoids })
  })
  for (const midi of inRange) {
    if (!avoids.includes(midi) && !favorites.includes(midi)) {
      perturbations.push({ type: 'add_avoid', midi, favorites, avoids: [...avoids, midi] })
    }
  }
  avoids.forEach((midi, i) => {
    const without = [...avoids.slice(0, i), ...avoids.slice(i + 1)]
    perturbations.push({ type: 'remove_avoid', midi, favorites, avoids: without })
  })

  return perturbations
}

// ─────────────────────────────────────────────────────────────────────────────
// Rank Agreement
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kendall's tau-b between two rankings of the same songs, compared by rank per filename.
 * Songs missing from either ranking are left out of the comparison.
 */
export function rankingAgreement(
  baseline: readonly ScoredResult[],
  perturbed: readonly ScoredResult[]
): number {
  const perturbedRanks = new Map(perturbed.map((result) => [result.filename, result.rank]))
  const x: number[] = []
  const y: number[] = []
  for (const result of baseline) {
    const rank = perturbedRanks.get(result.filename)
    if (rank === undefined) continue
    x.push(result.rank)
    y.push(rank)
  }
  return kendallTauB(x, y)
}

function rankProfile(
  candidates: readonly RangedSong[],
  profile: SyntheticProfile,
  favorites: readonly PitchIndex[],
  avoids: readonly PitchIndex[],
  config: EvaluationConfig
): ScoredResult[] {
  const ideal = buildIdealVector(
    profile.rangeMin,
    profile.rangeMax,
    favorites,
    avoids,
    config.idealWeights
  )
  return scoreSongs(
    candidates,
    ideal,
    profile.rangeMin,
    profile.rangeMax,
    avoids,
    favorites,
    config.alpha
  )
}

// ─────────────────────────────────────────────────────────────────────────────
// Experiment
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ranking stability under one-note preference changes.
 *
 * Baselines are the first `stabilityBaselines` eligible songs whose range admits at
 * least `minCandidates` songs. Each perturbation's ranking is compared to the
 * baseline ranking with Kendall's tau-b.
 */
export function runRankingStability(
  songs: readonly Song[],
  config: EvaluationConfig = DEFAULT_EVALUATION_CONFIG,
  options: ExperimentRunOptions = {}
): RankingStabilityOutcome {
  const rng = options.rng ?? createRng(config.seed)
  const parameters = toExperimentParameters(config, {
    minCandidates: config.minCandidates,
    baselines: config.stabilityBaselines,
  })

  const { selected, skippedMissingData } = selectProfiles(
    songs,
    config.stabilityBaselines,
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

  const allTaus: number[] = []
  const perPerturbation: PerturbationRecord[] = []
  const baselineProfiles: BaselineSummary[] = []

  for (const { song, profile, candidates } of selected) {
    const baseline = rankProfile(candidates, profile, profile.favorites, profile.avoids, config)
    const taus: number[] = []

    for (const perturbation of enumeratePerturbations(profile)) {
      const perturbed = rankProfile(
        candidates,
        profile,
        perturbation.favorites,
        perturbation.avoids,
        config
      )
      const tau = rankingAgreement(baseline, perturbed)
      taus.push(tau)
      perPerturbation.push({
        perturbationType: perturbation.type,
        midiChanged: perturbation.midi,
        noteChanged: midiToNoteName(perturbation.midi),
        tau: roundTo(tau, 4),
        baselineSource: song.filename,
      })
    }

    allTaus.push(...taus)
    baselineProfiles.push({
      sourceSong: song.filename,
      composer: song.composer,
      candidateCount: candidates.length,
      perturbationCount: taus.length,
      meanTau: roundTo(mean(taus), 4),
    })
    options.onProgress?.(`${EXPERIMENT}: baseline ${song.filename}, ${taus.length} perturbations`)
  }

  const [lo, hi] = bootstrapMeanCI(allTaus, rng, config.bootstrapSamples)
  const baselineMeans = baselineProfiles.map((b) => b.meanTau)

  return {
    status: 'ok',
    experiment: EXPERIMENT,
    description:
      "When favorites or avoids change by one note, how similar is the new ranking to the original? (Kendall's tau-b)",
    parameters,
    baselineProfiles,
    dataSummary: {
      totalSongs: songs.length,
      skippedMissingData,
      baselines: selected.length,
      totalPerturbations: allTaus.length,
    },
    metrics: {
      meanTau: roundTo(mean(allTaus), 4),
      stdTau: roundTo(sampleStd(allTaus), 4),
      ci95: [roundTo(lo, 4), roundTo(hi, 4)],
      meanTauPerBaseline: roundTo(mean(baselineMeans), 4),
      stdTauAcrossBaselines: roundTo(populationStd(baselineMeans), 4),
    },
    perPerturbation,
  }
}
