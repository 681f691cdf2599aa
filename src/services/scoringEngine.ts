import type {
  DenseVector,
  PitchIndex,
  RangedSong,
  ScoredResult,
  ScoringOptions,
  Song,
  UserProfile,
} from '../domain/types'
import { DEFAULT_SCORING_OPTIONS } from '../domain/config'
import { buildDenseVector, cosineSimilarity, normalizeL1, sumAtPitches } from './vectorSpace'
import { buildIdealVectorForProfile } from './idealProfile'
import { generateExplanation } from './explanation'
import { roundTo } from './statistics'

// Precision of stored score components; ranking uses the rounded values
const SCORE_DECIMALS = 4

// ─────────────────────────────────────────────────────────────────────────────
// Filtering
// ─────────────────────────────────────────────────────────────────────────────

export function hasPitchRange(song: Song): song is RangedSong {
  return song.statistics.pitchRange !== null
}

/**
 * Keep songs whose whole range lies inside [rangeMin, rangeMax].
 * Songs without range data are dropped. Returns a new array in input order.
 */
export function filterByRange(
  songs: readonly Song[],
  rangeMin: PitchIndex,
  rangeMax: PitchIndex
): RangedSong[] {
  return songs
    .filter(hasPitchRange)
    .filter(
      (song) =>
        song.statistics.pitchRange.minMidi >= rangeMin &&
        song.statistics.pitchRange.maxMidi <= rangeMax
    )
}

// ─────────────────────────────────────────────────────────────────────────────
// Scoring
// ─────────────────────────────────────────────────────────────────────────────

interface ScoreComponents {
  finalScore: number
  cosineSimilarity: number
  avoidPenalty: number
  favoriteOverlap: number
}

/**
 * Score one song against the ideal vector.
 * The song's tessituragram is L1-normalized so every component is a proportion of singing time.
 */
function scoreSong(
  song: Song,
  ideal: DenseVector,
  rangeMin: PitchIndex,
  rangeMax: PitchIndex,
  avoids: readonly PitchIndex[],
  favorites: readonly PitchIndex[],
  alpha: number
): ScoreComponents {
  const normed = normalizeL1(buildDenseVector(song.tessituragram, rangeMin, rangeMax))

  const cosine = cosineSimilarity(normed, ideal)
  const avoidPenalty = sumAtPitches(normed, avoids, rangeMin)
  const favoriteOverlap = sumAtPitches(normed, favorites, rangeMin)

  return {
    finalScore: roundTo(cosine - alpha * avoidPenalty, SCORE_DECIMALS),
    cosineSimilarity: roundTo(cosine, SCORE_DECIMALS),
    avoidPenalty: roundTo(avoidPenalty, SCORE_DECIMALS),
    favoriteOverlap: roundTo(favoriteOverlap, SCORE_DECIMALS),
  }
}

function compareFilenames(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Score and rank candidate songs.
 *
 * Results are sorted by final score (descending), ties broken by filename (A-Z),
 * and ranked 1..N. An empty candidate list gives an empty result.
 */
export function scoreSongs(
  songs: readonly Song[],
  ideal: DenseVector,
  rangeMin: PitchIndex,
  rangeMax: PitchIndex,
  avoids: readonly PitchIndex[],
  favorites: readonly PitchIndex[],
  alpha: number = DEFAULT_SCORING_OPTIONS.alpha
): ScoredResult[] {
  const scored = songs.map((song) => ({
    song,
    components: scoreSong(song, ideal, rangeMin, rangeMax, avoids, favorites, alpha),
  }))

  scored.sort(
    (a, b) =>
      b.components.finalScore - a.components.finalScore ||
      compareFilenames(a.song.filename, b.song.filename)
  )

  return scored.map(({ song, components }, index) => ({
    filename: song.filename,
    composer: song.composer,
    title: song.title,
    ...components,
    rank: index + 1,
    explanation: generateExplanation(components, { favorites, avoids }),
  }))
}

/**
 * Filter the library to the profile's range, then score and rank what remains.
 */
export function recommend(
  songs: readonly Song[],
  profile: UserProfile,
  options: ScoringOptions = DEFAULT_SCORING_OPTIONS
): ScoredResult[] {
  const candidates = filterByRange(songs, profile.rangeMin, profile.rangeMax)
  const ideal = buildIdealVectorForProfile(profile, options.idealWeights)
  return scoreSongs(
    candidates,
    ideal,
    profile.rangeMin,
    profile.rangeMax,
    profile.avoids,
    profile.favorites,
    options.alpha
  )
}
