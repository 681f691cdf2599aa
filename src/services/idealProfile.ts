import type { DenseVector, IdealVectorWeights, PitchIndex, UserProfile } from '../domain/types'
import { DEFAULT_IDEAL_WEIGHTS } from '../domain/config'
import { normalizeL2 } from './vectorSpace'

// ─────────────────────────────────────────────────────────────────────────────
// Ideal Vector
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build the unit-length target vector for a range and note preferences.
 *
 * Every in-range pitch starts at `base`; favorites get `favoriteBoost` added and
 * avoids get `avoidPenalty` added (in that order, so a pitch in both sets can stay
 * positive). Values are clamped at 0 before L2 normalization, keeping the vector
 * non-negative and cosine similarity within [0, 1].
 *
 * Favorites and avoids are expected to be disjoint; see createUserProfile.
 */
export function buildIdealVector(
  rangeMin: PitchIndex,
  rangeMax: PitchIndex,
  favorites: readonly PitchIndex[],
  avoids: readonly PitchIndex[],
  weights: IdealVectorWeights = DEFAULT_IDEAL_WEIGHTS
): DenseVector {
  const length = Math.max(0, rangeMax - rangeMin + 1)
  const vector: DenseVector = new Array(length).fill(weights.base)

  for (const midi of favorites) {
    const index = midi - rangeMin
    if (index >= 0 && index < length) vector[index] += weights.favoriteBoost
  }
  for (const midi of avoids) {
    const index = midi - rangeMin
    if (index >= 0 && index < length) vector[index] += weights.avoidPenalty
  }

  return normalizeL2(vector.map((value) => Math.max(0, value)))
}

/**
 * Build the ideal vector for a profile.
 */
export function buildIdealVectorForProfile(
  profile: UserProfile,
  weights: IdealVectorWeights = DEFAULT_IDEAL_WEIGHTS
): DenseVector {
  return buildIdealVector(profile.rangeMin, profile.rangeMax, profile.favorites, profile.avoids, weights)
}

// ─────────────────────────────────────────────────────────────────────────────
// User Profile Boundary
// ─────────────────────────────────────────────────────────────────────────────

export interface UserProfileInput {
  rangeMin: PitchIndex
  rangeMax: PitchIndex
  favorites?: readonly PitchIndex[]
  avoids?: readonly PitchIndex[]
}

/**
 * Normalize user-entered preferences into a UserProfile.
 *
 * A reversed range is swapped. Favorites and avoids are clipped to the range,
 * de-duplicated and sorted. An avoid that is also a favorite is dropped, so the
 * sets reaching buildIdealVector are disjoint.
 */
export function createUserProfile(input: UserProfileInput): UserProfile {
  const rangeMin = Math.min(input.rangeMin, input.rangeMax)
  const rangeMax = Math.max(input.rangeMin, input.rangeMax)

  const clip = (midis: readonly PitchIndex[] = []): PitchIndex[] =>
    [...new Set(midis)].filter((m) => m >= rangeMin && m <= rangeMax).sort((a, b) => a - b)

  const favorites = clip(input.favorites)
  const favoriteSet = new Set(favorites)
  const avoids = clip(input.avoids).filter((m) => !favoriteSet.has(m))

  return { rangeMin, rangeMax, favorites, avoids }
}
