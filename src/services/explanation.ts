import type { PitchIndex, ScoredResult } from '../domain/types'
import { formatNoteList } from './noteUtils'

// ─────────────────────────────────────────────────────────────────────────────
// Thresholds (percent of singing time)
// ─────────────────────────────────────────────────────────────────────────────

const STRONG_FAVORITE_PCT = 30
const MODERATE_FAVORITE_PCT = 10
const MINIMAL_AVOID_PCT = 2
const SOME_AVOID_PCT = 10

export type ExplanationScores = Pick<
  ScoredResult,
  'finalScore' | 'cosineSimilarity' | 'avoidPenalty' | 'favoriteOverlap'
>

export interface ExplanationPreferences {
  favorites: readonly PitchIndex[]
  avoids: readonly PitchIndex[]
}

/**
 * Describe why a song scored the way it did.
 * Only the score line is produced when the profile has no favorites or avoids.
 */
export function generateExplanation(
  scores: ExplanationScores,
  preferences: ExplanationPreferences
): string {
  const parts = [
    `Final score: ${scores.finalScore.toFixed(2)} (cosine similarity ${scores.cosineSimilarity.toFixed(2)})`,
  ]

  if (preferences.favorites.length > 0) {
    parts.push(describeFavorites(scores.favoriteOverlap, formatNoteList(preferences.favorites)))
  }
  if (preferences.avoids.length > 0) {
    parts.push(describeAvoids(scores.avoidPenalty, formatNoteList(preferences.avoids)))
  }

  return parts.join('  ')
}

function describeFavorites(overlap: number, names: string): string {
  const pct = overlap * 100
  if (pct >= STRONG_FAVORITE_PCT) {
    return `Strong overlap with your favorite notes (${names}): ${pct.toFixed(0)}% of singing time.`
  }
  if (pct >= MODERATE_FAVORITE_PCT) {
    return `Moderate overlap with favorite notes (${names}): ${pct.toFixed(0)}% of singing time.`
  }
  return `Low overlap with favorite notes (${names}): only ${pct.toFixed(0)}% of singing time.`
}

function describeAvoids(penalty: number, names: string): string {
  const pct = penalty * 100
  if (pct <= MINIMAL_AVOID_PCT) {
    return `Minimal presence of avoid notes (${names}): ${pct.toFixed(1)}% of singing time.`
  }
  if (pct <= SOME_AVOID_PCT) {
    return `Some presence of avoid notes (${names}): ${pct.toFixed(1)}% of singing time.`
  }
  return `Notable presence of avoid notes (${names}): ${pct.toFixed(1)}% of singing time, which lowered the score.`
}
