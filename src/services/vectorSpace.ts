import type { DenseVector, PitchIndex, Tessituragram } from '../domain/types'

// ─────────────────────────────────────────────────────────────────────────────
// Vector Space: dense pitch vectors over [rangeMin, rangeMax]
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Project a sparse tessituragram onto a dense vector over [rangeMin, rangeMax].
 * Index i holds the duration at MIDI (rangeMin + i); pitches outside the range are dropped.
 */
export function buildDenseVector(
  tessituragram: Tessituragram,
  rangeMin: PitchIndex,
  rangeMax: PitchIndex
): DenseVector {
  const length = Math.max(0, rangeMax - rangeMin + 1)
  const vector: DenseVector = new Array(length).fill(0)
  for (const [midi, duration] of tessituragram) {
    const index = midi - rangeMin
    if (index >= 0 && index < length) {
      vector[index] = duration
    }
  }
  return vector
}

/**
 * Scale so the entries sum to 1 (proportion of singing time).
 * A zero-sum vector is returned as an unchanged copy.
 */
export function normalizeL1(vector: readonly number[]): DenseVector {
  const total = vector.reduce((sum, value) => sum + value, 0)
  if (total === 0) return [...vector]
  return vector.map((value) => value / total)
}

/**
 * Scale to unit Euclidean length. A zero vector is returned as an unchanged copy.
 */
export function normalizeL2(vector: readonly number[]): DenseVector {
  const norm = l2Norm(vector)
  if (norm === 0) return [...vector]
  return vector.map((value) => value / norm)
}

export function l2Norm(vector: readonly number[]): number {
  return Math.sqrt(dot(vector, vector))
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    sum += a[i] * b[i]
  }
  return sum
}

/**
 * Cosine similarity between two vectors; 0 when either has zero length.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const normA = l2Norm(a)
  const normB = l2Norm(b)
  if (normA === 0 || normB === 0) return 0
  return dot(a, b) / (normA * normB)
}

/**
 * Sum the vector's entries at the given pitches, ignoring pitches outside the range.
 */
export function sumAtPitches(
  vector: readonly number[],
  pitches: readonly PitchIndex[],
  rangeMin: PitchIndex
): number {
  let sum = 0
  for (const midi of pitches) {
    const index = midi - rangeMin
    if (index >= 0 && index < vector.length) {
      sum += vector[index]
    }
  }
  return sum
}
