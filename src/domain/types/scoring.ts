/**
 * Dense vector over a contiguous pitch range: index i holds the value for MIDI (rangeMin + i).
 */
export type DenseVector = number[]

export interface IdealVectorWeights {
  /** Weight given to every in-range pitch */
  base: number
  /** Added at favorite pitches */
  favoriteBoost: number
  /** Added at avoid pitches (negative) */
  avoidPenalty: number
}

export interface ScoringOptions {
  /** Weight of the avoid penalty in the final score */
  alpha: number
  idealWeights: IdealVectorWeights
}

export interface ScoredResult {
  filename: string
  composer: string
  title: string
  /** cosineSimilarity - alpha * avoidPenalty */
  finalScore: number
  /** 0-1 for non-negative vectors */
  cosineSimilarity: number
  /** Proportion of singing time spent on avoid notes (0-1) */
  avoidPenalty: number
  /** Proportion of singing time spent on favorite notes; not part of the final score */
  favoriteOverlap: number
  /** 1-based, no gaps */
  rank: number
  explanation: string
}
