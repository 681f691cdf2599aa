export type ConfidenceInterval = [number, number]

export interface MetricEstimate {
  value: number
  ci95: ConfidenceInterval
}

export interface ExperimentParameters {
  alpha: number
  topFavorites: number
  bottomAvoids: number
  bootstrapSamples: number
  seed: number
  minCandidates?: number
  baselines?: number
  profiles?: number
}

export interface InsufficientDataResult {
  status: 'insufficient_data'
  experiment: string
  error: string
  parameters: ExperimentParameters
  dataSummary: { totalSongs: number; eligibleSongs: number }
}

// ─────────────────────────────────────────────────────────────────────────────
// RQ1: Self-retrieval
// ─────────────────────────────────────────────────────────────────────────────

export interface ExperimentRecord {
  filename: string
  composer: string
  title: string
  rank: number
  hitAt1: 0 | 1
  hitAt3: 0 | 1
  hitAt5: 0 | 1
  reciprocalRank: number
}

export interface SelfRetrievalResult {
  status: 'ok'
  experiment: 'RQ1_self_retrieval_accuracy'
  description: string
  parameters: ExperimentParameters
  dataSummary: {
    totalSongs: number
    validQueries: number
    songsSkipped: number
    skippedMissingData: number
    skippedTooFewCandidates: number
    skippedNotRetrieved: number
  }
  metrics: {
    hrAt1: MetricEstimate
    hrAt3: MetricEstimate
    hrAt5: MetricEstimate
    mrr: MetricEstimate
  }
  perQuery: ExperimentRecord[]
}

// ─────────────────────────────────────────────────────────────────────────────
// RQ2: Ranking stability
// ─────────────────────────────────────────────────────────────────────────────

export type PerturbationType = 'add_favorite' | 'remove_favorite' | 'add_avoid' | 'remove_avoid'

export interface PerturbationRecord {
  perturbationType: PerturbationType
  midiChanged: number
  noteChanged: string
  tau: number
  baselineSource: string
}

export interface BaselineSummary {
  sourceSong: string
  composer: string
  candidateCount: number
  perturbationCount: number
  meanTau: number
}

export interface RankingStabilityResult {
  status: 'ok'
  experiment: 'RQ2_ranking_stability'
  description: string
  parameters: ExperimentParameters
  baselineProfiles: BaselineSummary[]
  dataSummary: {
    totalSongs: number
    skippedMissingData: number
    baselines: number
    totalPerturbations: number
  }
  metrics: {
    meanTau: number
    stdTau: number
    ci95: ConfidenceInterval
    meanTauPerBaseline: number
    stdTauAcrossBaselines: number
  }
  perPerturbation: PerturbationRecord[]
}

// ─────────────────────────────────────────────────────────────────────────────
// RQ3: Score spread and internal validity
// ─────────────────────────────────────────────────────────────────────────────

export interface RunRecord {
  sourceSong: string
  composer: string
  songCount: number
  varianceFinalScore: number
  rangeFinalScore: number
  rFinalCosine: number
  rFinalAvoid: number
  rCosineFavoriteOverlap: number
}

export interface CorrelationSummary {
  mean: number
  ci95: ConfidenceInterval
  expectedSign: 'positive' | 'negative'
}

export interface ScoreSpreadResult {
  status: 'ok'
  experiment: 'RQ3_score_spread_internal_validity'
  description: string
  parameters: ExperimentParameters
  dataSummary: {
    totalSongs: number
    skippedMissingData: number
    profiles: number
  }
  metrics: {
    spread: {
      meanVariance: number
      stdVariance: number
      ci95Variance: ConfidenceInterval
      meanRange: number
      stdRange: number
      ci95Range: ConfidenceInterval
    }
    correlations: {
      finalScoreCosine: CorrelationSummary
      finalScoreAvoidPenalty: CorrelationSummary
      cosineFavoriteOverlap: CorrelationSummary
    }
  }
  perRun: RunRecord[]
}

export type SelfRetrievalOutcome = SelfRetrievalResult | InsufficientDataResult
export type RankingStabilityOutcome = RankingStabilityResult | InsufficientDataResult
export type ScoreSpreadOutcome = ScoreSpreadResult | InsufficientDataResult
