export type { PitchIndex, Tessituragram, PitchRange, SongStatistics, Song, RangedSong } from './song'

export type { UserProfile, SyntheticProfile } from './profile'

export type { DenseVector, IdealVectorWeights, ScoringOptions, ScoredResult } from './scoring'

export type {
  ConfidenceInterval,
  MetricEstimate,
  ExperimentParameters,
  InsufficientDataResult,
  ExperimentRecord,
  SelfRetrievalResult,
  PerturbationType,
  PerturbationRecord,
  BaselineSummary,
  RankingStabilityResult,
  RunRecord,
  CorrelationSummary,
  ScoreSpreadResult,
  SelfRetrievalOutcome,
  RankingStabilityOutcome,
  ScoreSpreadOutcome,
} from './evaluation'
