import type { ConfidenceInterval, MetricEstimate } from '../domain/types'
import { mean, quantile, roundTo } from './statistics'

/** Uniform draws in [0, 1) */
export type RandomSource = () => number

export interface ExperimentRunOptions {
  /** Generator for bootstrap resampling; defaults to one seeded from config.seed */
  rng?: RandomSource
  onProgress?: (message: string) => void
}

/**
 * Seeded linear congruential generator. The same seed always yields the same sequence.
 */
export function createRng(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (1664525 * state + 1013904223) >>> 0
    return state / 4294967296
  }
}

/**
 * 95% percentile-bootstrap confidence interval for the mean.
 *
 * Draws `samples` resamples of the original size with replacement, takes the
 * mean of each, and returns the 2.5th and 97.5th percentiles of those means.
 * Empty input gives [0, 0] without consuming draws.
 */
export function bootstrapMeanCI(
  values: readonly number[],
  rng: RandomSource,
  samples: number
): ConfidenceInterval {
  const n = values.length
  if (n === 0) return [0, 0]

  const means: number[] = new Array(samples)
  const resample: number[] = new Array(n)
  for (let b = 0; b < samples; b++) {
    for (let i = 0; i < n; i++) {
      resample[i] = values[Math.floor(rng() * n)]
    }
    means[b] = mean(resample)
  }

  return [quantile(means, 0.025), quantile(means, 0.975)]
}

/**
 * Point estimate (mean) and bootstrap 95% CI, rounded for reporting.
 */
export function estimateMean(
  values: readonly number[],
  rng: RandomSource,
  samples: number,
  digits = 4
): MetricEstimate {
  const [lo, hi] = bootstrapMeanCI(values, rng, samples)
  return {
    value: roundTo(mean(values), digits),
    ci95: [roundTo(lo, digits), roundTo(hi, digits)],
  }
}
