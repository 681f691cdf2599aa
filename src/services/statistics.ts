// ─────────────────────────────────────────────────────────────────────────────
// Descriptive Statistics & Correlation
// ─────────────────────────────────────────────────────────────────────────────

// Series whose values all lie within this distance are treated as constant
const DEGENERATE_SPREAD = 1e-9

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

/**
 * Arithmetic mean, accumulated as offsets from the first value so a constant
 * series returns that value exactly. Empty input gives 0.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  const origin = values[0]
  let offset = 0
  for (const value of values) {
    offset += value - origin
  }
  return origin + offset / values.length
}

function sumOfSquaredDeviations(values: readonly number[]): number {
  const m = mean(values)
  return values.reduce((sum, value) => sum + (value - m) ** 2, 0)
}

/** Sample variance (n - 1 denominator); 0 for fewer than two values. */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return 0
  return sumOfSquaredDeviations(values) / (values.length - 1)
}

/** Sample standard deviation (n - 1 denominator); 0 for fewer than two values. */
export function sampleStd(values: readonly number[]): number {
  return Math.sqrt(sampleVariance(values))
}

/** Population standard deviation (n denominator); 0 for fewer than two values. */
export function populationStd(values: readonly number[]): number {
  if (values.length < 2) return 0
  return Math.sqrt(sumOfSquaredDeviations(values) / values.length)
}

export function range(values: readonly number[]): number {
  if (values.length === 0) return 0
  return Math.max(...values) - Math.min(...values)
}

/**
 * Quantile with linear interpolation between closest ranks (q in [0, 1]).
 */
export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0) return 0
  const sorted = [...values].sort((a, b) => a - b)
  if (sorted.length === 1) return sorted[0]
  const position = (sorted.length - 1) * q
  const lower = Math.floor(position)
  const upper = Math.ceil(position)
  if (lower === upper) return sorted[lower]
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower)
}

/**
 * Pearson correlation coefficient.
 * Returns 0 when the series are shorter than two, differ in length, or either is constant.
 */
export function pearsonCorrelation(x: readonly number[], y: readonly number[]): number {
  if (x.length < 2 || x.length !== y.length) return 0
  if (range(x) <= DEGENERATE_SPREAD || range(y) <= DEGENERATE_SPREAD) return 0

  const mx = mean(x)
  const my = mean(y)
  let sxy = 0
  let sxx = 0
  let syy = 0
  for (let i = 0; i < x.length; i++) {
    const dx = x[i] - mx
    const dy = y[i] - my
    sxy += dx * dy
    sxx += dx * dx
    syy += dy * dy
  }

  const r = sxy / Math.sqrt(sxx * syy)
  return Math.max(-1, Math.min(1, r))
}

/**
 * Kendall's tau-b between two paired series, corrected for ties.
 * Returns 0 when it is undefined (fewer than two pairs, or either series entirely tied).
 */
export function kendallTauB(x: readonly number[], y: readonly number[]): number {
  const n = x.length
  if (n < 2 || n !== y.length) return 0

  let concordant = 0
  let discordant = 0
  let tiedX = 0
  let tiedY = 0

  for (let i = 0; i < n - 1; i++) {
    for (let j = i + 1; j < n; j++) {
      const dx = Math.sign(x[i] - x[j])
      const dy = Math.sign(y[i] - y[j])
      if (dx === 0) tiedX++
      if (dy === 0) tiedY++
      if (dx === 0 || dy === 0) continue
      if (dx === dy) concordant++
      else discordant++
    }
  }

  const pairs = (n * (n - 1)) / 2
  const denominator = Math.sqrt((pairs - tiedX) * (pairs - tiedY))
  if (denominator === 0) return 0
  return (concordant - discordant) / denominator
}
