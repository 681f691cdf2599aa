import { describe, it, expect } from 'vitest'
import {
  roundTo,
  mean,
  sampleVariance,
  sampleStd,
  populationStd,
  range,
  quantile,
  pearsonCorrelation,
  kendallTauB,
} from './statistics'

describe('statistics', () => {
  describe('roundTo', () => {
    it('rounds to the given number of decimals', () => {
      expect(roundTo(0.123456, 4)).toBe(0.1235)
      expect(roundTo(-0.00004, 4)).toBeCloseTo(0, 10)
    })
  })

  describe('mean', () => {
    it('averages values', () => {
      expect(mean([1, 2, 3, 4])).toBe(2.5)
    })

    it('returns a constant series exactly', () => {
      expect(mean([0.1, 0.1, 0.1])).toBe(0.1)
    })

    it('is 0 for no values', () => {
      expect(mean([])).toBe(0)
    })
  })

  describe('spread', () => {
    it('computes sample variance and std with n - 1', () => {
      expect(sampleVariance([1, 2, 3, 4])).toBeCloseTo(5 / 3, 10)
      expect(sampleStd([1, 2, 3, 4])).toBeCloseTo(Math.sqrt(5 / 3), 10)
    })

    it('computes population std with n', () => {
      expect(populationStd([1, 2, 3, 4])).toBeCloseTo(Math.sqrt(1.25), 10)
    })

    it('is 0 for a single value', () => {
      expect(sampleVariance([3])).toBe(0)
      expect(populationStd([3])).toBe(0)
    })

    it('computes range as max - min', () => {
      expect(range([0.4, -0.1, 0.9])).toBe(1)
      expect(range([])).toBe(0)
    })
  })

  describe('quantile', () => {
    it('interpolates between closest ranks', () => {
      expect(quantile([4, 1, 3, 2], 0.5)).toBe(2.5)
      expect(quantile([10, 20, 30, 40, 50], 0.1)).toBe(14)
    })

    it('returns exact ranks at their positions', () => {
      expect(quantile([10, 20, 30, 40, 50], 0.25)).toBe(20)
      expect(quantile([10, 20, 30, 40, 50], 1)).toBe(50)
    })

    it('handles single and empty input', () => {
      expect(quantile([7], 0.975)).toBe(7)
      expect(quantile([], 0.5)).toBe(0)
    })
  })

  describe('pearsonCorrelation', () => {
    it('is 1 for a positive linear relation', () => {
      expect(pearsonCorrelation([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10)
    })

    it('is -1 for a negative linear relation', () => {
      expect(pearsonCorrelation([1, 2, 3], [6, 4, 2])).toBeCloseTo(-1, 10)
    })

    it('matches a hand-computed value', () => {
      // dx = [-1, 0, 1], dy = [-1, 1, 0]: sxy 1, sxx 2, syy 2
      expect(pearsonCorrelation([1, 2, 3], [1, 3, 2])).toBeCloseTo(0.5, 10)
    })

    it('falls back to 0 for a constant series', () => {
      expect(pearsonCorrelation([0.5, 0.5, 0.5], [1, 2, 3])).toBe(0)
    })

    it('falls back to 0 when values differ by less than 1e-9', () => {
      const nearlyConstant = [0.42, 0.42 + 1e-10, 0.42 - 1e-10]
      const result = pearsonCorrelation(nearlyConstant, [0.1, 0.5, 0.9])
      expect(result).toBe(0)
      expect(Number.isNaN(result)).toBe(false)
    })

    it('falls back to 0 for short or mismatched input', () => {
      expect(pearsonCorrelation([1], [1])).toBe(0)
      expect(pearsonCorrelation([1, 2, 3], [1, 2])).toBe(0)
    })
  })

  describe('kendallTauB', () => {
    it('is 1 for identical orderings', () => {
      expect(kendallTauB([1, 2, 3, 4], [1, 2, 3, 4])).toBe(1)
    })

    it('is -1 for reversed orderings', () => {
      expect(kendallTauB([1, 2, 3, 4], [4, 3, 2, 1])).toBe(-1)
    })

    it('counts one swapped pair', () => {
      // 5 concordant, 1 discordant of 6 pairs
      expect(kendallTauB([1, 2, 3, 4], [2, 1, 3, 4])).toBeCloseTo(4 / 6, 10)
    })

    it('corrects for ties', () => {
      // 5 concordant, 1 pair tied in x: 5 / sqrt(5 * 6)
      expect(kendallTauB([1, 2, 2, 3], [1, 2, 3, 4])).toBeCloseTo(5 / Math.sqrt(30), 10)
    })

    it('falls back to 0 when undefined', () => {
      expect(kendallTauB([1, 1, 1], [1, 2, 3])).toBe(0)
      expect(kendallTauB([1], [1])).toBe(0)
    })
  })
})
