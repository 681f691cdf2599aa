import { describe, it, expect } from 'vitest'
import {
  buildDenseVector,
  normalizeL1,
  normalizeL2,
  cosineSimilarity,
  sumAtPitches,
  l2Norm,
} from './vectorSpace'

describe('vectorSpace', () => {
  describe('buildDenseVector', () => {
    it('places durations at (midi - rangeMin)', () => {
      const tessituragram = new Map([
        [60, 2],
        [62, 1],
      ])
      expect(buildDenseVector(tessituragram, 60, 64)).toEqual([2, 0, 1, 0, 0])
    })

    it('drops pitches outside the range', () => {
      const tessituragram = new Map([
        [55, 3],
        [61, 1],
        [70, 5],
      ])
      expect(buildDenseVector(tessituragram, 60, 62)).toEqual([0, 1, 0])
    })

    it('returns zeros for an empty tessituragram', () => {
      expect(buildDenseVector(new Map(), 48, 50)).toEqual([0, 0, 0])
    })
  })

  describe('normalizeL1', () => {
    it('scales entries to proportions summing to 1', () => {
      expect(normalizeL1([2, 0, 1, 0, 1])).toEqual([0.5, 0, 0.25, 0, 0.25])
    })

    it('passes a zero vector through as a copy', () => {
      const zeros = [0, 0, 0]
      const result = normalizeL1(zeros)
      expect(result).toEqual([0, 0, 0])
      expect(result).not.toBe(zeros)
    })
  })

  describe('normalizeL2', () => {
    it('scales to unit length', () => {
      const result = normalizeL2([3, 4])
      expect(result[0]).toBeCloseTo(0.6, 10)
      expect(result[1]).toBeCloseTo(0.8, 10)
      expect(l2Norm(result)).toBeCloseTo(1, 10)
    })

    it('passes a zero vector through unchanged (no NaN)', () => {
      expect(normalizeL2([0, 0])).toEqual([0, 0])
    })
  })

  describe('cosineSimilarity', () => {
    it('is 1 for parallel vectors', () => {
      expect(cosineSimilarity([1, 1, 0], [2, 2, 0])).toBeCloseTo(1, 10)
    })

    it('is 0 for orthogonal vectors', () => {
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
    })

    it('is 0 when either vector is zero', () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
      expect(cosineSimilarity([1, 1], [0, 0])).toBe(0)
    })
  })

  describe('sumAtPitches', () => {
    it('sums weights at the given pitches and ignores out-of-range ones', () => {
      expect(sumAtPitches([0.5, 0, 0.25, 0, 0.25], [60, 62, 99], 60)).toBe(0.75)
    })

    it('is 0 for no pitches', () => {
      expect(sumAtPitches([0.5, 0.5], [], 60)).toBe(0)
    })
  })
})
