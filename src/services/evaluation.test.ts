import { describe, it, expect, vi } from 'vitest'
import { runAllExperiments } from './evaluation'
import { runSelfRetrieval } from './selfRetrieval'
import { resolveEvaluationConfig, ConfigError } from '../domain/config'
import type { Song } from '../domain/types'

describe('evaluation', () => {
  const createSong = (filename: string, durations: Record<number, number>): Song => {
    const tessituragram = new Map(Object.entries(durations).map(([m, d]) => [Number(m), d]))
    const pitches = [...tessituragram.keys()]
    return {
      filename,
      composer: 'Test Composer',
      title: filename.replace('.xml', ''),
      tessituragram,
      statistics: {
        pitchRange:
          pitches.length > 0 ? { minMidi: Math.min(...pitches), maxMidi: Math.max(...pitches) } : null,
        totalDuration: [...tessituragram.values()].reduce((a, b) => a + b, 0),
        uniquePitches: tessituragram.size,
      },
    }
  }

  const library = [
    createSong('a.xml', { 60: 0.5, 61: 0.25, 62: 6, 64: 5, 65: 4, 67: 3 }),
    createSong('b.xml', { 60: 5, 61: 4, 62: 1, 67: 1 }),
    createSong('c.xml', { 60: 1, 63: 5, 65: 5, 67: 1 }),
    createSong('g.xml', { 60: 2, 62: 2, 63: 1.9, 64: 2, 65: 2.1, 67: 1 }),
  ]
  const overrides = { bootstrapSamples: 300, minCandidates: 3 }

  it('runs all three experiments', () => {
    const report = runAllExperiments(library, overrides)
    expect(report.config.minCandidates).toBe(3)
    expect(report.selfRetrieval.status).toBe('ok')
    expect(report.rankingStability.status).toBe('ok')
    expect(report.scoreSpread.status).toBe('ok')
  })

  it('gives identical reports for the same seed', () => {
    expect(runAllExperiments(library, overrides)).toEqual(runAllExperiments(library, overrides))
  })

  it('seeds each experiment independently of the others', () => {
    const report = runAllExperiments(library, overrides)
    const alone = runSelfRetrieval(library, resolveEvaluationConfig(overrides))
    expect(report.selfRetrieval).toEqual(alone)
  })

  it('forwards progress from every experiment', () => {
    const onProgress = vi.fn()
    runAllExperiments(library, overrides, onProgress)
    const messages = onProgress.mock.calls.map(([message]) => String(message))
    expect(messages[0]).toBe('RQ1_self_retrieval_accuracy: 4 of 4 queries ranked')
    expect(messages.filter((m) => m.startsWith('RQ2_ranking_stability'))).toHaveLength(4)
    expect(messages[messages.length - 1]).toBe('RQ3_score_spread_internal_validity: 4 profiles scored')
  })

  it('rejects invalid overrides before running', () => {
    expect(() => runAllExperiments(library, { bootstrapSamples: 0 })).toThrow(ConfigError)
  })
})
