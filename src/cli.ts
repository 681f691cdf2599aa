import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { parseArgs } from 'node:util'
import { DEFAULT_SCORING_OPTIONS, type EvaluationConfig } from './domain/config'
import { createUserProfile, buildIdealVectorForProfile } from './services/idealProfile'
import { filterByRange, scoreSongs } from './services/scoringEngine'
import { readLibraryFile, serializeRecommendations } from './services/songLibrary'
import { midiToNoteName, noteNameToMidi, parseNoteList } from './services/noteUtils'
import { runAllExperiments } from './services/evaluation'

const USAGE = `Usage:
  cli recommend --library FILE --low NOTE --high NOTE [--favorites LIST] [--avoid LIST]
                [--alpha N] [--limit N] [--out FILE]
  cli evaluate  --library FILE [--out DIR] [--seed N] [--bootstrap N]

Notes are written as name + octave (C4, F#4, Bb3). Lists are comma-separated and
may contain ranges: "A4, D4-E4".`

function writeJson(path: string, data: unknown): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, JSON.stringify(data, null, 2) + '\n', 'utf-8')
}

function parseNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new Error(`--${flag} expects a number, got '${raw}'`)
  }
  return value
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function recommendCommand(args: string[]): void {
  const { values } = parseArgs({
    args,
    options: {
      library: { type: 'string' },
      low: { type: 'string' },
      high: { type: 'string' },
      favorites: { type: 'string', default: '' },
      avoid: { type: 'string', default: '' },
      alpha: { type: 'string' },
      limit: { type: 'string' },
      out: { type: 'string' },
    },
  })
  if (!values.library || !values.low || !values.high) {
    throw new Error('recommend needs --library, --low and --high')
  }

  const profile = createUserProfile({
    rangeMin: noteNameToMidi(values.low),
    rangeMax: noteNameToMidi(values.high),
    favorites: parseNoteList(values.favorites ?? ''),
    avoids: parseNoteList(values.avoid ?? ''),
  })
  const alpha = parseNumber('alpha', values.alpha) ?? DEFAULT_SCORING_OPTIONS.alpha
  const limit = parseNumber('limit', values.limit)

  const songs = readLibraryFile(values.library)
  const candidates = filterByRange(songs, profile.rangeMin, profile.rangeMax)
  console.log(
    `[Recommend] Range ${midiToNoteName(profile.rangeMin)}-${midiToNoteName(profile.rangeMax)}: ` +
      `${candidates.length} of ${songs.length} songs fit`
  )
  if (candidates.length === 0) {
    console.warn('[Recommend] No songs match your range. Try widening it.')
    return
  }

  const ideal = buildIdealVectorForProfile(profile, DEFAULT_SCORING_OPTIONS.idealWeights)
  const results = scoreSongs(
    candidates,
    ideal,
    profile.rangeMin,
    profile.rangeMax,
    profile.avoids,
    profile.favorites,
    alpha
  )

  for (const result of results.slice(0, limit ?? results.length)) {
    console.log(`  #${result.rank}  ${result.title || result.filename}`)
    console.log(`      Composer: ${result.composer}`)
    console.log(`      File:     ${result.filename}`)
    console.log(`      ${result.explanation}`)
  }

  if (values.out) {
    writeJson(values.out, serializeRecommendations(profile, ideal, results, alpha))
    console.log(`[Recommend] Results saved to ${values.out}`)
  }
}

function evaluateCommand(args: string[]): void {
  const { values } = parseArgs({
    args,
    options: {
      library: { type: 'string' },
      out: { type: 'string', default: 'experiment_results' },
      seed: { type: 'string' },
      bootstrap: { type: 'string' },
    },
  })
  if (!values.library) {
    throw new Error('evaluate needs --library')
  }

  const overrides: Partial<EvaluationConfig> = {}
  const seed = parseNumber('seed', values.seed)
  const bootstrapSamples = parseNumber('bootstrap', values.bootstrap)
  if (seed !== undefined) overrides.seed = seed
  if (bootstrapSamples !== undefined) overrides.bootstrapSamples = bootstrapSamples

  const songs = readLibraryFile(values.library)
  console.log(`[Evaluate] ${songs.length} songs loaded from ${values.library}`)

  const report = runAllExperiments(songs, overrides, (message) =>
    console.log(`[Evaluate] ${message}`)
  )
  const outDir = values.out ?? 'experiment_results'
  const outputs = [
    ['RQ1_results.json', report.selfRetrieval],
    ['RQ2_results.json', report.rankingStability],
    ['RQ3_results.json', report.scoreSpread],
  ] as const

  for (const [file, outcome] of outputs) {
    writeJson(join(outDir, file), outcome)
    if (outcome.status === 'insufficient_data') {
      console.warn(`[Evaluate] ${outcome.experiment}: ${outcome.error}`)
    }
  }

  const { selfRetrieval, rankingStability, scoreSpread } = report
  if (selfRetrieval.status === 'ok') {
    const { hrAt1, mrr } = selfRetrieval.metrics
    console.log(`[Evaluate] HR@1 ${hrAt1.value} [${hrAt1.ci95.join(', ')}]`)
    console.log(`[Evaluate] MRR  ${mrr.value} [${mrr.ci95.join(', ')}]`)
  }
  if (rankingStability.status === 'ok') {
    const { meanTau, ci95 } = rankingStability.metrics
    console.log(`[Evaluate] Mean tau ${meanTau} [${ci95.join(', ')}]`)
  }
  if (scoreSpread.status === 'ok') {
    const { spread } = scoreSpread.metrics
    console.log(`[Evaluate] Mean score range ${spread.meanRange} [${spread.ci95Range.join(', ')}]`)
  }
  console.log(`[Evaluate] Results saved to ${outDir}`)
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry
// ─────────────────────────────────────────────────────────────────────────────

export function main(argv: string[]): number {
  const [command, ...rest] = argv
  try {
    if (command === 'recommend') {
      recommendCommand(rest)
    } else if (command === 'evaluate') {
      evaluateCommand(rest)
    } else {
      console.log(USAGE)
      return command === undefined || command === '--help' ? 0 : 1
    }
    return 0
  } catch (error) {
    console.error(`[CLI] ${error instanceof Error ? error.message : String(error)}`)
    return 1
  }
}

process.exitCode = main(process.argv.slice(2))
