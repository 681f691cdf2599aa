import { readFileSync } from 'node:fs'
import type {
  DenseVector,
  PitchIndex,
  PitchRange,
  ScoredResult,
  Song,
  UserProfile,
} from '../domain/types'
import { midiToNoteName } from './noteUtils'
import { roundTo } from './statistics'

// ─────────────────────────────────────────────────────────────────────────────
// Stored Shapes (snake_case, as written by the score ingestion step)
// ─────────────────────────────────────────────────────────────────────────────

export interface StoredSong {
  filename: string
  composer: string
  title: string
  tessituragram: Record<string, number>
  statistics: {
    total_duration: number
    pitch_range: {
      min: string | null
      min_midi: number | null
      max: string | null
      max_midi: number | null
    }
    unique_pitches: number
  }
}

export interface StoredRecommendations {
  user_preferences: {
    range: { low: string; low_midi: number; high: string; high_midi: number }
    favorite_notes: string[]
    favorite_midis: number[]
    avoid_notes: string[]
    avoid_midis: number[]
    alpha: number
  }
  ideal_vector: Record<string, number>
  recommendations: ScoredResult[]
}

export class LibraryFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LibraryFormatError'
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isMidi(value: unknown): value is PitchIndex {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 127
}

function parseTessituragram(raw: unknown): Map<PitchIndex, number> {
  const tessituragram = new Map<PitchIndex, number>()
  if (!isRecord(raw)) return tessituragram

  for (const [key, duration] of Object.entries(raw)) {
    const midi = Number(key)
    if (!isMidi(midi)) continue
    if (typeof duration !== 'number' || !Number.isFinite(duration) || duration < 0) continue
    tessituragram.set(midi, duration)
  }
  return tessituragram
}

function parsePitchRange(raw: unknown): PitchRange | null {
  if (!isRecord(raw)) return null
  const { min_midi: minMidi, max_midi: maxMidi } = raw
  if (!isMidi(minMidi) || !isMidi(maxMidi) || minMidi > maxMidi) return null
  return { minMidi, maxMidi }
}

function parseSong(raw: unknown): Song | null {
  if (!isRecord(raw)) return null
  const { filename, composer, title } = raw
  if (typeof filename !== 'string' || filename === '') return null

  const tessituragram = parseTessituragram(raw.tessituragram)
  const statistics = isRecord(raw.statistics) ? raw.statistics : {}
  const totalDuration =
    typeof statistics.total_duration === 'number'
      ? statistics.total_duration
      : [...tessituragram.values()].reduce((sum, d) => sum + d, 0)
  const uniquePitches =
    typeof statistics.unique_pitches === 'number' ? statistics.unique_pitches : tessituragram.size

  return {
    filename,
    composer: typeof composer === 'string' ? composer : 'Unknown',
    title: typeof title === 'string' ? title : '',
    tessituragram,
    statistics: {
      pitchRange: parsePitchRange(statistics.pitch_range),
      totalDuration,
      uniquePitches,
    },
  }
}

/**
 * Parse a stored library document (`{ songs: [...] }`) into Song entities.
 *
 * Entries without a filename are dropped, as are tessituragram entries with a
 * non-MIDI key or a negative duration. A missing or inverted range becomes null.
 * Throws LibraryFormatError when the document has no songs array.
 */
export function parseLibrary(data: unknown): Song[] {
  if (!isRecord(data) || !Array.isArray(data.songs)) {
    throw new LibraryFormatError('Library document must be an object with a "songs" array')
  }
  return data.songs.map(parseSong).filter((song): song is Song => song !== null)
}

export function readLibraryFile(path: string): Song[] {
  let data: unknown
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    throw new LibraryFormatError(`Could not read library at ${path}`, { cause: error })
  }
  return parseLibrary(data)
}

// ─────────────────────────────────────────────────────────────────────────────
// Serialization
// ─────────────────────────────────────────────────────────────────────────────

export function toStoredSong(song: Song): StoredSong {
  const range = song.statistics.pitchRange
  return {
    filename: song.filename,
    composer: song.composer,
    title: song.title,
    tessituragram: Object.fromEntries(
      [...song.tessituragram].map(([midi, duration]) => [String(midi), duration])
    ),
    statistics: {
      total_duration: song.statistics.totalDuration,
      pitch_range: {
        min: range ? midiToNoteName(range.minMidi) : null,
        min_midi: range ? range.minMidi : null,
        max: range ? midiToNoteName(range.maxMidi) : null,
        max_midi: range ? range.maxMidi : null,
      },
      unique_pitches: song.statistics.uniquePitches,
    },
  }
}

export function serializeLibrary(songs: readonly Song[]): { songs: StoredSong[] } {
  return { songs: songs.map(toStoredSong) }
}

/**
 * Build the stored recommendation document for one query.
 */
export function serializeRecommendations(
  profile: UserProfile,
  ideal: DenseVector,
  results: ScoredResult[],
  alpha: number
): StoredRecommendations {
  return {
    user_preferences: {
      range: {
        low: midiToNoteName(profile.rangeMin),
        low_midi: profile.rangeMin,
        high: midiToNoteName(profile.rangeMax),
        high_midi: profile.rangeMax,
      },
      favorite_notes: profile.favorites.map(midiToNoteName),
      favorite_midis: [...profile.favorites],
      avoid_notes: profile.avoids.map(midiToNoteName),
      avoid_midis: [...profile.avoids],
      alpha,
    },
    ideal_vector: Object.fromEntries(
      ideal.map((weight, i) => [String(profile.rangeMin + i), roundTo(weight, 6)])
    ),
    recommendations: results,
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Collection Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Append incoming songs whose filename is not already present. Order is preserved.
 */
export function mergeSongs(existing: readonly Song[], incoming: readonly Song[]): Song[] {
  const seen = new Set(existing.map((song) => song.filename))
  const merged = [...existing]
  for (const song of incoming) {
    if (seen.has(song.filename)) continue
    merged.push(song)
    seen.add(song.filename)
  }
  return merged
}

export interface SongQuery {
  /** Case-insensitive substring of the composer */
  composer?: string
  /** Case-insensitive substring of the title */
  title?: string
  /** Keep songs whose range reaches at least this pitch */
  minMidi?: PitchIndex
  /** Keep songs whose range starts no higher than this pitch */
  maxMidi?: PitchIndex
}

/**
 * Browse the library by composer, title, or range overlap.
 * Range criteria drop songs without range data.
 */
export function querySongs(songs: readonly Song[], query: SongQuery): Song[] {
  const composer = query.composer?.toLowerCase()
  const title = query.title?.toLowerCase()

  return songs.filter((song) => {
    if (composer && !song.composer.toLowerCase().includes(composer)) return false
    if (title && !song.title.toLowerCase().includes(title)) return false
    if (query.minMidi === undefined && query.maxMidi === undefined) return true

    const range = song.statistics.pitchRange
    if (!range) return false
    if (query.minMidi !== undefined && range.maxMidi < query.minMidi) return false
    if (query.maxMidi !== undefined && range.minMidi > query.maxMidi) return false
    return true
  })
}
