import { Note } from 'tonal'
import type { PitchIndex } from '../domain/types'

// ─────────────────────────────────────────────────────────────────────────────
// Note Utilities: MIDI <-> note name conversions and note list parsing
// ─────────────────────────────────────────────────────────────────────────────

const MIDI_MIN = 0
const MIDI_MAX = 127

// A hyphen directly after an octave digit separates a range ("D4-E4")
const RANGE_SEPARATOR = /(?<=\d)-/

export class InvalidNoteError extends Error {
  constructor(readonly input: string) {
    super(`'${input}' is not a valid note name. Examples: C4, F#4, Bb3, Eb5`)
    this.name = 'InvalidNoteError'
  }
}

/**
 * Convert MIDI number to note name (e.g., 60 -> "C4", 61 -> "C#4")
 */
export function midiToNoteName(midi: PitchIndex): string {
  return Note.fromMidiSharps(midi)
}

/**
 * Convert a note name with octave to its MIDI number (e.g., "C4" -> 60, "Bb3" -> 58).
 * Accepts single and double accidentals, lowercase letters and surrounding whitespace.
 * Throws InvalidNoteError when the name has no octave or falls outside MIDI 0-127.
 */
export function noteNameToMidi(noteName: string): PitchIndex {
  const trimmed = noteName.trim()
  const midi = Note.midi(trimmed)
  if (midi === null || midi < MIDI_MIN || midi > MIDI_MAX) {
    throw new InvalidNoteError(trimmed)
  }
  return midi
}

/**
 * Parse a single note ("A4") or an inclusive range ("D4-E4") into MIDI numbers.
 * Reversed ranges are swapped. A token that does not parse as a range is
 * retried as a single note.
 */
export function parseNoteOrRange(token: string): PitchIndex[] {
  const trimmed = token.trim()
  if (!trimmed) return []

  const parts = trimmed.split(RANGE_SEPARATOR)
  if (parts.length === 2 && parts[0].trim() && parts[1].trim()) {
    const low = Note.midi(parts[0].trim())
    const high = Note.midi(parts[1].trim())
    if (low !== null && high !== null) {
      const [from, to] = low <= high ? [low, high] : [high, low]
      if (from >= MIDI_MIN && to <= MIDI_MAX) {
        return Array.from({ length: to - from + 1 }, (_, i) => from + i)
      }
    }
  }

  return [noteNameToMidi(trimmed)]
}

/**
 * Parse a comma-separated list of notes and ranges ("A4, C4-E4").
 * Returns sorted, de-duplicated MIDI numbers; empty input gives [].
 */
export function parseNoteList(text: string): PitchIndex[] {
  const midis = new Set<PitchIndex>()
  for (const token of text.split(',')) {
    for (const midi of parseNoteOrRange(token)) {
      midis.add(midi)
    }
  }
  return [...midis].sort((a, b) => a - b)
}

/**
 * Format MIDI numbers as a comma-separated list of note names.
 */
export function formatNoteList(midis: readonly PitchIndex[]): string {
  return midis.map(midiToNoteName).join(', ')
}
