/** MIDI note number (0-127). Enharmonic spellings collapse to one index. */
export type PitchIndex = number

/**
 * Duration-weighted histogram of singing time per pitch.
 * Durations are non-negative; an empty map means no tessituragram data.
 */
export type Tessituragram = ReadonlyMap<PitchIndex, number>

export interface PitchRange {
  minMidi: PitchIndex
  maxMidi: PitchIndex
}

export interface SongStatistics {
  /** Lowest and highest sung pitch, or null when the score had no pitched notes */
  pitchRange: PitchRange | null
  totalDuration: number
  uniquePitches: number
}

export interface Song {
  /** Unique identifier within a library */
  filename: string
  composer: string
  title: string
  tessituragram: Tessituragram
  statistics: SongStatistics
}

/**
 * A song whose range is known, so it can take part in range filtering.
 */
export type RangedSong = Song & { statistics: SongStatistics & { pitchRange: PitchRange } }
