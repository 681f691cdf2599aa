import type { PitchIndex, RangedSong, Song, SyntheticProfile } from '../domain/types'
import { DEFAULT_EVALUATION_CONFIG } from '../domain/config'
import { filterByRange, hasPitchRange } from './scoringEngine'

export interface SyntheticProfileOptions {
  topFavorites: number
  bottomAvoids: number
}

const DEFAULT_OPTIONS: SyntheticProfileOptions = {
  topFavorites: DEFAULT_EVALUATION_CONFIG.topFavorites,
  bottomAvoids: DEFAULT_EVALUATION_CONFIG.bottomAvoids,
}

function totalDuration(song: Song): number {
  let total = 0
  for (const duration of song.tessituragram.values()) total += duration
  return total
}

/**
 * Whether a song carries what profile derivation needs:
 * a pitch range, a non-empty tessituragram and positive total duration.
 */
export function isEligibleForProfile(song: Song): song is RangedSong {
  return hasPitchRange(song) && song.tessituragram.size > 0 && totalDuration(song) > 0
}

/**
 * Derive a user profile from a song's own tessituragram.
 *
 * The range is the song's range. Pitches are ordered by share of singing time
 * (descending, lower MIDI first on ties): the first `topFavorites` become
 * favorites and the last `bottomAvoids` become avoids, minus any that are
 * already favorites. Returns null for songs that are not eligible.
 */
export function deriveSyntheticProfile(
  song: Song,
  options: SyntheticProfileOptions = DEFAULT_OPTIONS
): SyntheticProfile | null {
  return isEligibleForProfile(song) ? profileFromEligibleSong(song, options) : null
}

function profileFromEligibleSong(
  song: RangedSong,
  options: SyntheticProfileOptions
): SyntheticProfile {
  const total = totalDuration(song)
  const ordered = [...song.tessituragram]
    .map(([midi, duration]) => ({ midi, share: duration / total }))
    .sort((a, b) => b.share - a.share || a.midi - b.midi)
    .map((entry) => entry.midi)

  const favorites = ordered.slice(0, options.topFavorites)
  const avoidCandidates: PitchIndex[] =
    options.bottomAvoids > 0 && ordered.length >= options.bottomAvoids
      ? ordered.slice(-options.bottomAvoids)
      : []
  const avoids = avoidCandidates.filter((midi) => !favorites.includes(midi))

  return {
    sourceFilename: song.filename,
    rangeMin: song.statistics.pitchRange.minMidi,
    rangeMax: song.statistics.pitchRange.maxMidi,
    favorites,
    avoids,
  }
}

export interface ProfileCandidate {
  song: RangedSong
  profile: SyntheticProfile
  candidates: RangedSong[]
}

export interface ProfileSelection {
  selected: ProfileCandidate[]
  skippedMissingData: number
}

/**
 * Walk the library in order and collect up to `limit` songs whose synthetic
 * profile yields at least `minCandidates` range-compatible songs.
 */
export function selectProfiles(
  songs: readonly Song[],
  limit: number,
  minCandidates: number,
  options: SyntheticProfileOptions = DEFAULT_OPTIONS
): ProfileSelection {
  const selected: ProfileCandidate[] = []
  let skippedMissingData = 0

  for (const song of songs) {
    if (selected.length >= limit) break
    if (!isEligibleForProfile(song)) {
      skippedMissingData++
      continue
    }
    const profile = profileFromEligibleSong(song, options)
    const candidates = filterByRange(songs, profile.rangeMin, profile.rangeMax)
    if (candidates.length >= minCandidates) {
      selected.push({ song, profile, candidates })
    }
  }

  return { selected, skippedMissingData }
}
