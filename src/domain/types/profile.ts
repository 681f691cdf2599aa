import type { PitchIndex } from './song'

export interface UserProfile {
  rangeMin: PitchIndex
  rangeMax: PitchIndex
  favorites: PitchIndex[]
  avoids: PitchIndex[]
}

/**
 * A profile derived from a song's own tessituragram, used by the evaluation protocols.
 */
export interface SyntheticProfile extends UserProfile {
  sourceFilename: string
}
