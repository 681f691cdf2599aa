import { describe, it, expect } from 'vitest'
import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  LibraryFormatError,
  mergeSongs,
  parseLibrary,
  querySongs,
  readLibraryFile,
  serializeLibrary,
  serializeRecommendations,
} from './songLibrary'
import type { ScoredResult, Song } from '../domain/types'

describe('songLibrary', () => {
  const storedSong = {
    filename: 'caro.xml',
    composer: 'Giordani',
    title: 'Caro mio ben',
    tessituragram: { '62': 2.5, '64': 1.5, '67': 0.5 },
    statistics: {
      total_duration: 4.5,
      pitch_range: { min: 'D4', min_midi: 62, max: 'G4', max_midi: 67 },
      unique_pitches: 3,
    },
  }

  const createSong = (
    filename: string,
    composer: string,
    title: string,
    range: [number, number] | null
  ): Song => ({
    filename,
    composer,
    title,
    tessituragram: new Map(range ? [[range[0], 1]] : []),
    statistics: {
      pitchRange: range ? { minMidi: range[0], maxMidi: range[1] } : null,
      totalDuration: range ? 1 : 0,
      uniquePitches: range ? 1 : 0,
    },
  })

  describe('parseLibrary', () => {
    it('parses stored songs into entities', () => {
      const [song] = parseLibrary({ songs: [storedSong] })
      expect(song.filename).toBe('caro.xml')
      expect(song.composer).toBe('Giordani')
      expect([...song.tessituragram]).toEqual([
        [62, 2.5],
        [64, 1.5],
        [67, 0.5],
      ])
      expect(song.statistics).toEqual({
        pitchRange: { minMidi: 62, maxMidi: 67 },
        totalDuration: 4.5,
        uniquePitches: 3,
      })
    })

    it('drops invalid entries and tessituragram keys', () => {
      const songs = parseLibrary({
        songs: [
          { composer: 'No filename' },
          'not a song',
          { filename: 'x.xml', tessituragram: { '60': 1, abc: 2, '200': 1, '62': -1 } },
        ],
      })
      expect(songs).toHaveLength(1)
      expect([...songs[0].tessituragram]).toEqual([[60, 1]])
      expect(songs[0].composer).toBe('Unknown')
      expect(songs[0].title).toBe('')
      expect(songs[0].statistics).toEqual({ pitchRange: null, totalDuration: 1, uniquePitches: 1 })
    })

    it('treats an inverted range as missing', () => {
      const [song] = parseLibrary({
        songs: [
          {
            ...storedSong,
            statistics: { ...storedSong.statistics, pitch_range: { min_midi: 70, max_midi: 60 } },
          },
        ],
      })
      expect(song.statistics.pitchRange).toBeNull()
    })

    it('throws LibraryFormatError without a songs array', () => {
      expect(() => parseLibrary({ tracks: [] })).toThrow(LibraryFormatError)
      expect(() => parseLibrary(null)).toThrow('Library document must be an object with a "songs" array')
    })
  })

  describe('readLibraryFile', () => {
    it('reads a library from disk', () => {
      const path = join(mkdtempSync(join(tmpdir(), 'library-')), 'library.json')
      writeFileSync(path, JSON.stringify({ songs: [storedSong] }))
      expect(readLibraryFile(path).map((s) => s.filename)).toEqual(['caro.xml'])
    })

    it('wraps unreadable files with the cause', () => {
      const path = join(mkdtempSync(join(tmpdir(), 'library-')), 'broken.json')
      writeFileSync(path, '{ not json')
      try {
        readLibraryFile(path)
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(LibraryFormatError)
        expect(error).toHaveProperty('cause')
        expect(error).toHaveProperty('message', `Could not read library at ${path}`)
      }
    })
  })

  describe('serializeLibrary', () => {
    it('writes songs back in the stored shape', () => {
      const songs = parseLibrary({ songs: [storedSong] })
      expect(serializeLibrary(songs)).toEqual({ songs: [storedSong] })
    })

    it('writes a null range for songs without one', () => {
      const { songs } = serializeLibrary([createSong('n.xml', 'A', 'B', null)])
      expect(songs[0].statistics.pitch_range).toEqual({
        min: null,
        min_midi: null,
        max: null,
        max_midi: null,
      })
    })
  })

  describe('serializeRecommendations', () => {
    it('records the preferences, ideal vector and results', () => {
      const result: ScoredResult = {
        filename: 'caro.xml',
        composer: 'Giordani',
        title: 'Caro mio ben',
        finalScore: 0.9,
        cosineSimilarity: 0.9,
        avoidPenalty: 0,
        favoriteOverlap: 0.5,
        rank: 1,
        explanation: 'Final score: 0.90 (cosine similarity 0.90)',
      }
      const doc = serializeRecommendations(
        { rangeMin: 60, rangeMax: 62, favorites: [61], avoids: [62] },
        [0.16439898730535729, 0.9863939238321437, 0],
        [result],
        0.5
      )
      expect(doc.user_preferences).toEqual({
        range: { low: 'C4', low_midi: 60, high: 'D4', high_midi: 62 },
        favorite_notes: ['C#4'],
        favorite_midis: [61],
        avoid_notes: ['D4'],
        avoid_midis: [62],
        alpha: 0.5,
      })
      expect(doc.ideal_vector).toEqual({ '60': 0.164399, '61': 0.986394, '62': 0 })
      expect(doc.recommendations).toEqual([result])
    })
  })

  describe('mergeSongs', () => {
    it('appends only songs with new filenames', () => {
      const existing = [createSong('a.xml', 'A', 'One', [60, 62])]
      const incoming = [
        createSong('a.xml', 'A', 'Duplicate', [60, 62]),
        createSong('b.xml', 'B', 'Two', [60, 62]),
        createSong('b.xml', 'B', 'Twice', [60, 62]),
      ]
      expect(mergeSongs(existing, incoming).map((s) => s.title)).toEqual(['One', 'Two'])
    })
  })

  describe('querySongs', () => {
    const songs = [
      createSong('a.xml', 'Schubert', 'Ave Maria', [58, 70]),
      createSong('b.xml', 'Schumann', 'Widmung', [62, 77]),
      createSong('c.xml', 'Fauré', 'Après un rêve', [60, 72]),
      createSong('d.xml', 'Schubert', 'Ständchen', null),
    ]

    it('filters by composer and title substrings, ignoring case', () => {
      expect(querySongs(songs, { composer: 'schu' }).map((s) => s.filename)).toEqual([
        'a.xml',
        'b.xml',
        'd.xml',
      ])
      expect(querySongs(songs, { composer: 'SCHUBERT', title: 'ave' }).map((s) => s.filename)).toEqual([
        'a.xml',
      ])
    })

    it('keeps songs whose range overlaps the query range', () => {
      expect(querySongs(songs, { minMidi: 71 }).map((s) => s.filename)).toEqual(['b.xml', 'c.xml'])
      expect(querySongs(songs, { maxMidi: 60 }).map((s) => s.filename)).toEqual(['a.xml', 'c.xml'])
    })
  })
})
