import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { buildVisemeTrack, buildVisemeTracks, type VisemeTrackOptions } from '../../../src/services/lip-sync'
import type { AudioClip } from '../../../src/types/media'
import { DataIntegrityError } from '../../../src/utils/errors'
import { concatSamples, encodeWav, silence, tone } from '../../factories/wav'

const clip = (overrides: Partial<AudioClip> = {}): AudioClip => ({
  lineIndex: 0,
  speaker: 'tsuno',
  audioPath: 'audio/000_tsuno.wav',
  durationSec: 0.4,
  silent: false,
  narrationText: 'テスト',
  ...overrides,
})

describe('buildVisemeTrack', () => {
  let baseDir: string
  let options: VisemeTrackOptions

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'viseme-'))
    await fs.mkdir(path.join(baseDir, 'audio'))
    options = { baseDir, frameRate: 10, openThreshold: 0.15, minOpenFrames: 1, concurrency: 2 }
  })

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true })
  })

  it('extracts states from the clip audio', async () => {
    const samples = concatSamples(silence(800), tone(1600, 0.8), silence(800))
    await fs.writeFile(path.join(baseDir, 'audio/000_tsuno.wav'), encodeWav(samples, 8000))

    const track = await buildVisemeTrack(clip(), options)

    expect(track).toEqual({ lineIndex: 0, frameRate: 10, mouthOpen: [false, true, true, false] })
  })

  it('gives silent clips an all-closed track without reading audio', async () => {
    const track = await buildVisemeTrack(clip({ silent: true, durationSec: 0.5, audioPath: 'audio/none.wav' }), options)

    expect(track.mouthOpen).toEqual([false, false, false, false, false])
  })

  it('reports a missing audio file as an integrity error', async () => {
    await expect(buildVisemeTrack(clip({ audioPath: 'audio/missing.wav' }), options)).rejects.toBeInstanceOf(
      DataIntegrityError
    )
  })

  it('builds tracks in clip order', async () => {
    const tracks = await buildVisemeTracks(
      [clip({ lineIndex: 0, silent: true, durationSec: 0.2 }), clip({ lineIndex: 1, silent: true, durationSec: 0.3 })],
      options
    )

    expect(tracks.map((track) => [track.lineIndex, track.mouthOpen.length])).toEqual([
      [0, 2],
      [1, 3],
    ])
  })
})
