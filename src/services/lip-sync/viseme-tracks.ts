import path from 'node:path'
import type { AudioClip, VisemeTrack } from '../../types/media'
import { runWithConcurrencyLimit } from '../../utils/concurrency'
import { DataIntegrityError, isFileNotFound } from '../../utils/errors'
import { extractVisemes, frameCountFor } from './viseme-extractor'
import { readWaveform } from './wav-reader'

export interface VisemeTrackOptions {
  /** AudioClip.audioPath の基準ディレクトリ */
  baseDir: string
  frameRate: number
  openThreshold: number
  minOpenFrames: number
  concurrency: number
}

export const buildVisemeTrack = async (clip: AudioClip, options: VisemeTrackOptions): Promise<VisemeTrack> => {
  if (clip.silent) {
    return {
      lineIndex: clip.lineIndex,
      frameRate: options.frameRate,
      mouthOpen: new Array<boolean>(frameCountFor(clip.durationSec, options.frameRate)).fill(false),
    }
  }
  const audioPath = path.resolve(options.baseDir, clip.audioPath)
  const waveform = await readWaveform(audioPath).catch((error: unknown) => {
    throw isFileNotFound(error) ? new DataIntegrityError(`行 ${clip.lineIndex} の音声ファイルがありません: ${audioPath}`) : error
  })
  return {
    lineIndex: clip.lineIndex,
    frameRate: options.frameRate,
    mouthOpen: extractVisemes(waveform, options.frameRate, options.openThreshold, options.minOpenFrames),
  }
}

export const buildVisemeTracks = (clips: readonly AudioClip[], options: VisemeTrackOptions): Promise<VisemeTrack[]> =>
  runWithConcurrencyLimit(
    clips.map((clip) => () => buildVisemeTrack(clip, options)),
    options.concurrency
  )
