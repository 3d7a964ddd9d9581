import path from 'node:path'
import type { ResolvedCharacter } from '../config/loader'
import { resolveVoice } from '../config/loader'
import type { AudioClip } from '../types/media'
import type { DialogueLine, Speaker } from '../types/script'
import { runWithConcurrencyLimit } from '../utils/concurrency'
import { DataIntegrityError, InvalidPayloadError } from '../utils/errors'
import { logger } from '../utils/logger'
import { withRetry } from '../utils/retry'
import { SILENCE_DURATION_SEC, hasSpeakableCharacters, processAnnotations, type ReadingDictionary } from './annotation'
import { readWaveform, waveformDurationSec } from './lip-sync/wav-reader'
import type { MediaPipeline } from './media-pipeline'
import type { TtsEngine } from './tts/types'

export interface SpeechRetryPolicy {
  maxRetries: number
  baseDelayMs: number
  maxDelayMs: number
}

export interface SpeechServiceDeps {
  engine: TtsEngine
  mediaPipeline: MediaPipeline
  characters: ReadonlyMap<Speaker, ResolvedCharacter>
  concurrency: number
  retry: SpeechRetryPolicy
}

export interface SynthesizeLinesOptions {
  /** WAV の書き込み先 (絶対パス) */
  outputDir: string
  /** AudioClip.audioPath に記録するディレクトリ名 */
  relativeDir: string
  dictionary: ReadingDictionary
  runId?: string
  signal?: AbortSignal
}

export const clipFileName = (lineIndex: number, speaker: Speaker) => `${String(lineIndex).padStart(3, '0')}_${speaker}.wav`

export class SpeechService {
  private readonly engine: TtsEngine
  private readonly mediaPipeline: MediaPipeline
  private readonly characters: ReadonlyMap<Speaker, ResolvedCharacter>
  private readonly concurrency: number
  private readonly retry: SpeechRetryPolicy

  constructor(deps: SpeechServiceDeps) {
    this.engine = deps.engine
    this.mediaPipeline = deps.mediaPipeline
    this.characters = deps.characters
    this.concurrency = deps.concurrency
    this.retry = deps.retry
  }

  /** 全行を合成する。結果は行番号順 */
  async synthesizeLines(lines: readonly DialogueLine[], options: SynthesizeLinesOptions): Promise<AudioClip[]> {
    const tasks = lines.map((line, index) => () => this.synthesizeLine(line, index, options))
    const clips = await runWithConcurrencyLimit(tasks, this.concurrency)
    logger.info(
      {
        runId: options.runId,
        lines: clips.length,
        silent: clips.filter((clip) => clip.silent).length,
        totalSec: Number(clips.reduce((sum, clip) => sum + clip.durationSec, 0).toFixed(3)),
      },
      'Speech synthesis completed'
    )
    return clips
  }

  async synthesizeLine(line: DialogueLine, lineIndex: number, options: SynthesizeLinesOptions): Promise<AudioClip> {
    options.signal?.throwIfAborted()
    const character = this.characters.get(line.speaker)
    if (!character) {
      throw new DataIntegrityError(`話者 ${line.speaker} の設定がありません`)
    }

    const { narrationText } = processAnnotations(line.rawText, options.dictionary)
    const fileName = clipFileName(lineIndex, line.speaker)
    const outputPath = path.join(options.outputDir, fileName)
    const base = {
      lineIndex,
      speaker: line.speaker,
      audioPath: path.posix.join(options.relativeDir, fileName),
      narrationText,
    }

    if (!hasSpeakableCharacters(narrationText)) {
      logger.info({ runId: options.runId, lineIndex, narrationText }, 'No speakable characters; inserting silence')
      return this.createSilence(base, outputPath, options.signal)
    }

    const voice = resolveVoice(character, line.emotion)
    try {
      await withRetry(() => this.engine.synthesize(narrationText, outputPath, voice, { signal: options.signal }), {
        ...this.retry,
        signal: options.signal,
        label: `${this.engine.engineType}#${lineIndex}`,
      })
    } catch (error) {
      if (error instanceof InvalidPayloadError) {
        logger.warn({ runId: options.runId, lineIndex, err: error }, 'Speech service rejected input; inserting silence')
        return this.createSilence(base, outputPath, options.signal)
      }
      throw error
    }

    const waveform = await readWaveform(outputPath)
    return { ...base, durationSec: waveformDurationSec(waveform), silent: false }
  }

  private async createSilence(
    base: Omit<AudioClip, 'durationSec' | 'silent'>,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<AudioClip> {
    await this.mediaPipeline.createSilentAudio(SILENCE_DURATION_SEC * 1000, outputPath, signal)
    return { ...base, durationSec: SILENCE_DURATION_SEC, silent: true }
  }
}
