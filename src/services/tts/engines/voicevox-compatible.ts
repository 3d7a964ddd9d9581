import { promises as fs } from 'node:fs'
import { fetch } from 'undici'
import type { TtsEngine, TtsEngineType, TtsSynthesizeOptions, VoicevoxVoiceProfile } from '../types'
import {
  InvalidPayloadError,
  ResourceUnavailableError,
  TransientExternalError,
  isErrnoException,
} from '../../../utils/errors'

type VoicevoxAudioQuery = Record<string, unknown>

export interface VoicevoxCompatibleConfig {
  engineType: TtsEngineType
  url: string
}

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ECONNRESET'])

const isRecord = (value: unknown): value is VoicevoxAudioQuery =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * VOICEVOX互換エンジン
 *
 * 以下のエンジンで同じAPIを使用:
 * - VOICEVOX (ポート: 50021)
 * - COEIROINK (ポート: 50032)
 * - AivisSpeech Engine (ポート: 10101)
 */
export class VoicevoxCompatibleEngine implements TtsEngine {
  readonly engineType: TtsEngineType
  private readonly endpoint: string

  constructor(config: VoicevoxCompatibleConfig) {
    this.engineType = config.engineType
    this.endpoint = config.url.replace(/\/+$/, '')
  }

  async synthesize(
    text: string,
    outputPath: string,
    voice: VoicevoxVoiceProfile,
    options: TtsSynthesizeOptions = {}
  ): Promise<string> {
    const normalizedText = text.trim()
    if (!normalizedText) {
      throw new InvalidPayloadError('音声合成テキストが空です', this.engineType)
    }

    // Step 1: audio_query でアクセント句を取得
    const queryParams = new URLSearchParams({
      text: normalizedText,
      speaker: String(voice.speakerId),
    })
    const queryResponse = await this.post(`/audio_query?${queryParams.toString()}`, {}, 'audio_query', options.signal)
    const query: unknown = await queryResponse.json()
    if (!isRecord(query)) {
      throw new InvalidPayloadError(`${this.engineType} audio_query の応答が不正です`, this.engineType)
    }

    // Step 2: パラメータを適用して synthesis で音声生成
    const synthResponse = await this.post(
      `/synthesis?speaker=${voice.speakerId}`,
      this.applySynthesisOverrides(query, voice),
      'synthesis',
      options.signal
    )

    // Step 3: WAVファイルとして保存
    const buffer = Buffer.from(await synthResponse.arrayBuffer())
    await fs.writeFile(outputPath, buffer)

    return outputPath
  }

  private async post(pathAndQuery: string, body: unknown, step: string, signal?: AbortSignal) {
    let response: Awaited<ReturnType<typeof fetch>>
    try {
      response = await fetch(`${this.endpoint}${pathAndQuery}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      })
    } catch (error) {
      throw this.classifyNetworkError(error, step)
    }

    if (!response.ok) {
      const message = await response.text().catch(() => '')
      const detail = `${this.engineType} ${step} に失敗しました (${response.status}): ${message}`
      if (response.status >= 500 || response.status === 429) {
        throw new TransientExternalError(detail, this.engineType, response.status)
      }
      throw new InvalidPayloadError(detail, this.engineType, message)
    }
    return response
  }

  private classifyNetworkError(error: unknown, step: string): unknown {
    if (error instanceof Error && error.name === 'AbortError') {
      return error
    }
    const cause = error instanceof Error ? error.cause : undefined
    if (isErrnoException(cause) && cause.code && UNREACHABLE_CODES.has(cause.code)) {
      return new ResourceUnavailableError(
        `${this.engineType} に接続できません (${this.endpoint}): ${cause.code}`,
        this.engineType
      )
    }
    const message = error instanceof Error ? error.message : String(error)
    return new TransientExternalError(`${this.engineType} ${step} の通信に失敗しました: ${message}`, this.engineType)
  }

  private applySynthesisOverrides(query: VoicevoxAudioQuery, overrides: VoicevoxVoiceProfile): VoicevoxAudioQuery {
    const { speakerId: _speakerId, emotion: _emotion, ...synthesisParams } = overrides
    const definedOverrides = Object.fromEntries(
      Object.entries(synthesisParams).filter(([, value]) => value !== undefined)
    )
    return { ...query, ...definedOverrides }
  }
}
