/**
 * 音声合成エンジンの抽象化
 *
 * 対応エンジン (いずれも VOICEVOX 互換 API):
 * - voicevox: VOICEVOX
 * - coeiroink: COEIROINK
 * - aivis_speech: AivisSpeech Engine
 */

export type { TtsEngineType } from '../../config/schema'
import type { TtsEngineType } from '../../config/schema'

/** 音声合成の共通パラメータ */
export interface TtsSynthesisParams {
  /** 話速 (1.0 = 標準) */
  speedScale?: number
  /** ピッチ (0.0 = 標準) */
  pitchScale?: number
  /** 抑揚 (1.0 = 標準) */
  intonationScale?: number
  /** 音量 (1.0 = 標準) */
  volumeScale?: number
  outputSamplingRate?: number
  outputStereo?: boolean
}

export interface VoicevoxVoiceProfile extends TtsSynthesisParams {
  emotion: string
  speakerId: number
}

export interface TtsSynthesizeOptions {
  signal?: AbortSignal
}

export interface TtsEngine {
  readonly engineType: TtsEngineType

  /**
   * テキストを音声に変換して WAV として保存し、出力パスを返す
   */
  synthesize(
    text: string,
    outputPath: string,
    voice: VoicevoxVoiceProfile,
    options?: TtsSynthesizeOptions
  ): Promise<string>
}
