import { z } from 'zod'
import { speakerSchema } from './script'

export const audioClipSchema = z.object({
  lineIndex: z.number().int().nonnegative(),
  speaker: speakerSchema,
  /** ランディレクトリからの相対パス */
  audioPath: z.string().min(1),
  /** WAV をデコードして計測した秒数 */
  durationSec: z.number().nonnegative(),
  silent: z.boolean(),
  narrationText: z.string(),
})

export type AudioClip = Readonly<z.infer<typeof audioClipSchema>>

export interface VisemeTrack {
  readonly lineIndex: number
  readonly frameRate: number
  readonly mouthOpen: readonly boolean[]
}

/** モノラルにダウンミックス済みの波形 */
export interface Waveform {
  readonly samples: Float32Array
  readonly sampleRate: number
}
