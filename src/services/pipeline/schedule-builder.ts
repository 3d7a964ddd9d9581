import type { ResolvedConfig } from '../../config/loader'
import type { AudioClip } from '../../types/media'
import type { LayoutKind, RenderSchedule } from '../../types/schedule'
import type { DialogueLine } from '../../types/script'
import { buildVisemeTracks } from '../lip-sync'
import { DEFAULT_TALL_LAYOUT, DEFAULT_WIDE_LAYOUT, compose, type CompositorOptions } from '../timeline'

export type ScheduleConfig = Pick<ResolvedConfig, 'video' | 'motion' | 'caption' | 'tall' | 'characters' | 'lipSync' | 'tts'>

export const buildCompositorOptions = (
  config: ScheduleConfig,
  layout: LayoutKind,
  shakeFrequency: number
): CompositorOptions => {
  const size = config.video[layout]
  const bubbleFontSize = config.caption.bubbleFontSize
  return {
    frameRate: config.video.frameRate,
    width: size.width,
    height: size.height,
    shortsMaxDurationSec: config.video.shortsMaxDurationSec,
    cast: config.characters.map((character) => ({ speaker: character.id, side: character.side })),
    motion: {
      float: config.motion.float,
      shakeAmplitude: config.motion.shake.amplitude,
      shakeFrequency,
      logoSeconds: config.motion.logoSeconds,
      endingSeconds: config.motion.endingSeconds,
      bouncePeriodSec: config.motion.bouncePeriodSec,
    },
    wide: { ...DEFAULT_WIDE_LAYOUT, captionFontSize: config.caption.fontSize },
    tall: {
      ...DEFAULT_TALL_LAYOUT,
      fontSize: bubbleFontSize,
      lineHeight: Math.round((bubbleFontSize * 4) / 3),
      opacityStep: config.tall.opacityStep,
      minOpacity: config.tall.minOpacity,
      bottomMargin: config.tall.bottomMargin,
    },
  }
}

export interface BuildSchedulesInput {
  lines: readonly DialogueLine[]
  clips: readonly AudioClip[]
  /** clip.audioPath の基準 */
  runDir: string
  shakeFrequency: number
}

/**
 * 口パクを抽出して両レイアウトのスケジュールを作る。同じ音声からは同じ結果になる。
 */
export const buildSchedules = async (
  config: ScheduleConfig,
  input: BuildSchedulesInput
): Promise<Record<LayoutKind, RenderSchedule>> => {
  const tracks = await buildVisemeTracks(input.clips, {
    baseDir: input.runDir,
    frameRate: config.video.frameRate,
    openThreshold: config.lipSync.openThreshold,
    minOpenFrames: config.lipSync.minOpenFrames,
    concurrency: config.tts.concurrency,
  })
  return {
    wide: compose(input.lines, input.clips, tracks, 'wide', buildCompositorOptions(config, 'wide', input.shakeFrequency)),
    tall: compose(input.lines, input.clips, tracks, 'tall', buildCompositorOptions(config, 'tall', input.shakeFrequency)),
  }
}
