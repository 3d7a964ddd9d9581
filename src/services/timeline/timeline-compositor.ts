import type { AudioClip, VisemeTrack } from '../../types/media'
import type { DialogueLine } from '../../types/script'
import type {
  FrameState,
  LayoutDecoration,
  LayoutKind,
  MotionOffsets,
  RenderSchedule,
  ScheduledLine,
  ScheduleMotion,
} from '../../types/schedule'
import { DataIntegrityError } from '../../utils/errors'
import { processAnnotations } from '../annotation'
import { frameCountFor } from '../lip-sync/viseme-extractor'
import { bounce, floatOffset, shakeOffset, type WaveParams } from '../motion/motion-engine'
import {
  buildTallDecoration,
  buildWideDecoration,
  measureBubble,
  type BubbleShape,
  type CastMember,
  type TallLayoutOptions,
  type WideLayoutOptions,
} from './layouts'

export interface MotionSettings {
  float: WaveParams
  shakeAmplitude: number
  /** ランごとに一度だけ決めた周波数 */
  shakeFrequency: number
  /** ロゴを表示する冒頭の秒数。null ならロゴなし */
  logoSeconds: number | null
  /** エンディング演出の秒数。null なら演出なし */
  endingSeconds: number | null
  bouncePeriodSec: number
}

export interface CompositorOptions {
  frameRate: number
  width: number
  height: number
  shortsMaxDurationSec: number
  cast: readonly CastMember[]
  motion: MotionSettings
  wide: WideLayoutOptions
  tall: TallLayoutOptions
}

export interface SkipFilterResult {
  included: number[]
  skipped: number[]
}

/**
 * 縦型の尺制限。合計が上限を超えたら shortsSkip の行を一度だけ落とす。
 * 落とした後も上限を超えていても、それ以上は削らない。
 */
export const selectLinesForLayout = (
  lines: readonly DialogueLine[],
  clips: readonly AudioClip[],
  layout: LayoutKind,
  maxDurationSec: number
): SkipFilterResult => {
  const all = lines.map((_line, index) => index)
  if (layout === 'wide') {
    return { included: all, skipped: [] }
  }
  const total = clips.reduce((sum, clip) => sum + clip.durationSec, 0)
  if (total <= maxDurationSec) {
    return { included: all, skipped: [] }
  }
  return {
    included: all.filter((index) => !lines[index].shortsSkip),
    skipped: all.filter((index) => lines[index].shortsSkip),
  }
}

const assertInputs = (
  lines: readonly DialogueLine[],
  clips: ReadonlyArray<AudioClip | undefined>,
  tracks: ReadonlyArray<VisemeTrack | undefined>,
  frameRate: number
): { clips: AudioClip[]; tracks: VisemeTrack[] } => {
  const checkedClips: AudioClip[] = []
  const checkedTracks: VisemeTrack[] = []
  lines.forEach((_line, index) => {
    const clip = clips[index]
    if (!clip || clip.lineIndex !== index) {
      throw new DataIntegrityError(`行 ${index} の音声クリップがありません`)
    }
    const track = tracks[index]
    if (!track || track.lineIndex !== index) {
      throw new DataIntegrityError(`行 ${index} の口パクトラックがありません`)
    }
    if (track.frameRate !== frameRate) {
      throw new DataIntegrityError(`行 ${index} の口パクトラックのフレームレートが一致しません (${track.frameRate} != ${frameRate})`)
    }
    const expected = frameCountFor(clip.durationSec, frameRate)
    if (track.mouthOpen.length !== expected) {
      throw new DataIntegrityError(
        `行 ${index} の口パクトラック長が音声と一致しません (${track.mouthOpen.length} != ${expected})`
      )
    }
    checkedClips.push(clip)
    checkedTracks.push(track)
  })
  if (clips.length !== lines.length || tracks.length !== lines.length) {
    throw new DataIntegrityError(
      `台本 ${lines.length} 行に対して音声 ${clips.length} 件、口パク ${tracks.length} 件です`
    )
  }
  return { clips: checkedClips, tracks: checkedTracks }
}

const buildScheduleMotion = (motion: MotionSettings, durationSec: number): ScheduleMotion => ({
  float: motion.float,
  shake: { amplitude: motion.shakeAmplitude, frequency: motion.shakeFrequency },
  logo: motion.logoSeconds === null ? null : { startSec: 0, endSec: Math.min(motion.logoSeconds, durationSec) },
  ending:
    motion.endingSeconds === null
      ? null
      : {
          startSec: Math.max(0, durationSec - motion.endingSeconds),
          endSec: durationSec,
          periodSec: motion.bouncePeriodSec,
        },
})

export const motionOffsetsAt = (t: number, motion: ScheduleMotion): MotionOffsets => ({
  characterFloat: floatOffset(t, motion.float),
  logoShake:
    motion.logo && t >= motion.logo.startSec && t < motion.logo.endSec
      ? shakeOffset(t, motion.shake.frequency, motion.shake.amplitude)
      : null,
  endingBounce:
    motion.ending && t >= motion.ending.startSec ? bounce(t - motion.ending.startSec, motion.ending.periodSec) : null,
})

/**
 * 台本・音声・口パクから1レイアウト分のフレーム単位スケジュールを作る。
 */
export const compose = (
  lines: readonly DialogueLine[],
  audioClips: ReadonlyArray<AudioClip | undefined>,
  visemeTracks: ReadonlyArray<VisemeTrack | undefined>,
  layout: LayoutKind,
  options: CompositorOptions
): RenderSchedule => {
  const { frameRate, width, height } = options
  const { clips, tracks } = assertInputs(lines, audioClips, visemeTracks, frameRate)
  const { included, skipped } = selectLinesForLayout(lines, clips, layout, options.shortsMaxDurationSec)

  const captions = lines.map((line) => processAnnotations(line.rawText).captionText)
  const sideOf = new Map(options.cast.map((member) => [member.speaker, member.side]))

  // 吹き出しの形は行ごとに独立
  const bubbleShapes: BubbleShape[] =
    layout === 'tall'
      ? included.map((index) =>
          measureBubble(index, lines[index].speaker, sideOf.get(lines[index].speaker) ?? 'left', captions[index], width, options.tall)
        )
      : []

  const totalFrames = included.reduce((sum, index) => sum + tracks[index].mouthOpen.length, 0)
  const durationSec = totalFrames / frameRate
  const motion = buildScheduleMotion(options.motion, durationSec)

  const scheduledLines: ScheduledLine[] = []
  const frames: FrameState[] = []
  let cursor = 0

  included.forEach((index, position) => {
    const line = lines[index]
    const track = tracks[index]
    const decoration: LayoutDecoration =
      layout === 'wide'
        ? buildWideDecoration(line, captions[index], options.cast, { width, height }, options.wide)
        : buildTallDecoration(line, bubbleShapes.slice(0, position + 1), { width, height }, options.tall)

    scheduledLines.push({
      lineIndex: index,
      speaker: line.speaker,
      emotion: line.emotion,
      captionText: captions[index],
      startFrame: cursor,
      frameCount: track.mouthOpen.length,
      decoration,
    })

    track.mouthOpen.forEach((mouthOpen, offset) => {
      const frameIndex = cursor + offset
      const timeSec = frameIndex / frameRate
      frames.push({
        frameIndex,
        timeSec,
        activeLine: index,
        speaker: line.speaker,
        emotion: line.emotion,
        mouthOpen,
        motionOffsets: motionOffsetsAt(timeSec, motion),
        layoutVariant: decoration,
      })
    })
    cursor += track.mouthOpen.length
  })

  return {
    layout,
    width,
    height,
    frameRate,
    totalFrames,
    durationSec,
    skippedLines: skipped,
    motion,
    lines: scheduledLines,
    frames,
  }
}
