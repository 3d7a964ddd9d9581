import { z } from 'zod'
import { emotionSchema, speakerSchema } from './script'

export const layoutKindSchema = z.enum(['wide', 'tall'])

/** 縦型の尺の上限 (秒) の既定値。超えたら shortsSkip の行を落とす */
export const SHORTS_MAX_DURATION_SEC = 180

export type LayoutKind = z.infer<typeof layoutKindSchema>

export const screenSideSchema = z.enum(['left', 'right'])
export type ScreenSide = z.infer<typeof screenSideSchema>

export const motionOffsetsSchema = z.object({
  characterFloat: z.number(),
  /** ロゴ表示区間外では null */
  logoShake: z.number().nullable(),
  /** エンディング区間外では null */
  endingBounce: z.number().nullable(),
})

export const characterPlacementSchema = z.object({
  speaker: speakerSchema,
  side: screenSideSchema,
  role: z.enum(['foreground', 'background']),
  emotion: emotionSchema,
  /** 足元中央の座標 */
  centerX: z.number(),
  baselineY: z.number(),
  height: z.number().positive(),
  scale: z.number().positive(),
  brightness: z.number().min(0).max(1),
})

export const captionRegionSchema = z.object({
  text: z.string(),
  lines: z.array(z.string()),
  centerX: z.number(),
  y: z.number(),
  maxWidth: z.number().positive(),
  fontSize: z.number().positive(),
})

export const chatBubbleSchema = z.object({
  lineIndex: z.number().int().nonnegative(),
  speaker: speakerSchema,
  side: screenSideSchema,
  lines: z.array(z.string()),
  x: z.number(),
  y: z.number(),
  width: z.number().positive(),
  height: z.number().positive(),
  fontSize: z.number().positive(),
  /** 0 が最新 */
  age: z.number().int().nonnegative(),
  opacity: z.number().min(0).max(1),
})

export const wideDecorationSchema = z.object({
  kind: z.literal('wide'),
  characters: z.array(characterPlacementSchema),
  caption: captionRegionSchema,
})

export const tallDecorationSchema = z.object({
  kind: z.literal('tall'),
  bubbles: z.array(chatBubbleSchema),
  /** 吹き出しの下に出す話者 */
  avatar: characterPlacementSchema,
})

export const layoutDecorationSchema = z.discriminatedUnion('kind', [wideDecorationSchema, tallDecorationSchema])

export const frameStateSchema = z.object({
  frameIndex: z.number().int().nonnegative(),
  timeSec: z.number().nonnegative(),
  activeLine: z.number().int().nonnegative(),
  speaker: speakerSchema,
  emotion: emotionSchema,
  mouthOpen: z.boolean(),
  motionOffsets: motionOffsetsSchema,
  layoutVariant: layoutDecorationSchema,
})

export const scheduledLineSchema = z.object({
  lineIndex: z.number().int().nonnegative(),
  speaker: speakerSchema,
  emotion: emotionSchema,
  captionText: z.string(),
  startFrame: z.number().int().nonnegative(),
  frameCount: z.number().int().nonnegative(),
  decoration: layoutDecorationSchema,
})

const timeWindowSchema = z.object({
  startSec: z.number().nonnegative(),
  endSec: z.number().nonnegative(),
})

export const scheduleMotionSchema = z.object({
  float: z.object({ amplitude: z.number(), frequency: z.number() }),
  shake: z.object({ amplitude: z.number(), frequency: z.number() }),
  logo: timeWindowSchema.nullable(),
  ending: timeWindowSchema.extend({ periodSec: z.number().positive() }).nullable(),
})

export const renderScheduleSchema = z.object({
  layout: layoutKindSchema,
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  frameRate: z.number().positive(),
  totalFrames: z.number().int().nonnegative(),
  durationSec: z.number().nonnegative(),
  /** 縦型の尺制限で落とした行 */
  skippedLines: z.array(z.number().int().nonnegative()),
  motion: scheduleMotionSchema,
  lines: z.array(scheduledLineSchema),
  frames: z.array(frameStateSchema),
})

export type MotionOffsets = z.infer<typeof motionOffsetsSchema>
export type CharacterPlacement = z.infer<typeof characterPlacementSchema>
export type CaptionRegion = z.infer<typeof captionRegionSchema>
export type ChatBubble = z.infer<typeof chatBubbleSchema>
export type WideDecoration = z.infer<typeof wideDecorationSchema>
export type TallDecoration = z.infer<typeof tallDecorationSchema>
export type LayoutDecoration = z.infer<typeof layoutDecorationSchema>
export type FrameState = z.infer<typeof frameStateSchema>
export type ScheduledLine = z.infer<typeof scheduledLineSchema>
export type ScheduleMotion = z.infer<typeof scheduleMotionSchema>
export type RenderSchedule = z.infer<typeof renderScheduleSchema>

export const LAYOUTS: readonly LayoutKind[] = ['wide', 'tall']
