import { z } from 'zod'
import { audioClipSchema } from './media'

export const PROGRESS_STAGES = [
  'ScriptPending',
  'ScriptReady',
  'BackgroundReady',
  'AudioReady',
  'ScheduleReady',
  'Rendered',
  'Published',
  'Done',
] as const

export const progressStageSchema = z.enum(PROGRESS_STAGES)
export const stageSchema = z.union([progressStageSchema, z.literal('Failed')])

export type ProgressStage = z.infer<typeof progressStageSchema>
export type Stage = z.infer<typeof stageSchema>

export const regenerableArtifactSchema = z.enum(['thumbnail', 'schedules', 'renders'])
export type RegenerableArtifact = z.infer<typeof regenerableArtifactSchema>

const layoutPairSchema = z.object({
  wide: z.string().min(1),
  tall: z.string().min(1),
})

export const pipelineRunSchema = z.object({
  runId: z.string().min(1),
  topic: z.string().min(1),
  instructions: z.string().optional(),
  stage: stageSchema,
  /** Failed のときに再開する位置 */
  lastCompletedStage: progressStageSchema,
  failure: z
    .object({
      stage: progressStageSchema,
      kind: z.string(),
      message: z.string(),
      at: z.string(),
    })
    .nullable(),
  /** ロゴの震えの周波数。ラン作成時に一度だけ決める */
  shakeFrequency: z.number().positive(),
  createdAt: z.string(),
  updatedAt: z.string(),
  artifacts: z.object({
    script: z.string().nullable(),
    backgrounds: layoutPairSchema.extend({ fallback: z.boolean() }).nullable(),
    audioClips: z.array(audioClipSchema).nullable(),
    schedules: layoutPairSchema.nullable(),
    renders: layoutPairSchema.extend({ thumbnail: z.string().min(1) }).nullable(),
    publish: z
      .object({
        videoUrl: z.string(),
        shortsUrl: z.string().optional(),
        postUrl: z.string().optional(),
        errors: z.array(z.string()),
        publishedAt: z.string(),
      })
      .nullable(),
  }),
})

export type PipelineRun = z.infer<typeof pipelineRunSchema>
export type RunArtifacts = PipelineRun['artifacts']
