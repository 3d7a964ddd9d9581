import { z } from 'zod'
import { progressStageSchema, regenerableArtifactSchema } from '../types/run'

const untilSchema = progressStageSchema.optional()

export const createRunRequestSchema = z
  .object({
    topic: z.string().trim().min(1).optional(),
    instructions: z.string().trim().min(1).optional(),
    until: untilSchema,
  })
  .refine((data) => data.topic !== undefined || data.instructions !== undefined, {
    message: 'topic or instructions is required',
    path: ['topic'],
  })

export const advanceRequestSchema = z.object({
  until: untilSchema,
})

export const regenerateRequestSchema = z.object({
  artifact: regenerableArtifactSchema,
})

export type CreateRunRequest = z.infer<typeof createRunRequestSchema>
