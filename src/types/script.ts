import { z } from 'zod'

export const SPEAKERS = ['tsuno', 'megane'] as const
export const EMOTIONS = ['normal', 'happy', 'angry', 'sad', 'surprised'] as const

export const speakerSchema = z.enum(SPEAKERS)
export const emotionSchema = z.enum(EMOTIONS)

export type Speaker = z.infer<typeof speakerSchema>
export type Emotion = z.infer<typeof emotionSchema>

/** 動画説明文・投稿文に埋め込む公開URLのプレースホルダー */
export const VIDEO_URL_PLACEHOLDER = '{video_url}'

export const dialogueEntrySchema = z.object({
  speaker: speakerSchema,
  text: z.string(),
  emotion: emotionSchema.default('normal'),
  shortsSkip: z.boolean().default(false),
})

export const scriptDocumentSchema = z.object({
  meta: z.object({
    theme: z.string().min(1),
    title: z.string().min(1),
  }),
  dialogue: z.array(dialogueEntrySchema).min(1),
  noteContent: z.string().default(''),
  xPostContent: z.string().default(''),
})

export type DialogueEntry = z.infer<typeof dialogueEntrySchema>
export type ScriptDocument = z.infer<typeof scriptDocumentSchema>

/** 台本の1行。rawText は注釈マークアップを含む原文 */
export interface DialogueLine {
  readonly speaker: Speaker
  readonly rawText: string
  readonly emotion: Emotion
  readonly shortsSkip: boolean
}

export const toDialogueLines = (script: ScriptDocument): DialogueLine[] =>
  script.dialogue.map((entry) => ({
    speaker: entry.speaker,
    rawText: entry.text,
    emotion: entry.emotion,
    shortsSkip: entry.shortsSkip,
  }))
