import { z } from 'zod'
import { SPEAKERS, emotionSchema, speakerSchema } from '../types/script'
import { SHORTS_MAX_DURATION_SEC, screenSideSchema } from '../types/schedule'

const sizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
})

const retrySchema = z.object({
  maxRetries: z.number().int().nonnegative().default(3),
  baseDelayMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().nonnegative().default(8000),
})

// VOICEVOX互換の音声合成パラメータ
const synthesisParamsSchema = z.object({
  speedScale: z.number().positive().optional(),
  pitchScale: z.number().optional(),
  intonationScale: z.number().nonnegative().optional(),
  volumeScale: z.number().nonnegative().optional(),
  outputSamplingRate: z.number().int().positive().optional(),
  outputStereo: z.boolean().optional(),
})

export const voiceSchema = synthesisParamsSchema.extend({
  emotion: emotionSchema.default('normal'),
  speakerId: z.number().int().nonnegative(),
})

const imagePairSchema = z.object({
  closed: z.string().min(1),
  open: z.string().min(1),
})

const characterSchema = z
  .object({
    id: speakerSchema,
    displayName: z.string().min(1),
    side: screenSideSchema,
    voices: z.array(voiceSchema).min(1),
    images: z.record(emotionSchema, imagePairSchema),
  })
  .refine((data) => data.voices.some((voice) => voice.emotion === 'normal'), {
    message: 'normal の voice は必須です',
    path: ['voices'],
  })
  .refine((data) => data.images.normal !== undefined, {
    message: 'normal の images は必須です',
    path: ['images'],
  })

export const ttsEngineTypeSchema = z.enum(['voicevox', 'coeiroink', 'aivis_speech'])

export const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().positive().default(4000),
      host: z.string().min(1).default('localhost'),
      apiKey: z.string().min(1).optional(),
    })
    .default({}),
  paths: z
    .object({
      outputDir: z.string().min(1).default('output'),
      assetsDir: z.string().min(1).default('assets'),
      readingDictionary: z.string().min(1).default('config/reading_dict.txt'),
    })
    .default({}),
  video: z
    .object({
      frameRate: z.number().int().positive().default(24),
      wide: sizeSchema.default({ width: 1920, height: 1080 }),
      tall: sizeSchema.default({ width: 1080, height: 1920 }),
      shortsMaxDurationSec: z.number().positive().default(SHORTS_MAX_DURATION_SEC),
      backgroundColor: z
        .string()
        .regex(/^#[0-9a-fA-F]{6}$/)
        .default('#141428'),
      thumbnail: sizeSchema.default({ width: 1280, height: 720 }),
    })
    .default({}),
  lipSync: z
    .object({
      openThreshold: z.number().min(0).max(1).default(0.15),
      minOpenFrames: z.number().int().positive().default(2),
    })
    .default({}),
  motion: z
    .object({
      float: z
        .object({ amplitude: z.number().default(8), frequency: z.number().positive().default(0.4) })
        .default({}),
      shake: z
        .object({
          amplitude: z.number().default(3),
          minFrequency: z.number().positive().default(2.5),
          maxFrequency: z.number().positive().default(3),
        })
        .refine((data) => data.minFrequency <= data.maxFrequency, {
          message: 'minFrequency は maxFrequency 以下にしてください',
        })
        .default({}),
      logoSeconds: z.number().positive().nullable().default(3),
      endingSeconds: z.number().positive().nullable().default(2),
      bouncePeriodSec: z.number().positive().default(0.5),
    })
    .default({}),
  caption: z
    .object({
      fontPath: z.string().min(1).default('assets/fonts/NotoSansJP-Bold.ttf'),
      fontSize: z.number().int().positive().default(56),
      bubbleFontSize: z.number().int().positive().default(48),
      titleFontSize: z.number().int().positive().default(96),
    })
    .default({}),
  tall: z
    .object({
      opacityStep: z.number().positive().max(1).default(0.2),
      minOpacity: z.number().positive().max(1).default(0.35),
      bottomMargin: z.number().nonnegative().default(320),
    })
    .default({}),
  logo: z.string().min(1).optional(),
  characters: z
    .array(characterSchema)
    .length(SPEAKERS.length)
    .refine((characters) => SPEAKERS.every((id) => characters.some((character) => character.id === id)), {
      message: `characters には ${SPEAKERS.join(', ')} を1件ずつ設定してください`,
    })
    .refine((characters) => new Set(characters.map((character) => character.side)).size === characters.length, {
      message: 'characters の side が重複しています',
    }),
  tts: z.object({
    ttsEngine: ttsEngineTypeSchema.default('coeiroink'),
    url: z.string().min(1).default('http://localhost:50032'),
    concurrency: z.number().int().positive().default(2),
    retry: retrySchema.default({}),
  }),
  script: z
    .object({
      model: z.string().min(1).default('gpt-4.1-mini'),
      baseUrl: z.string().url().optional(),
      maxRetries: z.number().int().nonnegative().default(2),
      temperature: z.number().min(0).max(2).default(0.9),
      retry: retrySchema.default({}),
    })
    .default({}),
  image: z
    .object({
      enabled: z.boolean().default(true),
      model: z.string().min(1).default('gpt-image-1'),
      baseUrl: z.string().url().optional(),
      style: z.string().default('soft anime background illustration, no characters, no text'),
      retry: retrySchema.default({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 16000 }),
    })
    .default({}),
  publish: z
    .object({
      videoUploadUrl: z.string().url().optional(),
      shortsUploadUrl: z.string().url().optional(),
      postUrl: z.string().url().optional(),
      apiKey: z.string().min(1).optional(),
      retry: retrySchema.default({}),
    })
    .default({}),
})

export type PipelineConfig = z.infer<typeof configSchema>
export type CharacterConfig = PipelineConfig['characters'][number]
export type VoiceConfig = z.infer<typeof voiceSchema>
export type TtsEngineType = z.infer<typeof ttsEngineTypeSchema>
