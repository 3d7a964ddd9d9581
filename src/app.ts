import express from 'express'
import path from 'node:path'
import { loadConfig, type ResolvedConfig } from './config/loader'
import { MediaPipeline } from './services/media-pipeline'
import { VoicevoxCompatibleEngine } from './services/tts/engines/voicevox-compatible'
import { SpeechService } from './services/speech.service'
import { OpenAiClient } from './services/openai-client'
import { ScriptService } from './services/script.service'
import { BackgroundService } from './services/background.service'
import { ScheduleRenderer } from './services/render'
import { PublishService } from './services/publish/publish.service'
import { WebhookPublisher } from './services/publish/webhook-publisher'
import { RunStore } from './services/pipeline/run-store'
import { PipelineOrchestrator } from './services/pipeline/orchestrator'
import { createRunsRouter } from './api/runs.controller'
import { createDocsRouter } from './api/docs'
import { createErrorHandler, notFoundHandler } from './api/middleware/error-handler'
import { logger } from './utils/logger'

export interface CreateAppOptions {
  configPath?: string
}

const createPublishService = (config: ResolvedConfig) => {
  const { videoUploadUrl, shortsUploadUrl, postUrl, apiKey } = config.publish
  return new PublishService({
    video: videoUploadUrl ? new WebhookPublisher({ url: videoUploadUrl, apiKey, service: 'video' }) : undefined,
    shorts: shortsUploadUrl ? new WebhookPublisher({ url: shortsUploadUrl, apiKey, service: 'shorts' }) : undefined,
    post: postUrl ? new WebhookPublisher({ url: postUrl, apiKey, service: 'post' }) : undefined,
    retry: config.publish.retry,
  })
}

export const createOrchestrator = (config: ResolvedConfig) => {
  const mediaPipeline = new MediaPipeline()
  const store = new RunStore(config.paths.outputDir)

  const chat = new OpenAiClient({ apiKey: config.openai.apiKey, baseUrl: config.script.baseUrl ?? config.openai.baseUrl })
  const images = new OpenAiClient({ apiKey: config.openai.apiKey, baseUrl: config.image.baseUrl ?? config.openai.baseUrl })
  if (!config.openai.apiKey) {
    logger.warn('OPENAI_API_KEY is not set; script generation will fail until it is provided')
  }

  const speech = new SpeechService({
    engine: new VoicevoxCompatibleEngine({ engineType: config.tts.ttsEngine, url: config.tts.url }),
    mediaPipeline,
    characters: config.characterMap,
    concurrency: config.tts.concurrency,
    retry: config.tts.retry,
  })

  const backgrounds = new BackgroundService({
    generator: config.image.enabled && config.openai.apiKey ? images : undefined,
    mediaPipeline,
    model: config.image.model,
    style: config.image.style,
    fallbackColor: config.video.backgroundColor,
    sizes: { wide: config.video.wide, tall: config.video.tall },
    retry: config.image.retry,
  })

  const orchestrator = new PipelineOrchestrator({
    config,
    store,
    scriptSource: new ScriptService({
      chat,
      model: config.script.model,
      temperature: config.script.temperature,
      maxRetries: config.script.maxRetries,
      retry: config.script.retry,
    }),
    backgrounds,
    speech,
    renderer: new ScheduleRenderer(),
    publisher: createPublishService(config),
    mediaPipeline,
  })

  return { orchestrator, store }
}

export const createApp = async (options: CreateAppOptions = {}) => {
  const configPath = options.configPath ?? path.resolve(process.cwd(), 'config/pipeline.json')
  const config = await loadConfig(configPath)
  const { orchestrator, store } = createOrchestrator(config)

  const app = express()
  app.use(express.json({ limit: '2mb' }))

  app.use('/api', createRunsRouter(orchestrator, store, { apiKey: config.server.apiKey }))
  app.use('/docs', createDocsRouter(config.paths.projectRoot))
  app.get('/health', (_req, res) => res.json({ status: 'ok' }))
  app.use(notFoundHandler)
  app.use(createErrorHandler(logger))

  return { app, config, orchestrator }
}

export type { ResolvedConfig }
