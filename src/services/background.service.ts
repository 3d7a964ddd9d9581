import { promises as fs } from 'node:fs'
import path from 'node:path'
import type { LayoutKind } from '../types/schedule'
import { isAbortError, isFileNotFound } from '../utils/errors'
import { logger } from '../utils/logger'
import { withRetry } from '../utils/retry'
import type { MediaPipeline, Size } from './media-pipeline'
import type { ImageGenerator, ImageSize } from './openai-client'

export interface BackgroundServiceDeps {
  /** 未設定なら常に単色背景 */
  generator?: ImageGenerator
  mediaPipeline: MediaPipeline
  model: string
  style: string
  fallbackColor: string
  sizes: Record<LayoutKind, Size>
  retry: { maxRetries: number; baseDelayMs: number; maxDelayMs: number }
}

export interface BackgroundResult {
  path: string
  fallback: boolean
}

const GENERATION_SIZE: Record<LayoutKind, ImageSize> = {
  wide: '1536x1024',
  tall: '1024x1536',
}

export const buildBackgroundPrompt = (topic: string, style: string, layout: LayoutKind) =>
  `${style}. Theme: ${topic}. ${layout === 'wide' ? 'Landscape' : 'Portrait'} composition with calm space for characters and captions.`

const exists = async (filePath: string) => {
  try {
    await fs.access(filePath)
    return true
  } catch (error) {
    if (isFileNotFound(error)) return false
    throw error
  }
}

export class BackgroundService {
  constructor(private readonly deps: BackgroundServiceDeps) {}

  /**
   * 背景画像を用意する。既にあれば再利用し、生成に失敗したら単色で埋める。
   */
  async ensureBackground(
    topic: string,
    layout: LayoutKind,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<BackgroundResult> {
    if (await exists(outputPath)) {
      return { path: outputPath, fallback: false }
    }

    const size = this.deps.sizes[layout]
    const generator = this.deps.generator
    if (generator) {
      const rawPath = path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.raw.png`)
      try {
        const image = await withRetry(
          () =>
            generator.generateImage(buildBackgroundPrompt(topic, this.deps.style, layout), GENERATION_SIZE[layout], {
              model: this.deps.model,
              signal,
            }),
          { ...this.deps.retry, shouldRetry: (error) => !isAbortError(error), signal, label: `background:${layout}` }
        )
        await fs.writeFile(rawPath, image)
        await this.deps.mediaPipeline.fitImage(rawPath, size, outputPath, signal)
        logger.info({ layout, outputPath }, 'Background generated')
        return { path: outputPath, fallback: false }
      } catch (error) {
        if (isAbortError(error)) throw error
        logger.warn({ layout, err: error }, 'Background generation failed; using solid color')
      } finally {
        await fs.rm(rawPath, { force: true })
      }
    }

    await this.deps.mediaPipeline.renderSolidImage(this.deps.fallbackColor, size, outputPath, signal)
    return { path: outputPath, fallback: true }
  }
}
