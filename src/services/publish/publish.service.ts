import { promises as fs } from 'node:fs'
import path from 'node:path'
import { VIDEO_URL_PLACEHOLDER, type ScriptDocument } from '../../types/script'
import { describeError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import { withRetry } from '../../utils/retry'
import type { TextPoster, VideoPublisher } from './webhook-publisher'

export interface PublishServiceDeps {
  video?: VideoPublisher
  shorts?: VideoPublisher
  post?: TextPoster
  retry: { maxRetries: number; baseDelayMs: number; maxDelayMs: number }
}

export interface PublishInput {
  runId: string
  runDir: string
  script: ScriptDocument
  wideVideo: string
  tallVideo: string
  thumbnail?: string
}

export interface PublishResult {
  videoUrl: string
  shortsUrl?: string
  postUrl?: string
  /** 副次的な公開の失敗。動画本体の公開は成功している */
  errors: string[]
  publishedAt: string
}

export const NOTE_FILE = 'note.md'
export const X_POST_FILE = 'x_post.txt'
export const UPLOAD_INFO_FILE = 'upload_info.json'

export const substituteVideoUrl = (template: string, url: string) => template.split(VIDEO_URL_PLACEHOLDER).join(url)

/** 告知文を書き出す。公開済みなら URL を埋めた状態で書く */
export const writePublishTemplates = async (runDir: string, script: ScriptDocument, videoUrl?: string) => {
  const fill = (template: string) => (videoUrl === undefined ? template : substituteVideoUrl(template, videoUrl))
  await fs.writeFile(path.join(runDir, NOTE_FILE), fill(script.noteContent), 'utf8')
  await fs.writeFile(path.join(runDir, X_POST_FILE), fill(script.xPostContent), 'utf8')
}

export class PublishService {
  constructor(private readonly deps: PublishServiceDeps) {}

  get enabled(): boolean {
    return this.deps.video !== undefined
  }

  async publish(input: PublishInput, signal?: AbortSignal): Promise<PublishResult> {
    const video = this.deps.video
    if (!video) {
      throw new Error('動画の公開先が設定されていません')
    }
    const retry = { ...this.deps.retry, signal }
    const description = input.script.noteContent

    const { url: videoUrl } = await withRetry(
      () =>
        video.uploadVideo(
          { videoPath: input.wideVideo, thumbnailPath: input.thumbnail, title: input.script.meta.title, description },
          signal
        ),
      { ...retry, label: 'publish:video' }
    )
    logger.info({ runId: input.runId, videoUrl }, 'Video published')

    const note = substituteVideoUrl(input.script.noteContent, videoUrl)
    const xPost = substituteVideoUrl(input.script.xPostContent, videoUrl)
    await fs.writeFile(path.join(input.runDir, NOTE_FILE), note, 'utf8')
    await fs.writeFile(path.join(input.runDir, X_POST_FILE), xPost, 'utf8')

    const errors: string[] = []
    let shortsUrl: string | undefined
    const shorts = this.deps.shorts
    if (shorts) {
      try {
        const result = await withRetry(
          () =>
            shorts.uploadVideo({ videoPath: input.tallVideo, title: input.script.meta.title, description: xPost }, signal),
          { ...retry, label: 'publish:shorts' }
        )
        shortsUrl = result.url
      } catch (error) {
        signal?.throwIfAborted()
        logger.warn({ runId: input.runId, err: error }, 'Shorts upload failed')
        errors.push(`shorts: ${describeError(error)}`)
      }
    }

    let postUrl: string | undefined
    const post = this.deps.post
    if (post && xPost.trim()) {
      try {
        const result = await withRetry(() => post.postText(xPost, signal), { ...retry, label: 'publish:post' })
        postUrl = result.url
      } catch (error) {
        signal?.throwIfAborted()
        logger.warn({ runId: input.runId, err: error }, 'Text post failed')
        errors.push(`post: ${describeError(error)}`)
      }
    }

    const result: PublishResult = { videoUrl, shortsUrl, postUrl, errors, publishedAt: new Date().toISOString() }
    await fs.writeFile(
      path.join(input.runDir, UPLOAD_INFO_FILE),
      `${JSON.stringify({ title: input.script.meta.title, ...result }, null, 2)}\n`,
      'utf8'
    )
    return result
  }
}
