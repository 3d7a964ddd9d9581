import { promises as fs } from 'node:fs'
import path from 'node:path'
import { FormData, fetch } from 'undici'
import { z } from 'zod'
import { InvalidPayloadError, TransientExternalError } from '../../utils/errors'

export interface VideoUpload {
  videoPath: string
  thumbnailPath?: string
  title: string
  description: string
}

export interface PublishedArtifact {
  url: string
}

export interface VideoPublisher {
  uploadVideo(upload: VideoUpload, signal?: AbortSignal): Promise<PublishedArtifact>
}

export interface TextPoster {
  postText(text: string, signal?: AbortSignal): Promise<PublishedArtifact>
}

const publishResponseSchema = z.object({ url: z.string().url() })

export interface WebhookPublisherOptions {
  url: string
  apiKey?: string
  service: string
}

/**
 * アップロード処理を受け持つ外部エンドポイントに投げ、公開URLを受け取る
 */
export class WebhookPublisher implements VideoPublisher, TextPoster {
  constructor(private readonly options: WebhookPublisherOptions) {}

  async uploadVideo(upload: VideoUpload, signal?: AbortSignal): Promise<PublishedArtifact> {
    const form = new FormData()
    form.append('title', upload.title)
    form.append('description', upload.description)
    form.append('video', new Blob([await fs.readFile(upload.videoPath)], { type: 'video/mp4' }), path.basename(upload.videoPath))
    if (upload.thumbnailPath) {
      form.append(
        'thumbnail',
        new Blob([await fs.readFile(upload.thumbnailPath)], { type: 'image/png' }),
        path.basename(upload.thumbnailPath)
      )
    }
    return this.send(form, signal)
  }

  async postText(text: string, signal?: AbortSignal): Promise<PublishedArtifact> {
    return this.send(JSON.stringify({ text }), signal, { 'Content-Type': 'application/json' })
  }

  private async send(
    body: FormData | string,
    signal: AbortSignal | undefined,
    headers: Record<string, string> = {}
  ): Promise<PublishedArtifact> {
    const response = await fetch(this.options.url, {
      method: 'POST',
      headers: this.options.apiKey ? { ...headers, Authorization: `Bearer ${this.options.apiKey}` } : headers,
      body,
      signal,
    })
    if (!response.ok) {
      const message = await response.text().catch(() => '')
      const detail = `${this.options.service} への公開に失敗しました (${response.status}): ${message}`
      if (response.status >= 500 || response.status === 429) {
        throw new TransientExternalError(detail, this.options.service, response.status)
      }
      throw new InvalidPayloadError(detail, this.options.service, message)
    }
    const parsed = publishResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new InvalidPayloadError(`${this.options.service} の応答に url がありません`, this.options.service)
    }
    return parsed.data
  }
}
