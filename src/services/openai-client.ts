import OpenAI from 'openai'
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions'
import { TransientExternalError } from '../utils/errors'

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface JsonCompletionOptions {
  model: string
  temperature: number
  signal?: AbortSignal
}

/** JSON オブジェクトだけを返すチャット補完 */
export interface JsonChatClient {
  completeJson(messages: ChatMessage[], options: JsonCompletionOptions): Promise<string>
}

export type ImageSize = '1536x1024' | '1024x1536' | '1024x1024'

export interface ImageGenerator {
  generateImage(prompt: string, size: ImageSize, options: { model: string; signal?: AbortSignal }): Promise<Buffer>
}

export interface OpenAiClientOptions {
  apiKey?: string
  baseUrl?: string
}

const SERVICE = 'openai'

/**
 * SDK のエラーを再試行可能かどうかで分類する
 */
export const classifyOpenAiError = (error: unknown): unknown => {
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransientExternalError(`OpenAI への接続に失敗しました: ${error.message}`, SERVICE)
  }
  if (error instanceof OpenAI.APIError && error.status !== undefined && (error.status >= 500 || error.status === 429)) {
    return new TransientExternalError(`OpenAI API エラー (${error.status}): ${error.message}`, SERVICE, error.status)
  }
  return error
}

const toMessageParam = (message: ChatMessage): ChatCompletionMessageParam => {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content }
    case 'user':
      return { role: 'user', content: message.content }
    case 'assistant':
      return { role: 'assistant', content: message.content }
    default: {
      const _exhaustiveCheck: never = message.role
      throw new Error(`Unknown role: ${String(_exhaustiveCheck)}`)
    }
  }
}

export class OpenAiClient implements JsonChatClient, ImageGenerator {
  private readonly client: OpenAI

  constructor(options: OpenAiClientOptions = {}) {
    this.client = new OpenAI({
      apiKey: options.apiKey ?? 'missing-api-key',
      baseURL: options.baseUrl,
      // 再試行は呼び出し側のバックオフで行う
      maxRetries: 0,
    })
  }

  async completeJson(messages: ChatMessage[], options: JsonCompletionOptions): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: options.model,
          messages: messages.map(toMessageParam),
          response_format: { type: 'json_object' },
          temperature: options.temperature,
        },
        { signal: options.signal }
      )
      return response.choices[0]?.message?.content ?? ''
    } catch (error) {
      throw classifyOpenAiError(error)
    }
  }

  async generateImage(prompt: string, size: ImageSize, options: { model: string; signal?: AbortSignal }): Promise<Buffer> {
    let b64Image: string | undefined
    try {
      const response = await this.client.images.generate({ model: options.model, prompt, n: 1, size }, { signal: options.signal })
      b64Image = response.data?.[0]?.b64_json
    } catch (error) {
      throw classifyOpenAiError(error)
    }
    if (!b64Image) {
      throw new TransientExternalError('画像データが返されませんでした', SERVICE)
    }
    return Buffer.from(b64Image, 'base64')
  }
}
