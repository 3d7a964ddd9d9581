import { SPEAKERS, EMOTIONS, VIDEO_URL_PLACEHOLDER, scriptDocumentSchema, type ScriptDocument } from '../types/script'
import { InvalidPayloadError, describeError } from '../utils/errors'
import { logger } from '../utils/logger'
import { withRetry } from '../utils/retry'
import type { ChatMessage, JsonChatClient } from './openai-client'

export interface ScriptRequest {
  topic: string
  /** 自由形式の指示書 (Markdown など) */
  instructions?: string
}

export interface ScriptSource {
  generate(request: ScriptRequest, signal?: AbortSignal): Promise<ScriptDocument>
}

export interface ScriptServiceDeps {
  chat: JsonChatClient
  model: string
  temperature: number
  /** 不正な応答に対する再要求の回数 */
  maxRetries: number
  retry: { maxRetries: number; baseDelayMs: number; maxDelayMs: number }
}

/** 指示書の最初の `# ` 見出し、なければ最初の空でない行をテーマにする */
export const extractTopic = (document: string): string => {
  const lines = document.split(/\r?\n/).map((line) => line.trim())
  const heading = lines.find((line) => line.startsWith('# '))
  if (heading) return heading.slice(2).trim()
  return lines.find((line) => line.length > 0) ?? ''
}

const SYSTEM_PROMPT = [
  '2人の掛け合いで進むショート動画の台本を作成し、JSONオブジェクトだけを出力してください。',
  '形式: {"meta":{"theme":string,"title":string},"dialogue":[{"speaker":string,"text":string,"emotion":string,"shortsSkip":boolean}],"noteContent":string,"xPostContent":string}',
  `speaker は ${SPEAKERS.join(' / ')} のいずれか。emotion は ${EMOTIONS.join(' / ')} のいずれか。`,
  '読みが難しい語は 単語<よみ> と書き、字幕だけに出す補足は [[...]] で囲んでください。',
  '縦型動画で省略してよい行は shortsSkip を true にしてください。',
  `noteContent と xPostContent には動画URLの位置に ${VIDEO_URL_PLACEHOLDER} を入れてください。`,
].join('\n')

const buildUserPrompt = (request: ScriptRequest) =>
  request.instructions ? `テーマ: ${request.topic}\n\n${request.instructions}` : `テーマ: ${request.topic}`

export const parseScriptDocument = (content: string): ScriptDocument => {
  let json: unknown
  try {
    json = JSON.parse(content)
  } catch (error) {
    throw new InvalidPayloadError('台本が JSON として解釈できません', 'script', describeError(error))
  }
  const result = scriptDocumentSchema.safeParse(json)
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new InvalidPayloadError('台本の形式が不正です', 'script', detail)
  }
  return result.data
}

export class ScriptService implements ScriptSource {
  constructor(private readonly deps: ScriptServiceDeps) {}

  async generate(request: ScriptRequest, signal?: AbortSignal): Promise<ScriptDocument> {
    const messages: ChatMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildUserPrompt(request) },
    ]

    for (let attempt = 0; ; attempt++) {
      const content = await withRetry(
        () => this.deps.chat.completeJson(messages, { model: this.deps.model, temperature: this.deps.temperature, signal }),
        { ...this.deps.retry, signal, label: 'script' }
      )
      try {
        const script = parseScriptDocument(content)
        logger.info({ topic: request.topic, lines: script.dialogue.length, attempt }, 'Script generated')
        return script
      } catch (error) {
        if (!(error instanceof InvalidPayloadError) || attempt >= this.deps.maxRetries) {
          throw error
        }
        logger.warn({ topic: request.topic, attempt: attempt + 1, detail: error.detail }, 'Invalid script payload; requesting correction')
        messages.push(
          { role: 'assistant', content },
          {
            role: 'user',
            content: `直前の出力は不正でした (${error.message}: ${error.detail ?? ''})。指定の形式のJSONだけを出力し直してください。`,
          }
        )
      }
    }
  }
}
