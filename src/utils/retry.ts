import { setTimeout as sleep } from 'node:timers/promises'
import { TransientExternalError } from './errors'
import { logger } from './logger'

export interface RetryOptions {
  /** 初回を除く再試行回数 */
  maxRetries: number
  baseDelayMs: number
  maxDelayMs: number
  shouldRetry?: (error: unknown) => boolean
  signal?: AbortSignal
  /** ログ用 */
  label?: string
}

export const isTransientError = (error: unknown): boolean => error instanceof TransientExternalError

export const computeBackoffDelay = (attempt: number, baseDelayMs: number, maxDelayMs: number): number =>
  Math.min(maxDelayMs, baseDelayMs * 2 ** attempt)

export const withRetry = async <T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
  const shouldRetry = options.shouldRetry ?? isTransientError
  let attempt = 0
  for (;;) {
    options.signal?.throwIfAborted()
    try {
      return await task(attempt)
    } catch (error) {
      if (attempt >= options.maxRetries || !shouldRetry(error)) {
        throw error
      }
      const delayMs = computeBackoffDelay(attempt, options.baseDelayMs, options.maxDelayMs)
      logger.warn(
        { err: error, attempt: attempt + 1, maxRetries: options.maxRetries, delayMs, label: options.label },
        'Retrying after failure'
      )
      await sleep(delayMs, undefined, { signal: options.signal })
      attempt += 1
    }
  }
}
