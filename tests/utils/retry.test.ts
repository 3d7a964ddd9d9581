import { describe, it, expect, vi } from 'vitest'
import { computeBackoffDelay, withRetry } from '../../src/utils/retry'
import { InvalidPayloadError, TransientExternalError } from '../../src/utils/errors'

const noDelay = { baseDelayMs: 0, maxDelayMs: 0 }

describe('computeBackoffDelay', () => {
  it('doubles per attempt and caps at the maximum', () => {
    expect(computeBackoffDelay(0, 500, 8000)).toBe(500)
    expect(computeBackoffDelay(1, 500, 8000)).toBe(1000)
    expect(computeBackoffDelay(3, 500, 8000)).toBe(4000)
    expect(computeBackoffDelay(5, 500, 8000)).toBe(8000)
  })
})

describe('withRetry', () => {
  it('retries transient errors until the task succeeds', async () => {
    const task = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientExternalError('busy', 'tts', 503))
      .mockRejectedValueOnce(new TransientExternalError('busy', 'tts', 429))
      .mockResolvedValueOnce('ok')

    await expect(withRetry(task, { maxRetries: 3, ...noDelay })).resolves.toBe('ok')
    expect(task.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2])
  })

  it('rethrows the last error once retries are exhausted', async () => {
    let calls = 0
    const task = vi.fn(async () => {
      calls += 1
      throw new TransientExternalError(`busy ${calls}`, 'tts', 503)
    })

    await expect(withRetry(task, { maxRetries: 2, ...noDelay })).rejects.toThrow('busy 3')
    expect(task).toHaveBeenCalledTimes(3)
  })

  it('does not retry errors that are not transient', async () => {
    const task = vi.fn(async () => {
      throw new InvalidPayloadError('unsupported', 'tts')
    })

    await expect(withRetry(task, { maxRetries: 5, ...noDelay })).rejects.toBeInstanceOf(InvalidPayloadError)
    expect(task).toHaveBeenCalledTimes(1)
  })

  it('honors a custom shouldRetry predicate', async () => {
    const task = vi.fn<() => Promise<number>>().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce(7)

    await expect(withRetry(task, { maxRetries: 1, ...noDelay, shouldRetry: () => true })).resolves.toBe(7)
  })

  it('stops before the first attempt when already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const task = vi.fn(async () => 'never')

    await expect(withRetry(task, { maxRetries: 1, ...noDelay, signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    })
    expect(task).not.toHaveBeenCalled()
  })

  it('cancels the backoff sleep when aborted', async () => {
    const controller = new AbortController()
    const task = vi.fn(async () => {
      queueMicrotask(() => controller.abort())
      throw new TransientExternalError('busy', 'tts', 503)
    })

    await expect(
      withRetry(task, { maxRetries: 3, baseDelayMs: 60_000, maxDelayMs: 60_000, signal: controller.signal })
    ).rejects.toMatchObject({ name: 'AbortError' })
    expect(task).toHaveBeenCalledTimes(1)
  })
})
