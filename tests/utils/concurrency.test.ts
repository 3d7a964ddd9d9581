import { describe, it, expect } from 'vitest'
import { runWithConcurrencyLimit } from '../../src/utils/concurrency'

const deferred = () => {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((res) => {
    resolve = res
  })
  return { promise, resolve }
}

describe('runWithConcurrencyLimit', () => {
  it('returns results in input order regardless of completion order', async () => {
    const delays = [30, 0, 10]
    const tasks = delays.map((delay, index) => () => new Promise<number>((resolve) => setTimeout(() => resolve(index), delay)))

    await expect(runWithConcurrencyLimit(tasks, 3)).resolves.toEqual([0, 1, 2])
  })

  it('never runs more tasks than the limit at once', async () => {
    let running = 0
    let peak = 0
    const tasks = Array.from({ length: 6 }, () => async () => {
      running += 1
      peak = Math.max(peak, running)
      await new Promise((resolve) => setTimeout(resolve, 5))
      running -= 1
      return running
    })

    await runWithConcurrencyLimit(tasks, 2)
    expect(peak).toBe(2)
  })

  it('stops taking new tasks after a failure', async () => {
    const gate = deferred()
    const started: number[] = []
    const tasks = [0, 1, 2, 3].map((index) => async () => {
      started.push(index)
      if (index === 0) throw new Error('line 0 failed')
      await gate.promise
      return index
    })

    const result = runWithConcurrencyLimit(tasks, 2)
    await new Promise((resolve) => setTimeout(resolve, 0))
    gate.resolve()

    await expect(result).rejects.toThrow('line 0 failed')
    expect(started).toEqual([0, 1])
  })

  it('waits for running tasks before rejecting', async () => {
    const gate = deferred()
    let finished = false
    const tasks = [
      async () => {
        throw new Error('first failed')
      },
      async () => {
        await gate.promise
        finished = true
        return 1
      },
    ]

    const result = runWithConcurrencyLimit(tasks, 2).catch((error: unknown) => error)
    await new Promise((resolve) => setTimeout(resolve, 0))
    expect(finished).toBe(false)
    gate.resolve()

    await expect(result).resolves.toMatchObject({ message: 'first failed' })
    expect(finished).toBe(true)
  })

  it('resolves to an empty array without tasks', async () => {
    await expect(runWithConcurrencyLimit([], 4)).resolves.toEqual([])
  })

  it('rejects a non-positive limit', async () => {
    await expect(runWithConcurrencyLimit([async () => 1], 0)).rejects.toThrow('maxConcurrent must be a positive integer: 0')
  })
})
