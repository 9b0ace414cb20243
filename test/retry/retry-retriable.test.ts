import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { RetriableError } from '../../core/errors/retriable-error'
import { retryRetriable } from '../../core/retry/retry-retriable'

describe('retryRetriable', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('returns the first success', async () => {
    let operation = vi.fn(() => Promise.resolve('ok'))

    await expect(retryRetriable(operation)).resolves.toBe('ok')
    expect(operation).toHaveBeenCalledWith(1)
  })

  it('retries retriable failures with doubling delays', async () => {
    let onRetry = vi.fn()
    let operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new RetriableError(new Error('first')))
      .mockRejectedValueOnce(new RetriableError(new Error('second')))
      .mockResolvedValue('done')

    let result = retryRetriable(operation, { onRetry })

    await vi.advanceTimersByTimeAsync(49)
    expect(operation).toHaveBeenCalledTimes(1)
    await vi.advanceTimersByTimeAsync(1)
    expect(operation).toHaveBeenCalledTimes(2)
    await vi.advanceTimersByTimeAsync(99)
    expect(operation).toHaveBeenCalledTimes(2)
    await vi.advanceTimersByTimeAsync(1)

    await expect(result).resolves.toBe('done')
    expect(operation).toHaveBeenCalledTimes(3)
    expect(onRetry).toHaveBeenCalledTimes(2)
    expect(onRetry).toHaveBeenLastCalledWith(expect.any(RetriableError), 2)
  })

  it('does not retry other errors', async () => {
    let operation = vi.fn(() => Promise.reject(new Error('permanent')))

    await expect(retryRetriable(operation)).rejects.toThrow('permanent')
    expect(operation).toHaveBeenCalledTimes(1)
  })

  it('gives up after the last attempt', async () => {
    let operation = vi.fn(() =>
      Promise.reject(new RetriableError(new Error('flaky'))),
    )

    let result = retryRetriable(operation, { attempts: 3, delay: 10 })
    let settled = expect(result).rejects.toThrow('flaky')
    await vi.advanceTimersByTimeAsync(30)

    await settled
    expect(operation).toHaveBeenCalledTimes(3)
  })

  it('stops waiting when aborted', async () => {
    let controller = new AbortController()
    let operation = vi.fn(() =>
      Promise.reject(new RetriableError(new Error('flaky'))),
    )

    let result = retryRetriable(operation, { signal: controller.signal })
    let settled = expect(result).rejects.toThrow('stop')
    await vi.advanceTimersByTimeAsync(10)
    controller.abort(new Error('stop'))

    await settled
    expect(operation).toHaveBeenCalledTimes(1)
  })

  it.each([Number.NaN, 0, -1, 2.5, Number.POSITIVE_INFINITY])(
    'rejects %s attempts without running the operation',
    async attempts => {
      let operation = vi.fn(() =>
        Promise.reject(new RetriableError(new Error('flaky'))),
      )

      await expect(
        retryRetriable(operation, { delay: 0, attempts }),
      ).rejects.toThrow(RangeError)
      expect(operation).not.toHaveBeenCalled()
    },
  )
})
