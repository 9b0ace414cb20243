import { isRetriable } from '../errors/retriable-error'
import { sleep } from '../api/sleep'

/**
 * Run an operation again while it fails with a `RetriableError`, doubling
 * the delay after each attempt.
 *
 * @param operation - Receives the attempt number, starting at 1.
 * @param options - Retry options.
 * @param options.attempts - Total attempts, 10 by default.
 * @param options.delay - Delay before the second attempt in milliseconds.
 * @param options.signal - Aborts waiting between attempts.
 * @param options.onRetry - Called before each wait.
 * @returns The first successful result.
 * @throws {RangeError} When `attempts` is not a positive integer.
 */
export async function retryRetriable<T>(
  operation: (attempt: number) => Promise<T>,
  options: {
    onRetry?(error: unknown, attempt: number): void
    signal?: AbortSignal
    attempts?: number
    delay?: number
  } = {},
): Promise<T> {
  let { attempts = 10, delay = 50 } = options
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new RangeError(`invalid attempts "${attempts}"`)
  }

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt)
    } catch (error) {
      if (!isRetriable(error) || attempt >= attempts) {
        throw error
      }
      options.onRetry?.(error, attempt)
      await sleep(delay * 2 ** (attempt - 1), options.signal)
    }
  }
}
