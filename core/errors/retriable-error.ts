/**
 * Signals that re-running the whole operation may succeed. The original
 * failure is kept as `cause`.
 */
export class RetriableError extends Error {
  /**
   * Creates a new RetriableError.
   *
   * @param cause - Failure being wrapped.
   */
  public constructor(cause: unknown) {
    super(
      cause instanceof Error ? cause.message : String(cause),
      { cause },
    )
    this.name = 'RetriableError'
  }
}

/**
 * Checks whether an error may be retried by an external policy.
 *
 * @param error - Any thrown value.
 * @returns True for `RetriableError` instances.
 */
export function isRetriable(error: unknown): error is RetriableError {
  return error instanceof RetriableError
}
