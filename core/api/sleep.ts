/**
 * Waits for the given duration, rejecting early with the signal's reason
 * when it aborts.
 *
 * @param milliseconds - Delay length.
 * @param signal - Optional cancellation signal.
 * @returns Promise settled after the delay.
 */
export function sleep(
  milliseconds: number,
  signal?: AbortSignal,
): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }

    let onAbort = (): void => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    let timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, milliseconds)

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
