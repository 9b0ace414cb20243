import type { Logger } from '../../types/logger'

/** @returns Logger discarding everything. */
export function createSilentLogger(): Logger {
  let noop = (): void => {}
  return { debug: noop, error: noop, info: noop, warn: noop }
}
