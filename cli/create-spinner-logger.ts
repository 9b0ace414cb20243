import type { Logger } from '../types/logger'

/**
 * Wraps a logger so that lines printed while the spinner runs do not mix
 * with its frames: the spinner line is cleared first and redrawn on the
 * next frame.
 *
 * @param logger - Logger to wrap.
 * @param spinner - Active spinner.
 * @returns Logger clearing the spinner before each line.
 */
export function createSpinnerLogger(
  logger: Logger,
  spinner: { isSpinning(): boolean; clear(): unknown },
): Logger {
  let pause = (): void => {
    if (spinner.isSpinning()) {
      spinner.clear()
    }
  }

  return {
    debug: (message, fields) => {
      pause()
      logger.debug(message, fields)
    },
    error: (message, fields) => {
      pause()
      logger.error(message, fields)
    },
    warn: (message, fields) => {
      pause()
      logger.warn(message, fields)
    },
    info: (message, fields) => {
      pause()
      logger.info(message, fields)
    },
  }
}
