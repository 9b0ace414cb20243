import pc from 'picocolors'

import type { LogFields, Logger } from '../../types/logger'

import { formatFields } from './format-fields'

/**
 * Create a logger printing through the console with colored level markers.
 *
 * @param options - Logger options.
 * @param options.verbose - Print debug lines too.
 * @returns Console backed logger.
 */
export function createConsoleLogger(
  options: { verbose?: boolean } = {},
): Logger {
  let render = (
    marker: string,
    message: string,
    fields?: LogFields,
  ): string => {
    let suffix = formatFields(fields)
    return suffix ?
        `${marker} ${message} ${pc.gray(suffix)}`
      : `${marker} ${message}`
  }

  return {
    debug: (message, fields) => {
      if (options.verbose) {
        console.debug(render(pc.gray('•'), pc.gray(message), fields))
      }
    },
    error: (message, fields) => {
      console.error(render(pc.redBright('⨯'), message, fields))
    },
    warn: (message, fields) => {
      console.warn(render(pc.yellow('⚠'), message, fields))
    },
    info: (message, fields) => {
      console.info(render(pc.cyan('•'), message, fields))
    },
  }
}
