import type { Logger } from '../../types/logger'

/** Longest release body the server accepts. */
export const maxReleaseBodyLength = 125_000

/** How far back from the limit a line break may be used as the cut point. */
const lineBreakWindow = 1000

const ellipsis = '...'

/**
 * Shorten a release body to fit the server limit.
 *
 * Cuts after the last line break near the limit when there is one,
 * otherwise at the limit, never between the two halves of a surrogate pair,
 * and appends an ellipsis.
 *
 * @param body - Release body.
 * @param limit - Maximum length in UTF-16 code units.
 * @returns Body no longer than `limit`.
 */
export function truncateReleaseBody(
  body: string,
  limit: number = maxReleaseBodyLength,
): string {
  if (body.length <= limit) {
    return body
  }

  let end = limit - ellipsis.length
  let lineBreak = body.lastIndexOf('\n', end - 1)
  if (lineBreak !== -1 && lineBreak >= end - lineBreakWindow) {
    end = lineBreak + 1
  } else if (isHighSurrogate(body.charCodeAt(end - 1))) {
    end -= 1
  }

  return body.slice(0, end) + ellipsis
}

/**
 * Truncate and log when truncation happened.
 *
 * @param logger - Log sink.
 * @param body - Release body.
 * @returns Body that fits.
 */
export function fitReleaseBody(logger: Logger, body: string): string {
  let fitted = truncateReleaseBody(body)
  if (fitted !== body) {
    logger.warn('truncated release body', { bodylen: body.length })
  }
  return fitted
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff
}
