import type { LogFields } from '../../types/logger'

/**
 * Formats structured fields as `key=value` pairs, skipping undefined values.
 * Values containing whitespace or quotes are JSON quoted.
 *
 * @param fields - Fields to render.
 * @returns Space separated pairs, or an empty string.
 */
export function formatFields(fields: LogFields | undefined): string {
  if (!fields) {
    return ''
  }

  let pairs: string[] = []
  for (let [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue
    }
    let text = String(value)
    if (text === '' || /[\s"=]/u.test(text)) {
      text = JSON.stringify(text)
    }
    pairs.push(`${key}=${text}`)
  }

  return pairs.join(' ')
}
