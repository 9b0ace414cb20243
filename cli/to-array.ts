/**
 * Normalizes a repeatable CLI flag.
 *
 * @param value - Flag value as parsed.
 * @returns Values, split on commas and trimmed.
 */
export function toArray(value: undefined | string[] | string): string[] {
  let raw: string[] = []
  if (Array.isArray(value)) {
    raw.push(...value)
  } else if (typeof value === 'string') {
    raw.push(value)
  }
  return raw
    .flatMap(item => item.split(','))
    .map(item => item.trim())
    .filter(Boolean)
}
