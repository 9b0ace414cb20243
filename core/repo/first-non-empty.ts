/**
 * @param values - Candidates in priority order.
 * @returns The first non-empty value, or an empty string.
 */
export function firstNonEmpty(...values: (undefined | string)[]): string {
  for (let value of values) {
    if (value) {
      return value
    }
  }
  return ''
}
