/**
 * Parses the `--attempts` option.
 *
 * @param value - Raw option value.
 * @returns Attempts per upload, at least 1.
 */
export function parseAttempts(value: undefined | number | string): number {
  let attempts = typeof value === 'number' ? value : Number(value)
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new Error(`Invalid attempts "${value}". Expected a positive integer.`)
  }
  return attempts
}
