/**
 * Renders an error and its `cause` chain on one line. A message repeating
 * the one before it is printed once.
 *
 * @param error - Any thrown value.
 * @returns Messages joined with ": ".
 */
export function describeError(error: unknown): string {
  let parts: string[] = []
  let current: unknown = error
  let seen = new Set<unknown>()

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current)
    if (current instanceof Error) {
      if (parts.at(-1) !== current.message) {
        parts.push(current.message)
      }
      current = current.cause
    } else {
      parts.push(String(current))
      break
    }
  }

  return parts.join(': ')
}
