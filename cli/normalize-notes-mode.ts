import type { ReleaseNotesMode } from '../types/release-notes-mode'

/**
 * Normalizes the release notes mode option.
 *
 * @param mode - Raw mode option.
 * @returns Normalized mode.
 */
export function normalizeNotesMode(mode: undefined | string): ReleaseNotesMode {
  let normalized = (mode ?? 'keep-existing').toLowerCase()
  if (
    normalized === 'keep-existing' ||
    normalized === 'prepend' ||
    normalized === 'replace' ||
    normalized === 'append'
  ) {
    return normalized
  }
  throw new Error(
    `Invalid mode "${mode}". Expected "keep-existing", "append", "prepend", or "replace".`,
  )
}
