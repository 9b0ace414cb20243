import type { ReleaseNotesMode } from '../../types/release-notes-mode'

/**
 * Combine the body of an existing release with a new one.
 *
 * @param existing - Body currently on the server.
 * @param current - Newly supplied body.
 * @param mode - Merge policy.
 * @returns Body to submit.
 */
export function mergeReleaseNotes(
  existing: string,
  current: string,
  mode: ReleaseNotesMode,
): string {
  switch (mode) {
    case 'prepend':
      return [current, existing].join('\n\n')
    case 'replace':
      return current
    case 'append':
      return [existing, current].join('\n\n')
    case 'keep-existing':
      return existing || current
  }
}
