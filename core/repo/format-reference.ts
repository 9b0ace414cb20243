import type { Repo } from '../../types/repo'

import { firstNonEmpty } from './first-non-empty'

/**
 * Formats `owner:name:branch` from the preferred repository, taking each
 * field from the fallback only where the preferred one is empty.
 *
 * @param preferred - Repository whose fields win.
 * @param fallback - Repository filling the gaps.
 * @returns Colon separated reference.
 */
export function formatReference(preferred: Repo, fallback: Repo): string {
  return [
    firstNonEmpty(preferred.owner, fallback.owner),
    firstNonEmpty(preferred.name, fallback.name),
    firstNonEmpty(preferred.branch, fallback.branch),
  ].join(':')
}
