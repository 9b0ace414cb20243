import type { ReleaseSettings } from '../../types/release-settings'
import type { ReleasePayload } from '../../types/release-payload'

/**
 * Build the create/edit body of a release. Discussion category and target
 * commitish are only included when non-empty.
 *
 * @param settings - Release settings.
 * @param body - Release body, already fitted to the length limit.
 * @returns Request payload.
 */
export function buildReleasePayload(
  settings: ReleaseSettings,
  body: string,
): ReleasePayload {
  let payload: ReleasePayload = {
    prerelease: settings.prerelease ?? false,
    draft: settings.draft ?? false,
    tag_name: settings.tag,
    name: settings.name,
    body,
  }

  if (settings.discussionCategory) {
    payload.discussion_category_name = settings.discussionCategory
  }
  if (settings.targetCommitish) {
    payload.target_commitish = settings.targetCommitish
  }

  return payload
}
