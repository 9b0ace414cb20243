import type { GitHubClientContext } from '../../types/github-client-context'
import type { ReleaseSettings } from '../../types/release-settings'
import type { RequestOptions } from '../../types/request-options'

import { deleteExistingDraftRelease } from './delete-existing-draft-release'
import { createOrUpdateRelease } from './create-or-update-release'
import { buildReleasePayload } from './build-release-payload'
import { fitReleaseBody } from './truncate-release-body'

/**
 * Upsert the release for a tag.
 *
 * When drafts are replaced, a draft with the same name is deleted first.
 * The body is fitted to the length limit, then the release is created or,
 * when one already exists for the tag, merged and updated.
 *
 * @param context - Client context.
 * @param settings - Release settings.
 * @param body - Rendered release notes.
 * @param options - Cancellation.
 * @returns Release id as a decimal string.
 */
export async function createRelease(
  context: GitHubClientContext,
  settings: ReleaseSettings,
  body: string,
  options: RequestOptions = {},
): Promise<string> {
  if (settings.draft && settings.replaceExistingDraft) {
    await deleteExistingDraftRelease(
      context,
      settings.repo,
      settings.name,
      options,
    )
  }

  let payload = buildReleasePayload(
    settings,
    fitReleaseBody(context.logger, body),
  )

  try {
    let release = await createOrUpdateRelease(
      context,
      settings.repo,
      payload,
      settings.notesMode ?? 'keep-existing',
      options,
    )
    return String(release.id)
  } catch (error) {
    throw new Error('could not release', { cause: error })
  }
}
