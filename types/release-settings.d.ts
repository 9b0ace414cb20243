import type { ReleaseNotesMode } from './release-notes-mode'
import type { Repo } from './repo'

/** Everything needed to upsert a release, with templates already applied. */
export interface ReleaseSettings {
  /** Delete a draft with the same name before creating. Needs `draft`. */
  replaceExistingDraft?: boolean

  /** Discussion category to open; omitted when empty. */
  discussionCategory?: string

  /** Commit-ish the tag is created from; omitted when empty. */
  targetCommitish?: string

  /** Body merge policy when the release already exists. */
  notesMode?: ReleaseNotesMode

  /** Mark as prerelease. */
  prerelease?: boolean

  /** Create as draft. */
  draft?: boolean

  /** Release title. */
  name: string

  /** Target repository. */
  repo: Repo

  /** Tag name; unique per repository. */
  tag: string
}
