import type { CommitAuthor } from './commit-author'
import type { Repo } from './repo'

/** Input of `createFile`: one commit writing one file. */
export interface FileCommit {
  /** Committer identity. */
  author: CommitAuthor

  /** New file content. */
  content: Uint8Array

  /** Commit message. */
  message: string

  /** Target repository; `branch` selects the branch to commit to. */
  repo: Repo

  /** Path inside the repository. */
  path: string
}
