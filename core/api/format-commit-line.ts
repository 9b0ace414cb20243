/** Fields of a compared commit used in changelog lines. */
export interface ComparedCommit {
  author?: { login?: string } | null
  commit: { message: string }
  sha: string
}

/**
 * Formats a commit as `<sha>: <subject> (@<login>)`.
 *
 * @param commit - Commit from a comparison.
 * @returns Changelog line.
 */
export function formatCommitLine(commit: ComparedCommit): string {
  let [subject = ''] = commit.commit.message.split('\n')
  let login = commit.author?.login ?? ''
  return `${commit.sha}: ${subject} (@${login})`
}
