import { createSpinner } from 'nanospinner'
import { readFile } from 'node:fs/promises'
import pc from 'picocolors'
import cac from 'cac'

import type { GitHubClient } from '../types/github-client'
import type { Logger } from '../types/logger'

import { createConsoleLogger } from '../core/log/create-console-logger'
import { createGitHubClient } from '../core/api/create-github-client'
import { createSpinnerLogger } from './create-spinner-logger'
import { normalizeNotesMode } from './normalize-notes-mode'
import { parseRepository } from './parse-repository'
import { uploadArtifacts } from './upload-artifacts'
import { parseAttempts } from './parse-attempts'
import { printFailure } from './print-failure'
import { version } from '../package.json'
import { toArray } from './to-array'

/** Flags shared by every command. */
interface GlobalOptions {
  /** Base URL of the REST API. */
  apiUrl?: string

  /** Base URL for asset uploads. */
  uploadUrl?: string

  /** Base URL for asset downloads. */
  downloadUrl?: string

  /** Token; resolved from the environment when omitted. */
  token?: string

  /** Skip TLS certificate verification. */
  insecure: boolean

  /** Print debug logs. */
  verbose: boolean
}

/** Flags of the `upload` command. */
interface UploadOptions extends GlobalOptions {
  attempts: number | string
}

/** Flags of the `release` command. */
interface ReleaseOptions extends UploadOptions {
  discussionCategory?: string
  asset?: string[] | string
  replaceDraft: boolean
  prerelease: boolean
  notesFile?: string
  target?: string
  draft: boolean
  mode?: string
  name?: string
}

/** Flags of the `publish-file` command. */
interface PublishFileOptions extends GlobalOptions {
  committerEmail: string
  committerName: string
  message?: string
}

/** Shared state handed to each command body. */
interface CommandContext {
  signal: AbortSignal
  client: GitHubClient
  logger: Logger
}

/** What a command body reports back. */
interface CommandResult {
  /** Printed once the command succeeds. */
  output?: string

  /** Spinner success text. */
  summary: string
}

/**
 * Runs a command body with a client, a spinner and SIGINT cancellation.
 *
 * @param label - Spinner text.
 * @param options - Global flags.
 * @param body - Command implementation.
 */
async function runCommand(
  label: string,
  options: GlobalOptions,
  body: (context: CommandContext) => Promise<CommandResult>,
): Promise<void> {
  let controller = new AbortController()
  let onInterrupt = (): void => controller.abort()
  process.once('SIGINT', onInterrupt)

  let spinner = createSpinner(label).start()
  let logger = createSpinnerLogger(
    createConsoleLogger({ verbose: options.verbose }),
    spinner,
  )

  try {
    let client = createGitHubClient({
      urls: {
        download: options.downloadUrl,
        upload: options.uploadUrl,
        api: options.apiUrl,
      },
      skipTlsVerify: options.insecure,
      token: options.token,
      logger,
    })
    let result = await body({ signal: controller.signal, client, logger })
    spinner.success(result.summary)
    if (result.output !== undefined) {
      console.info(result.output)
    }
  } catch (error) {
    spinner.error('Failed')
    printFailure(error)
    process.exitCode = 1
  } finally {
    process.off('SIGINT', onInterrupt)
  }
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('release-courier')

  cli
    .help()
    .version(version)
    .option('--token <token>', 'API token (default: GITHUB_TOKEN, GH_TOKEN)')
    .option('--api-url <url>', 'REST API base URL')
    .option('--upload-url <url>', 'Asset upload base URL (needs --api-url)')
    .option('--download-url <url>', 'Asset download base URL')
    .option('--insecure', 'Skip TLS certificate verification')
    .option('--verbose', 'Print debug logs')

  cli
    .command(
      'notes <repo> <previous> <current>',
      'Print server generated release notes',
    )
    .action(
      (
        repo: string,
        previous: string,
        current: string,
        options: GlobalOptions,
      ) =>
        runCommand('Generating release notes...', options, async context => {
          let notes = await context.client.generateReleaseNotes(
            parseRepository(repo),
            previous,
            current,
            { signal: context.signal },
          )
          return { summary: 'Release notes generated', output: `\n${notes}\n` }
        }),
    )

  cli
    .command(
      'changelog <repo> <previous> <current>',
      'Print one line per commit between two refs',
    )
    .action(
      (
        repo: string,
        previous: string,
        current: string,
        options: GlobalOptions,
      ) =>
        runCommand('Comparing commits...', options, async context => {
          let lines = await context.client.changelog(
            parseRepository(repo),
            previous,
            current,
            { signal: context.signal },
          )
          return {
            summary: `Found ${pc.yellow(lines.length)} commits`,
            output: `\n${lines.join('\n')}\n`,
          }
        }),
    )

  cli
    .command('release <repo> <tag>', 'Create or update a release')
    .option('--name <name>', 'Release title (default: the tag)')
    .option('--notes-file <path>', 'File holding the release body')
    .option('--mode <mode>', 'keep-existing, append, prepend or replace')
    .option('--draft', 'Create as draft')
    .option('--replace-draft', 'Delete a draft with the same name first')
    .option('--prerelease', 'Mark as prerelease')
    .option('--target <commitish>', 'Commit-ish the tag is created from')
    .option('--discussion-category <name>', 'Open a discussion')
    .option('--asset <path>', 'File to upload (repeatable)')
    .option('--attempts <count>', 'Upload attempts per file', { default: 10 })
    .action((repo: string, tag: string, options: ReleaseOptions) =>
      runCommand('Publishing release...', options, async context => {
        let target = parseRepository(repo)
        let notesMode = normalizeNotesMode(options.mode)
        let attempts = parseAttempts(options.attempts)
        let body =
          options.notesFile ? await readFile(options.notesFile, 'utf8') : ''
        let releaseId = await context.client.createRelease(
          {
            discussionCategory: options.discussionCategory,
            replaceExistingDraft: options.replaceDraft,
            targetCommitish: options.target,
            prerelease: options.prerelease,
            name: options.name ?? tag,
            draft: options.draft,
            repo: target,
            notesMode,
            tag,
          },
          body,
          { signal: context.signal },
        )

        let uploaded = await uploadArtifacts(context.client, {
          files: toArray(options.asset),
          logger: context.logger,
          signal: context.signal,
          repo: target,
          releaseId,
          attempts,
        })
        let urls = uploaded.map(name =>
          pc.gray(
            `   • ${context.client.getReleaseDownloadUrl(target, tag, name)}`,
          ),
        )
        return {
          summary:
            `Release ${pc.yellow(releaseId)} published with ` +
            `${uploaded.length} assets`,
          output: urls.length > 0 ? urls.join('\n') : undefined,
        }
      }),
    )

  cli
    .command('upload <repo> <releaseId> [...files]', 'Upload release assets')
    .option('--attempts <count>', 'Upload attempts per file', { default: 10 })
    .action(
      (
        repo: string,
        releaseId: string,
        files: string[],
        options: UploadOptions,
      ) =>
        runCommand('Uploading assets...', options, async context => {
          let uploaded = await uploadArtifacts(context.client, {
            attempts: parseAttempts(options.attempts),
            repo: parseRepository(repo),
            logger: context.logger,
            signal: context.signal,
            releaseId,
            files,
          })
          return { summary: `Uploaded ${pc.yellow(uploaded.length)} assets` }
        }),
    )

  cli
    .command('close-milestone <repo> <title>', 'Close a milestone by title')
    .action((repo: string, title: string, options: GlobalOptions) =>
      runCommand('Closing milestone...', options, async context => {
        await context.client.closeMilestone(parseRepository(repo), title, {
          signal: context.signal,
        })
        return { summary: `Milestone ${pc.yellow(title)} closed` }
      }),
    )

  cli
    .command(
      'publish-file <repo> <path> <source>',
      'Commit a local file to owner/name[:branch]',
    )
    .option('--message <message>', 'Commit message')
    .option('--committer-name <name>', 'Committer name', {
      default: 'release-courier',
    })
    .option('--committer-email <email>', 'Committer email', {
      default: 'release-courier@users.noreply.github.com',
    })
    .action(
      (
        repo: string,
        path: string,
        source: string,
        options: PublishFileOptions,
      ) =>
        runCommand('Publishing file...', options, async context => {
          await context.client.createFile(
            {
              author: {
                email: options.committerEmail,
                name: options.committerName,
              },
              message: options.message ?? `Update ${path}`,
              content: await readFile(source),
              repo: parseRepository(repo),
              path,
            },
            { signal: context.signal },
          )
          return { summary: `Published ${pc.yellow(path)}` }
        }),
    )

  cli
    .command(
      'open-pr <base> <head> <title>',
      'Open a pull request between owner/name[:branch] refs',
    )
    .option('--draft', 'Open as draft')
    .action(
      (
        base: string,
        head: string,
        title: string,
        options: { draft: boolean } & GlobalOptions,
      ) =>
        runCommand('Opening pull request...', options, async context => {
          await context.client.openPullRequest(
            {
              base: parseRepository(base),
              head: parseRepository(head),
              draft: Boolean(options.draft),
              title,
            },
            { signal: context.signal },
          )
          return { summary: 'Pull request step finished' }
        }),
    )

  cli
    .command(
      'download-url <repo> <tag> <artifact>',
      'Print the download URL of an asset',
    )
    .action(
      (repo: string, tag: string, artifact: string, options: GlobalOptions) =>
        runCommand('Resolving URL...', options, context =>
          Promise.resolve({
            summary: 'Download URL',
            output: context.client.getReleaseDownloadUrl(
              parseRepository(repo),
              tag,
              artifact,
            ),
          }),
        ),
    )

  cli.parse()
}
