import { existsSync, readFileSync } from 'node:fs'
import { execFileSync } from 'node:child_process'
import { homedir } from 'node:os'
import { join } from 'node:path'

/**
 * Default location of the token file.
 *
 * @returns Absolute path under the user's config directory.
 */
export function getDefaultTokenFile(): string {
  return join(homedir(), '.config', 'release-courier', 'github_token')
}

/**
 * Resolve the API token.
 *
 * Order: explicit value, `GITHUB_TOKEN`, `GH_TOKEN`, the token file, then
 * `gh auth token`.
 *
 * @param options - Resolution options.
 * @param options.token - Explicit token.
 * @param options.tokenFile - Token file path; defaults to
 *   `getDefaultTokenFile()`.
 * @returns Token string or undefined when not found.
 */
export function resolveToken(
  options: { tokenFile?: string; token?: string } = {},
): undefined | string {
  let candidates = [
    options.token,
    process.env['GITHUB_TOKEN'],
    process.env['GH_TOKEN'],
  ]
  for (let candidate of candidates) {
    if (candidate && candidate.trim() !== '') {
      return candidate.trim()
    }
  }

  let tokenFile = options.tokenFile ?? getDefaultTokenFile()
  if (existsSync(tokenFile)) {
    let fromFile = readFileSync(tokenFile, 'utf8').trim()
    if (fromFile) {
      return fromFile
    }
  }

  return readGhCliToken()
}

function readGhCliToken(): undefined | string {
  try {
    let output = execFileSync('gh', ['auth', 'token'], {
      stdio: ['ignore', 'pipe', 'ignore'],
      encoding: 'utf8',
      timeout: 500,
    })
    return output.trim() || undefined
  } catch {
    /* Not installed or not logged in. */
    return undefined
  }
}
