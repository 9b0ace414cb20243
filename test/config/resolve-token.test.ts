import { beforeEach, describe, expect, it, vi } from 'vitest'

describe('resolveToken', () => {
  beforeEach(() => {
    vi.resetModules()
    vi.unstubAllEnvs()
    vi.stubEnv('GITHUB_TOKEN', '')
    vi.stubEnv('GH_TOKEN', '')
    vi.doMock('node:child_process', () => ({
      execFileSync: vi.fn(() => {
        throw new Error('gh not installed')
      }),
    }))
    vi.doMock('node:fs', () => ({
      readFileSync: vi.fn(() => 'file-token\n'),
      existsSync: vi.fn(() => false),
    }))
  })

  it('prefers the explicit token', async () => {
    vi.stubEnv('GITHUB_TOKEN', 'env-token')
    let { resolveToken } = await import('../../core/config/resolve-token')

    expect(resolveToken({ token: ' explicit ' })).toBe('explicit')
  })

  it('reads GITHUB_TOKEN before GH_TOKEN', async () => {
    vi.stubEnv('GITHUB_TOKEN', 'env-token')
    vi.stubEnv('GH_TOKEN', 'gh-token')
    let { resolveToken } = await import('../../core/config/resolve-token')

    expect(resolveToken()).toBe('env-token')
  })

  it('falls back to GH_TOKEN', async () => {
    vi.stubEnv('GH_TOKEN', 'gh-token')
    let { resolveToken } = await import('../../core/config/resolve-token')

    expect(resolveToken({ token: '   ' })).toBe('gh-token')
  })

  it('reads the token file when present', async () => {
    let fs = await import('node:fs')
    vi.mocked(fs.existsSync).mockReturnValue(true)
    let { resolveToken } = await import('../../core/config/resolve-token')

    expect(resolveToken({ tokenFile: '/tmp/token' })).toBe('file-token')
    expect(fs.readFileSync).toHaveBeenCalledWith('/tmp/token', 'utf8')
  })

  it('asks the gh CLI last', async () => {
    vi.doMock('node:child_process', () => ({
      execFileSync: vi.fn(() => 'cli-token\n'),
    }))
    let { resolveToken } = await import('../../core/config/resolve-token')

    expect(resolveToken({ tokenFile: '/tmp/missing' })).toBe('cli-token')
  })

  it('returns undefined when nothing is configured', async () => {
    let { resolveToken } = await import('../../core/config/resolve-token')

    expect(resolveToken({ tokenFile: '/tmp/missing' })).toBeUndefined()
  })

  it('places the default token file under the config directory', async () => {
    let { getDefaultTokenFile } = await import(
      '../../core/config/resolve-token'
    )

    expect(getDefaultTokenFile()).toMatch(
      /\.config\/release-courier\/github_token$/u,
    )
  })
})
