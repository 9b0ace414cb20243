import { describe, expect, it } from 'vitest'

import {
  createFakeGitHub,
  createMockLogger,
  quotaReply,
} from '../helpers/fake-github'
import { createGitHubClient } from '../../core/api/create-github-client'

let urls = {
  upload: 'https://uploads.example.test',
  api: 'https://api.example.test',
  download: 'https://example.test',
}

describe('createGitHubClient', () => {
  it('routes calls through the injected transport with the given token', async () => {
    let fake = createFakeGitHub({
      'GET /repos/o/r': { body: { default_branch: 'main' } },
    })
    let client = createGitHubClient({
      transport: fake.transport,
      logger: createMockLogger(),
      token: 'test-token',
      urls,
    })

    await expect(
      client.getDefaultBranch({ owner: 'o', name: 'r' }),
    ).resolves.toBe('main')
    expect(fake.requests[0]!.url).toBe('https://api.example.test/repos/o/r')
    expect(fake.requests[0]!.headers['Authorization']).toBe('Bearer test-token')
  })

  it('reads the quota without guarding', async () => {
    let fake = createFakeGitHub({
      'GET /rate_limit': quotaReply(42, 1_700_000_000),
    })
    let client = createGitHubClient({
      transport: fake.transport,
      logger: createMockLogger(),
      token: 'test-token',
      urls,
    })

    let state = await client.getQuotaState()

    expect(state.remaining).toBe(42)
    expect(state.resetAt.toISOString()).toBe('2023-11-14T22:13:20.000Z')
    expect(fake.all).toHaveLength(1)
  })

  it('builds download URLs from the resolved download endpoint', () => {
    let client = createGitHubClient({
      transport: createFakeGitHub().transport,
      logger: createMockLogger(),
      token: 'test-token',
      urls,
    })

    expect(
      client.getReleaseDownloadUrl(
        { owner: 'o', name: 'r' },
        'v1.0.0',
        'app v1.zip',
      ),
    ).toBe('https://example.test/o/r/releases/download/v1.0.0/app%20v1.zip')
  })

  it('applies quota overrides on top of the defaults', async () => {
    let logger = createMockLogger()
    let fake = createFakeGitHub({
      'GET /rate_limit': quotaReply(500),
      'GET /repos/o/r': { body: { default_branch: 'main' } },
    })
    let client = createGitHubClient({
      quota: { threshold: 1000, maxWaits: 0 },
      transport: fake.transport,
      token: 'test-token',
      logger,
      urls,
    })

    await client.getDefaultBranch({ owner: 'o', name: 'r' })

    expect(logger.warn).toHaveBeenCalledWith(
      'still close to rate limiting, continuing anyway',
      { remaining: 500, waits: 0 },
    )
  })

  it('validates endpoint overrides when created', () => {
    expect(() =>
      createGitHubClient({
        transport: createFakeGitHub().transport,
        urls: { api: '::' },
        token: 'test-token',
      }),
    ).toThrow('invalid GitHub API URL "::"')
  })
})
