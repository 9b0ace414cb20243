import { describe, expect, it } from 'vitest'

import type { RecordedRequest, FakeReply } from '../helpers/fake-github'
import type { ReleaseSettings } from '../../types/release-settings'

import {
  createTestContext,
  createFakeGitHub,
  describeRequests,
} from '../helpers/fake-github'
import { createRelease } from '../../core/api/create-release'

interface StoredRelease {
  target_commitish: string
  tag_name: string
  draft: boolean
  body: string
  name: string
  id: number
}

/** Minimal release store answering lookup, create and edit. */
function createReleaseServer(initial: StoredRelease[] = []): {
  fake: ReturnType<typeof createFakeGitHub>
  releases: StoredRelease[]
} {
  let releases = [...initial]
  let nextId = 100

  let lookup = (request: RecordedRequest): FakeReply => {
    let tag = decodeURIComponent(request.path.split('/').at(-1)!)
    let found = releases.find(
      release => release.tag_name === tag && !release.draft,
    )
    return found ?
        { body: found }
      : { body: { message: 'Not Found' }, status: 404 }
  }
  let create = (request: RecordedRequest): FakeReply => {
    let payload = request.json as Omit<StoredRelease, 'id' | 'target_commitish'> &
      Partial<Pick<StoredRelease, 'target_commitish'>>
    let release = { target_commitish: 'main', ...payload, id: nextId++ }
    releases.push(release)
    return {
      headers: { 'x-github-request-id': 'REQ-C' },
      body: release,
      status: 201,
    }
  }
  let edit = (request: RecordedRequest): FakeReply => {
    let id = Number(request.path.split('/').at(-1))
    let release = releases.find(item => item.id === id)!
    Object.assign(release, request.json)
    return { headers: { 'x-github-request-id': 'REQ-U' }, body: release }
  }

  let fake = createFakeGitHub({
    'GET /repos/o/r/releases/tags/v1.0.0': lookup,
    'PATCH /repos/o/r/releases/100': edit,
    'PATCH /repos/o/r/releases/7': edit,
    'POST /repos/o/r/releases': create,
  })
  return { releases, fake }
}

function settings(overrides: Partial<ReleaseSettings> = {}): ReleaseSettings {
  return {
    repo: { owner: 'o', name: 'r' },
    name: 'Release 1.0.0',
    tag: 'v1.0.0',
    ...overrides,
  }
}

describe('createRelease', () => {
  it('creates the release when none exists for the tag', async () => {
    let { releases, fake } = createReleaseServer()
    let { context, logger } = createTestContext(fake.transport)

    let id = await createRelease(context, settings(), 'notes')

    expect(id).toBe('100')
    expect(releases).toHaveLength(1)
    expect(fake.requests.at(-1)!.json).toEqual({
      name: 'Release 1.0.0',
      tag_name: 'v1.0.0',
      prerelease: false,
      draft: false,
      body: 'notes',
    })
    expect(logger.info).toHaveBeenCalledWith('release created', {
      'request-id': 'REQ-C',
      name: 'Release 1.0.0',
      'release-id': 100,
    })
  })

  it('includes optional fields only when set', async () => {
    let { fake } = createReleaseServer()
    let { context } = createTestContext(fake.transport)

    await createRelease(
      context,
      settings({
        discussionCategory: 'Announcements',
        targetCommitish: 'abc123',
        prerelease: true,
      }),
      'notes',
    )

    expect(fake.requests.at(-1)!.json).toEqual({
      discussion_category_name: 'Announcements',
      target_commitish: 'abc123',
      name: 'Release 1.0.0',
      tag_name: 'v1.0.0',
      prerelease: true,
      draft: false,
      body: 'notes',
    })
  })

  it('keeps a single release per tag and merges bodies on the second run', async () => {
    let { releases, fake } = createReleaseServer()
    let { context } = createTestContext(fake.transport)

    let first = await createRelease(
      context,
      settings({ notesMode: 'append' }),
      'first notes',
    )
    let second = await createRelease(
      context,
      settings({ notesMode: 'append' }),
      'second notes',
    )

    expect(first).toBe('100')
    expect(second).toBe('100')
    expect(releases).toHaveLength(1)
    expect(releases[0]!.body).toBe('first notes\n\nsecond notes')
    expect(fake.requests.map(request => request.method)).toEqual([
      'GET',
      'POST',
      'GET',
      'PATCH',
    ])
  })

  it('keeps the existing body by default', async () => {
    let { releases, fake } = createReleaseServer([
      {
        target_commitish: 'main',
        name: 'Release 1.0.0',
        body: 'curated notes',
        tag_name: 'v1.0.0',
        draft: false,
        id: 7,
      },
    ])
    let { context, logger } = createTestContext(fake.transport)

    let id = await createRelease(context, settings(), 'generated notes')

    expect(id).toBe('7')
    expect(releases[0]!.body).toBe('curated notes')
    expect(logger.info).toHaveBeenCalledWith('release updated', {
      'request-id': 'REQ-U',
      name: 'Release 1.0.0',
      'release-id': 7,
    })
  })

  it('replaces the body in replace mode', async () => {
    let { releases, fake } = createReleaseServer([
      {
        target_commitish: 'main',
        name: 'Release 1.0.0',
        tag_name: 'v1.0.0',
        draft: false,
        body: 'old',
        id: 7,
      },
    ])
    let { context } = createTestContext(fake.transport)

    await createRelease(context, settings({ notesMode: 'replace' }), 'new')

    expect(releases[0]!.body).toBe('new')
  })

  it('deletes a draft with the same name before creating', async () => {
    let { fake } = createReleaseServer()
    let routes = createFakeGitHub({
      'GET /repos/o/r/releases?per_page=50&page=1': {
        body: [
          {
            target_commitish: 'main',
            name: 'Release 1.0.0',
            tag_name: 'v1.0.0',
            draft: false,
            id: 5,
          },
          {
            target_commitish: 'main',
            name: 'Release 1.0.0',
            tag_name: 'v1.0.0',
            draft: true,
            id: 6,
          },
        ],
      },
      'DELETE /repos/o/r/releases/6': { status: 204 },
    })
    let { context, logger } = createTestContext((url, request) =>
      new URL(url).pathname.startsWith('/repos/o/r/releases/tags') ||
      request.method === 'POST' ?
        fake.transport(url, request)
      : routes.transport(url, request),
    )

    await createRelease(
      context,
      settings({ replaceExistingDraft: true, draft: true }),
      'notes',
    )

    expect(describeRequests(routes.requests)).toEqual([
      'GET /repos/o/r/releases?per_page=50&page=1',
      'DELETE /repos/o/r/releases/6',
    ])
    expect(fake.requests.map(request => request.method)).toEqual([
      'GET',
      'POST',
    ])
    expect(logger.info).toHaveBeenCalledWith('deleted previous draft release', {
      name: 'Release 1.0.0',
      tag: 'v1.0.0',
      commit: 'main',
    })
  })

  it('treats a draft that is already gone as deleted', async () => {
    let { fake } = createReleaseServer()
    let routes = createFakeGitHub({
      'GET /repos/o/r/releases?per_page=50&page=1': {
        body: [
          {
            target_commitish: 'main',
            name: 'Release 1.0.0',
            tag_name: 'v1.0.0',
            draft: true,
            id: 6,
          },
        ],
      },
    })
    let { context } = createTestContext((url, request) =>
      new URL(url).pathname.startsWith('/repos/o/r/releases/tags') ||
      request.method === 'POST' ?
        fake.transport(url, request)
      : routes.transport(url, request),
    )

    await expect(
      createRelease(
        context,
        settings({ replaceExistingDraft: true, draft: true }),
        'notes',
      ),
    ).resolves.toBe('100')
  })

  it('does not scan drafts unless creating a draft', async () => {
    let { fake } = createReleaseServer()
    let { context } = createTestContext(fake.transport)

    await createRelease(context, settings({ replaceExistingDraft: true }), 'x')

    expect(
      fake.requests.some(request =>
        request.path.startsWith('/repos/o/r/releases?'),
      ),
    ).toBeFalsy()
  })

  it('propagates lookup failures instead of creating', async () => {
    let fake = createFakeGitHub({
      'GET /repos/o/r/releases/tags/v1.0.0': {
        body: { message: 'unavailable' },
        status: 503,
      },
    })
    let { context } = createTestContext(fake.transport)

    let error: unknown = await createRelease(
      context,
      settings(),
      'notes',
    ).catch((caught: unknown) => caught)

    expect(error).toHaveProperty('message', 'could not release')
    expect(error).toHaveProperty('cause.status', 503)
    expect(fake.requests.some(request => request.method === 'POST')).toBeFalsy()
  })

  it('truncates bodies over the length limit', async () => {
    let { fake } = createReleaseServer()
    let { context, logger } = createTestContext(fake.transport)

    await createRelease(context, settings(), 'a'.repeat(130_000))

    let payload = fake.requests.at(-1)!.json as { body: string }
    expect(payload.body).toHaveLength(125_000)
    expect(payload.body.endsWith('...')).toBeTruthy()
    expect(logger.warn).toHaveBeenCalledWith('truncated release body', {
      bodylen: 130_000,
    })
  })

  it('truncates merged bodies too', async () => {
    let { releases, fake } = createReleaseServer([
      {
        body: 'b'.repeat(100_000),
        target_commitish: 'main',
        name: 'Release 1.0.0',
        tag_name: 'v1.0.0',
        draft: false,
        id: 7,
      },
    ])
    let { context } = createTestContext(fake.transport)

    await createRelease(
      context,
      settings({ notesMode: 'append' }),
      'c'.repeat(50_000),
    )

    expect(releases[0]!.body).toHaveLength(125_000)
  })
})
