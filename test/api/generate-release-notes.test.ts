import { describe, expect, it } from 'vitest'

import { generateReleaseNotes } from '../../core/api/generate-release-notes'
import { createFakeGitHub, createTestContext } from '../helpers/fake-github'

describe('generateReleaseNotes', () => {
  it('returns the generated body', async () => {
    let fake = createFakeGitHub({
      'POST /repos/o/r/releases/generate-notes': {
        body: { body: "## What's Changed\n* one", name: 'v2.0.0' },
      },
    })
    let { context } = createTestContext(fake.transport)

    let notes = await generateReleaseNotes(
      context,
      { owner: 'o', name: 'r' },
      'v1.0.0',
      'v2.0.0',
    )

    expect(notes).toBe("## What's Changed\n* one")
    expect(fake.requests[0]!.json).toEqual({
      previous_tag_name: 'v1.0.0',
      tag_name: 'v2.0.0',
    })
  })

  it('omits the previous tag when empty', async () => {
    let fake = createFakeGitHub({
      'POST /repos/o/r/releases/generate-notes': {
        body: { name: 'v1.0.0', body: 'first' },
      },
    })
    let { context } = createTestContext(fake.transport)

    await generateReleaseNotes(context, { owner: 'o', name: 'r' }, '', 'v1.0.0')

    expect(fake.requests[0]!.json).toEqual({ tag_name: 'v1.0.0' })
  })
})
