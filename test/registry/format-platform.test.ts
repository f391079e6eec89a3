import { describe, expect, it } from 'vitest'

import { formatPlatform } from '../../core/registry/format-platform'

describe('formatPlatform', () => {
  it('formats os, architecture and variant', () => {
    expect(formatPlatform({ architecture: 'amd64', os: 'linux' })).toBe(
      'linux/amd64',
    )
    expect(
      formatPlatform({ architecture: 'arm64', variant: 'v8', os: 'linux' }),
    ).toBe('linux/arm64/v8')
  })

  it('skips attestation entries and malformed values', () => {
    expect(formatPlatform({ architecture: 'unknown', os: 'unknown' })).toBeNull()
    expect(formatPlatform({ os: 'linux' })).toBeNull()
    expect(formatPlatform('linux/amd64')).toBeNull()
  })
})
