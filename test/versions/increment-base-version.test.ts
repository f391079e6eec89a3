import { describe, expect, it } from 'vitest'

import { incrementBaseVersion } from '../../core/versions/increment-base-version'
import { ConfigError } from '../../core/errors/config-error'
import { parseTag } from '../../core/history/parse-tag'

describe('incrementBaseVersion', () => {
  it('increments the requested component', () => {
    let tag = parseTag('1.2.3')
    expect(incrementBaseVersion(tag, 'major')).toBe('2.0.0-0.dev')
    expect(incrementBaseVersion(tag, 'minor')).toBe('1.3.0-0.dev')
    expect(incrementBaseVersion(tag, 'patch')).toBe('1.2.4-0.dev')
  })

  it('starts from 0.0.1 without a tag', () => {
    expect(incrementBaseVersion(null, 'patch')).toBe('0.0.2-0.dev')
  })

  it('throws for prerelease tags', () => {
    expect(() => incrementBaseVersion(parseTag('1.0.0-rc.1'), 'patch')).toThrowError(
      ConfigError,
    )
  })
})
