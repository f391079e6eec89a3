import { describe, expect, it } from 'vitest'
import semver from 'semver'

import type { VersionSpec } from '../../types/version-spec'

import { VersionFormatError } from '../../core/errors/version-format-error'
import { resolveVersion } from '../../core/versions/resolve-version'
import { ConfigError } from '../../core/errors/config-error'
import { parseTag } from '../../core/history/parse-tag'

function versionSpec(overrides: Partial<VersionSpec> = {}): VersionSpec {
  return {
    hash: { hash: 'asdf1234567890', abbreviatedHash: 'asdf123' },
    base: '1.2.3',
    distance: 4,
    long: false,
    ...overrides,
  }
}

describe('resolveVersion', () => {
  it('appends the development suffix to a release tag', () => {
    expect(resolveVersion(versionSpec())).toBe('1.2.3-0.dev.git.4.hasdf123')
  })

  it('extends the prerelease of a prerelease tag', () => {
    let version = resolveVersion(
      versionSpec({
        hash: { abbreviatedHash: 'dfgh345', hash: 'dfgh345' },
        base: '0.9.0-beta.1',
        distance: 12,
      }),
    )
    expect(version).toBe('0.9.0-beta.1.git.12.hdfgh345')
  })

  it('returns the tag on a tagged commit', () => {
    expect(resolveVersion(versionSpec({ distance: 0 }))).toBe('1.2.3')
  })

  it('keeps the suffix on a tagged commit with long', () => {
    expect(resolveVersion(versionSpec({ distance: 0, long: true }))).toBe(
      '1.2.3-0.dev.git.0.hasdf123',
    )
  })

  it('uses a literal base version ahead of the tag', () => {
    let version = resolveVersion(
      versionSpec({ hash: { abbreviatedHash: 'abcd123', hash: 'abcd123' } }),
      { baseVersion: '1.3.0-0.dev', tag: parseTag('1.2.3') },
    )
    expect(version).toBe('1.3.0-0.dev.git.4.habcd123')
    expect(semver.gt(version, '1.2.3')).toBeTruthy()
    expect(semver.lt(version, '1.3.0')).toBeTruthy()
  })

  it('ignores the base version on a tagged commit', () => {
    expect(
      resolveVersion(versionSpec({ distance: 0 }), { baseVersion: '2.0.0' }),
    ).toBe('1.2.3')
  })

  it('increments the tag for keyword base versions', () => {
    let tag = parseTag('v1.2.3')
    expect(resolveVersion(versionSpec(), { baseVersion: 'major', tag })).toBe(
      '2.0.0-0.dev.git.4.hasdf123',
    )
    expect(resolveVersion(versionSpec(), { baseVersion: 'minor', tag })).toBe(
      '1.3.0-0.dev.git.4.hasdf123',
    )
    expect(resolveVersion(versionSpec(), { baseVersion: 'patch', tag })).toBe(
      '1.2.4-0.dev.git.4.hasdf123',
    )
  })

  it('increments the default base without a tag', () => {
    expect(
      resolveVersion(versionSpec({ base: '0.0.1', distance: 7 }), {
        baseVersion: 'minor',
        tag: null,
      }),
    ).toBe('0.1.0-0.dev.git.7.hasdf123')
  })

  it('rejects keywords on prerelease tags', () => {
    expect(() =>
      resolveVersion(versionSpec({ base: '0.9.0-beta.1' }), {
        tag: parseTag('0.9.0-beta.1'),
        baseVersion: 'minor',
      }),
    ).toThrowError(ConfigError)
  })

  it('rejects a literal base version that is not SemVer2', () => {
    expect(() => resolveVersion(versionSpec(), { baseVersion: '1.3' })).toThrowError(
      'baseVersion "1.3" must be a SemVer2 version or one of major, minor, patch',
    )
  })

  it('returns an override verbatim', () => {
    expect(resolveVersion(versionSpec(), { override: 'custom-tag' })).toBe(
      'custom-tag',
    )
  })

  it('rejects composed versions that are not SemVer2', () => {
    expect(() => resolveVersion(versionSpec({ base: '01.2.3', distance: 0 }))).toThrowError(
      VersionFormatError,
    )
  })

  it('is deterministic', () => {
    expect(resolveVersion(versionSpec())).toBe(resolveVersion(versionSpec()))
  })

  it('sorts later development builds after earlier ones', () => {
    let first = resolveVersion(versionSpec({ distance: 2 }))
    let second = resolveVersion(versionSpec({ distance: 10 }))
    expect(semver.lt(first, second)).toBeTruthy()
  })
})
