import semver from 'semver'

import type { Tag } from '../../types/tag'

import { VersionFormatError } from '../errors/version-format-error'
import { stripVersionPrefix } from './strip-version-prefix'

/**
 * Parse a git tag name into a Tag.
 *
 * @param name - Tag name as printed by git.
 * @returns Parsed tag.
 * @throws {VersionFormatError} When the tag is not SemVer2.
 */
export function parseTag(name: string): Tag {
  let version = stripVersionPrefix(name)
  let parsed = semver.parse(version)
  if (!parsed || parsed.version !== version || parsed.build.length > 0) {
    throw new VersionFormatError(
      name,
      'the nearest git tag must be a SemVer2 version without build metadata',
    )
  }

  return {
    base: {
      major: parsed.major,
      minor: parsed.minor,
      patch: parsed.patch,
    },
    prerelease:
      parsed.prerelease.length > 0 ? parsed.prerelease.join('.') : null,
    version,
    name,
  }
}
