import semver from 'semver'

import { VersionFormatError } from '../errors/version-format-error'

/**
 * Ensure a composed version is SemVer2 and usable as an image tag: a
 * `major.minor.patch` core, at most one `-` introducing the prerelease tail,
 * no leading zeros in numeric identifiers and no `+` build metadata.
 *
 * @param version - Composed version.
 * @returns The same version.
 * @throws {VersionFormatError} When a rule is broken.
 */
export function validateVersion(version: string): string {
  if (version.includes('+')) {
    throw new VersionFormatError(version, 'build metadata (+) is not allowed')
  }

  let parsed = semver.parse(version)
  if (!parsed || parsed.version !== version) {
    throw new VersionFormatError(version, 'not a SemVer2 version')
  }

  return version
}
