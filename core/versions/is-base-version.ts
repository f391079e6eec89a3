import semver from 'semver'

import { isVersionKeyword } from './is-version-keyword'

/**
 * Check whether a configured base version is usable: an increment keyword or
 * a SemVer2 version written exactly as semver prints it.
 *
 * @param value - Configured base version, already trimmed.
 * @returns True when the value can be used as a base version.
 */
export function isBaseVersion(value: string): boolean {
  if (isVersionKeyword(value)) {
    return true
  }
  return semver.parse(value)?.version === value
}
