import semver from 'semver'

import type { Tag } from '../../types/tag'

import { isVersionKeyword } from './is-version-keyword'

/**
 * Warn when a literal base version no longer describes the next release.
 *
 * Development versions built from a base below the latest tag sort before
 * that release, so the configured base must keep pace with releases.
 *
 * @param baseVersion - Configured base version.
 * @param tag - Latest tag.
 * @returns Warning message, or null when the base version is ahead.
 */
export function checkBaseVersion(
  baseVersion: undefined | string | null,
  tag: Tag | null,
): string | null {
  if (!baseVersion || !tag || isVersionKeyword(baseVersion)) {
    return null
  }
  if (!semver.valid(baseVersion)) {
    return null
  }
  if (semver.gt(baseVersion, tag.version)) {
    return null
  }

  return (
    `baseVersion ${baseVersion} is not newer than the latest tag ` +
    `${tag.name}; development versions will sort before ${tag.version}`
  )
}
