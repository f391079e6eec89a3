import semver from 'semver'

import type { VersionKeyword } from '../../types/version-keyword'
import type { Tag } from '../../types/tag'

import { DEFAULT_BASE_VERSION } from '../history/latest-tag'
import { ConfigError } from '../errors/config-error'
import { DEV_PRERELEASE } from './prerelease-marker'

/**
 * Compute the base version for a `major`/`minor`/`patch` keyword by
 * incrementing the latest tag and marking it as a development prerelease.
 *
 * @param tag - Latest tag, null when the branch has none.
 * @param keyword - Component to increment.
 * @returns Base version such as `1.3.0-0.dev`.
 * @throws {ConfigError} When the tag already is a prerelease.
 */
export function incrementBaseVersion(
  tag: Tag | null,
  keyword: VersionKeyword,
): string {
  if (tag?.prerelease) {
    throw new ConfigError(
      `baseVersion "${keyword}" cannot be applied to prerelease tag ` +
        `"${tag.name}"; set a literal baseVersion instead`,
    )
  }

  let current = tag?.version ?? DEFAULT_BASE_VERSION
  let next = semver.inc(current, keyword)
  if (!next) {
    throw new ConfigError(`Cannot increment "${current}" by ${keyword}`)
  }

  return `${next}-${DEV_PRERELEASE}`
}
