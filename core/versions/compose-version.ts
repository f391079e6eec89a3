import type { VersionSpec } from '../../types/version-spec'

import { BUILD_IDENTIFIER, DEV_PRERELEASE, HASH_PREFIX } from './prerelease-marker'
import { hasPrerelease } from './has-prerelease'

/**
 * Compose a version from a base and the commit distance/hash.
 *
 * Examples:
 *
 * - `1.2.3`, 0 commits → `1.2.3`
 * - `1.2.3`, 0 commits, long → `1.2.3-0.dev.git.0.hasdf123`
 * - `1.2.3`, 4 commits → `1.2.3-0.dev.git.4.hasdf123`
 * - `0.9.0-beta.1`, 12 commits → `0.9.0-beta.1.git.12.hdfgh345`.
 *
 * @param input - Base, distance, commit and long flag.
 * @returns Version string, not yet validated.
 */
export function composeVersion(input: VersionSpec): string {
  let { distance, base, long, hash } = input

  if (distance === 0 && !long) {
    return base
  }

  let prerelease = hasPrerelease(base) ? base : `${base}-${DEV_PRERELEASE}`
  return (
    `${prerelease}.${BUILD_IDENTIFIER}.${distance}` +
    `.${HASH_PREFIX}${hash.abbreviatedHash}`
  )
}
