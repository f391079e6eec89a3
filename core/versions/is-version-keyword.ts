import type { VersionKeyword } from '../../types/version-keyword'

/**
 * Check whether a base version is one of the increment keywords.
 *
 * @param value - Configured base version.
 * @returns True for `major`, `minor` or `patch`.
 */
export function isVersionKeyword(
  value: undefined | string | null,
): value is VersionKeyword {
  return value === 'major' || value === 'minor' || value === 'patch'
}
