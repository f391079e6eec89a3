import type { ResolveVersionOptions } from '../../types/resolve-version-options'
import type { VersionSpec } from '../../types/version-spec'

import { incrementBaseVersion } from './increment-base-version'
import { isVersionKeyword } from './is-version-keyword'
import { ConfigError } from '../errors/config-error'
import { validateVersion } from './validate-version'
import { isBaseVersion } from './is-base-version'
import { composeVersion } from './compose-version'

/**
 * Resolve the final version of a chart or image.
 *
 * Precedence:
 *
 * 1. An explicit override is returned verbatim.
 * 2. On a tagged commit without `long`, the tag itself.
 * 3. Otherwise the configured `baseVersion` (literal or incremented keyword),
 *    falling back to `input.base`, with a `.git.<distance>.h<hash>` suffix.
 *
 * @param input - Base version, distance and commit from history.
 * @param options - Override, configured base version and discovered tag.
 * @returns SemVer2 version.
 */
export function resolveVersion(
  input: VersionSpec,
  options: ResolveVersionOptions = {},
): string {
  if (options.override) {
    return options.override
  }

  if (input.distance === 0 && !input.long) {
    return validateVersion(input.base)
  }

  let base = resolveBase(input.base, options)
  return validateVersion(composeVersion({ ...input, base }))
}

/**
 * Pick the base version for a development build.
 *
 * @param fallback - Tag version or default base.
 * @param options - Resolution options.
 * @returns Base version.
 */
function resolveBase(
  fallback: string,
  options: ResolveVersionOptions,
): string {
  let baseVersion = options.baseVersion?.trim()
  if (!baseVersion) {
    return fallback
  }

  if (isVersionKeyword(baseVersion)) {
    return incrementBaseVersion(options.tag ?? null, baseVersion)
  }

  if (!isBaseVersion(baseVersion)) {
    throw new ConfigError(
      `baseVersion "${baseVersion}" must be a SemVer2 version or one of ` +
        'major, minor, patch',
    )
  }
  return baseVersion
}
