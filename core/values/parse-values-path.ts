import type { ValuesPathSegment } from '../../types/values-path-segment'

import { ConfigError } from '../errors/config-error'

/**
 * Parse a dotted values path into typed segments. Purely numeric parts are
 * sequence indexes, everything else is a mapping key.
 *
 * @example
 *   parseValuesPath('sidecars.0.image')
 *   // [{ type: 'key', key: 'sidecars' }, { type: 'index', index: 0 },
 *   //  { type: 'key', key: 'image' }]
 *
 * @param path - Dotted path such as `hub.image`.
 * @returns Path segments.
 * @throws {ConfigError} On empty paths or empty segments.
 */
export function parseValuesPath(path: string): ValuesPathSegment[] {
  let trimmed = path.trim()
  if (!trimmed) {
    throw new ConfigError('valuesPath must not be empty')
  }

  return trimmed.split('.').map(part => {
    if (!part) {
      throw new ConfigError(`valuesPath "${path}" has an empty segment`)
    }
    if (/^\d+$/u.test(part)) {
      return { index: Number.parseInt(part, 10), type: 'index' }
    }
    return { type: 'key', key: part }
  })
}
