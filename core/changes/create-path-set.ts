import { posix } from 'node:path'

import type { PathSet } from '../../types/path-set'

/**
 * Build a path set from any number of path groups.
 *
 * Paths are normalized (`./images/a/` becomes `images/a`), empty entries are
 * dropped, duplicates collapse and the result is sorted, so the order of the
 * input never changes the set.
 *
 * @param groups - Path lists or single paths.
 * @returns Path set.
 */
export function createPathSet(
  ...groups: (readonly (string | undefined)[] | string | undefined)[]
): PathSet {
  let unique = new Set<string>()

  for (let group of groups) {
    let items = typeof group === 'string' || group === undefined ? [group] : group
    for (let item of items) {
      if (item === undefined) {
        continue
      }
      let trimmed = item.trim()
      if (!trimmed) {
        continue
      }
      let normalized = posix.normalize(trimmed.replaceAll('\\', '/'))
      if (normalized.length > 1 && normalized.endsWith('/')) {
        normalized = normalized.slice(0, -1)
      }
      unique.add(normalized)
    }
  }

  let paths = [...unique].sort()
  return { key: paths.join('\u0000'), paths }
}
