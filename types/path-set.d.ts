/**
 * Sorted, de-duplicated repository-relative paths. Only produced by
 * `createPathSet`, so sets with the same members share the same `key`.
 */
export interface PathSet {
  /** Normalized paths in lexical order. */
  paths: readonly string[]

  /** Stable identity of the set, used as a cache key. */
  key: string
}
