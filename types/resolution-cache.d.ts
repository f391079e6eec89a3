import type { RemoteManifest } from './remote-manifest'
import type { HistoryPoint } from './history-point'
import type { Tag } from './tag'

/**
 * Memoized query results for one top-level run. Created by the caller and
 * cleared at the start of each run; never shared across runs.
 */
export interface ResolutionCache {
  /** Remote manifests keyed by `name:tag`. */
  manifests: Map<string, RemoteManifest | null>

  /** History points keyed by reference and path set. */
  historyPoints: Map<string, HistoryPoint>

  /** Latest tag keyed by the reference it was described from. */
  tags: Map<string, Tag | null>

  /** Local image presence keyed by `name:tag`. */
  localImages: Map<string, boolean>

  /** Drop every memoized entry. */
  clear(): void
}
