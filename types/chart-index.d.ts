/** One chart version listed in a chart repository `index.yaml`. */
export interface ChartIndexEntry {
  /** Additional fields (urls, digest, created, ...). */
  [key: string]: unknown

  version: string
}

/** Parsed chart repository `index.yaml`. */
export interface ChartIndex {
  /** Versions per chart name. */
  entries: Record<string, ChartIndexEntry[]>

  [key: string]: unknown
}
