import type { ChartIndex } from '../../types/chart-index'

/**
 * Check whether a chart repository index already lists a chart version.
 *
 * @param index - Parsed `index.yaml`.
 * @param chartName - Chart name.
 * @param version - Exact version string.
 * @returns True when the version is listed.
 */
export function isVersionPublished(
  index: ChartIndex,
  chartName: string,
  version: string,
): boolean {
  let entries = index.entries[chartName] ?? []
  return entries.some(entry => entry.version === version)
}
