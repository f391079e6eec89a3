import type { ChartIndex } from './chart-index'

/** Read access to a published chart repository index. */
export interface ChartIndexSource {
  /**
   * Fetch and parse `<url>/index.yaml`. An index that does not exist yet is
   * returned empty.
   */
  getChartIndex(url: string): Promise<ChartIndex>
}
