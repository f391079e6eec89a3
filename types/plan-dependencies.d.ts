import type { ChartIndexSource } from './chart-index-source'
import type { ResolutionCache } from './resolution-cache'
import type { RegistrySource } from './registry-source'
import type { HistorySource } from './history-source'

/** Collaborators of a planning run. */
export interface PlanDependencies {
  /** Chart repository index access. */
  chartIndex: ChartIndexSource

  /** Run cache, cleared when the run starts and ends. */
  cache: ResolutionCache

  /** Container engine and registry access. */
  registry: RegistrySource

  /** Git history access. */
  history: HistorySource
}
