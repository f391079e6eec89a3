import type { ChartConfig } from './chart-config'

/** Root of `chartwright.yaml`. */
export interface ChartwrightConfig {
  charts: ChartConfig[]
}
