import type { ImageConfig } from './image-config'

/** One chart entry in `chartwright.yaml`. */
export interface ChartConfig {
  /** Chart repository coordinates used by the publish gate. */
  repo?: {
    /** Base URL serving `index.yaml`. */
    published: string

    /** Git repository backing the chart repository. */
    git?: string
  }

  /** Images built for this chart, keyed by short name. */
  images?: Record<string, ImageConfig>

  /** Literal SemVer2 base version or `major`/`minor`/`patch`. */
  baseVersion?: string

  /** Chart version written by `--reset`. */
  resetVersion?: string

  /** Image prefix prepended to image keys. */
  imagePrefix?: string

  /** Image tag written by `--reset`. */
  resetTag?: string

  /** Extra paths whose changes affect the chart version. */
  paths?: string[]

  /** Chart directory holding `Chart.yaml` and `values.yaml`. */
  name: string
}
