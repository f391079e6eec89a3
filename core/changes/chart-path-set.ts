import type { ChartConfig } from '../../types/chart-config'
import type { PathSet } from '../../types/path-set'

import { createPathSet } from './create-path-set'
import { imagePathSet } from './image-path-set'

/**
 * Paths whose changes affect a chart version: the chart directory, the
 * chart's extra paths and the path set of every image it ships.
 *
 * @param chart - Chart settings.
 * @returns Path set of the chart.
 */
export function chartPathSet(chart: ChartConfig): PathSet {
  let imagePaths = Object.entries(chart.images ?? {}).flatMap(
    ([key, image]) => imagePathSet(key, image).paths,
  )
  return createPathSet(chart.name, chart.paths ?? [], imagePaths)
}
