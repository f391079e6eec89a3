import type { PublishDecision } from '../../types/publish-decision'
import type { ChartArtifact } from '../../types/chart-artifact'
import type { ChartIndex } from '../../types/chart-index'

import { isVersionPublished } from './is-version-published'

/**
 * Decide whether a chart version should be published into a chart
 * repository. An already listed version is kept unless publishing is forced,
 * in which case the entry is overwritten.
 *
 * @param chart - Chart name and resolved version.
 * @param index - Current index of the chart repository.
 * @param forcePublish - Overwrite an existing entry.
 * @returns Publish decision.
 */
export function evaluatePublish(
  chart: ChartArtifact,
  index: ChartIndex,
  forcePublish: boolean = false,
): PublishDecision {
  let { chartName, version } = chart

  if (!isVersionPublished(index, chartName, version)) {
    return {
      reason: `${chartName} ${version} is not published yet`,
      needsPublish: true,
      overwrite: false,
    }
  }

  if (forcePublish) {
    return {
      reason: `${chartName} ${version} is already published, overwriting`,
      needsPublish: true,
      overwrite: true,
    }
  }

  return {
    reason: `${chartName} ${version} is already published`,
    needsPublish: false,
    overwrite: false,
  }
}
