import type { PublishDecision } from '../../types/publish-decision'
import type { ChartwrightConfig } from '../../types/chartwright-config'
import type { PlanDependencies } from '../../types/plan-dependencies'
import type { ChartConfig } from '../../types/chart-config'
import type { PlanOptions } from '../../types/plan-options'
import type { ChartPlan } from '../../types/chart-plan'
import type { ImagePlan } from '../../types/image-plan'

import { stripVersionPrefix } from '../history/strip-version-prefix'
import { resolveArtifactVersion } from './resolve-artifact-version'
import { evaluatePublish } from '../publish/evaluate-publish'
import { validatePlanOptions } from './validate-plan-options'
import { chartPathSet } from '../changes/chart-path-set'
import { planImage } from './plan-image'

/** Chart version written by `--reset` when the chart sets none. */
export const DEFAULT_RESET_VERSION = '0.0.1-set.by.chartwright'

/**
 * Resolve versions, tags and build/push/publish decisions for every chart.
 *
 * Options are validated before any query. The run cache is cleared when the
 * run starts and when it ends; any failing query aborts the whole run, so
 * callers only act on a complete plan.
 *
 * @param config - Loaded configuration.
 * @param options - Run options.
 * @param dependencies - History, registry, chart index and cache.
 * @returns One plan per chart, in configuration order.
 */
export async function planCharts(
  config: ChartwrightConfig,
  options: PlanOptions,
  dependencies: PlanDependencies,
): Promise<ChartPlan[]> {
  validatePlanOptions(config, options)

  let { history, cache } = dependencies
  cache.clear()
  try {
    if (!options.reset && !options.tag) {
      history.assertWorkTree()
    }

    let plans: ChartPlan[] = []
    for (let chart of config.charts) {
      plans.push(await planChart(chart, options, dependencies))
    }
    return plans
  } finally {
    cache.clear()
  }
}

/**
 * Plan a single chart.
 *
 * @param chart - Chart settings.
 * @param options - Run options.
 * @param dependencies - Run collaborators.
 * @returns Chart plan.
 */
async function planChart(
  chart: ChartConfig,
  options: PlanOptions,
  dependencies: PlanDependencies,
): Promise<ChartPlan> {
  let warnings = new Set<string>()
  let version: string

  if (options.reset) {
    version = chart.resetVersion ?? DEFAULT_RESET_VERSION
  } else {
    let resolved = resolveArtifactVersion(
      dependencies.history,
      chartPathSet(chart),
      {
        override: options.tag ? stripVersionPrefix(options.tag) : null,
        baseVersion: chart.baseVersion,
        cache: dependencies.cache,
        long: options.long,
      },
    )
    version = resolved.version
    for (let warning of resolved.warnings) {
      warnings.add(warning)
    }
  }

  let images: ImagePlan[] = []
  for (let [key, image] of Object.entries(chart.images ?? {})) {
    let result = await planImage(chart, key, image, options, dependencies)
    images.push(result.plan)
    for (let warning of result.warnings) {
      warnings.add(warning)
    }
  }

  let publish: PublishDecision | null = null
  if (options.publishChart && chart.repo) {
    let index = await dependencies.chartIndex.getChartIndex(
      chart.repo.published,
    )
    publish = evaluatePublish(
      { chartName: chart.name, version },
      index,
      options.forcePublishChart,
    )
  }

  return {
    warnings: [...warnings],
    chartName: chart.name,
    version,
    publish,
    images,
  }
}
