import { join } from 'node:path'

import type { ChartFileUpdate } from '../../types/chart-file-update'
import type { ChartPlan } from '../../types/chart-plan'

import { applyValueModifications } from './apply-value-modifications'
import { readYamlDocument } from '../fs/read-yaml-document'
import { setChartVersion } from './set-chart-version'

/** Chart metadata file inside a chart directory. */
export const CHART_FILE = 'Chart.yaml'

/** Values file inside a chart directory. */
export const VALUES_FILE = 'values.yaml'

/**
 * Compute the new `Chart.yaml` and `values.yaml` of every planned chart in
 * memory. Nothing is written, so a failing chart leaves every file intact.
 *
 * @param cwd - Repository root.
 * @param plans - Complete plan of the run.
 * @returns Updates of files whose content changed.
 * @throws {ConfigError} When a file is missing, invalid or lacks a values
 *   path.
 */
export async function prepareChartFiles(
  cwd: string,
  plans: ChartPlan[],
): Promise<ChartFileUpdate[]> {
  let updates: ChartFileUpdate[] = []

  for (let plan of plans) {
    let chartPath = join(cwd, plan.chartName, CHART_FILE)
    let chart = await readYamlDocument(chartPath)
    if (setChartVersion(chart.document, plan.version)) {
      updates.push({
        changes: [`version: ${plan.version}`],
        content: chart.document.toString(),
        path: chartPath,
      })
    }

    let modifications = plan.images.flatMap(image => image.modifications)
    if (modifications.length === 0) {
      continue
    }

    let valuesPath = join(cwd, plan.chartName, VALUES_FILE)
    let values = await readYamlDocument(valuesPath)
    let changes = applyValueModifications(values.document, modifications)
    if (changes.length > 0) {
      updates.push({
        content: values.document.toString(),
        path: valuesPath,
        changes,
      })
    }
  }

  return updates
}
