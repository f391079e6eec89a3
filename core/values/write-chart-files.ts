import { writeFile, rename, rm } from 'node:fs/promises'

import type { ChartFileUpdate } from '../../types/chart-file-update'

/** Suffix of the staging file written next to each target. */
export const STAGING_SUFFIX = '.chartwright-tmp'

/**
 * Write prepared chart file updates.
 *
 * Every update is staged next to its target first. Targets are only replaced
 * once all staging files are written; a failed write removes the staged files
 * and leaves every target untouched.
 *
 * @param updates - Updates from `prepareChartFiles`.
 */
export async function writeChartFiles(
  updates: ChartFileUpdate[],
): Promise<void> {
  try {
    for (let update of updates) {
      await writeFile(`${update.path}${STAGING_SUFFIX}`, update.content, 'utf8')
    }
  } catch (error) {
    await Promise.all(
      updates.map(update =>
        rm(`${update.path}${STAGING_SUFFIX}`, { force: true }),
      ),
    )
    throw error
  }

  for (let update of updates) {
    await rename(`${update.path}${STAGING_SUFFIX}`, update.path)
  }
}
