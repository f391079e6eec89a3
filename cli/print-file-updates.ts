import { relative } from 'node:path'
import pc from 'picocolors'

import type { ChartFileUpdate } from '../types/chart-file-update'

/**
 * Print the files rewritten by a run and what changed in each.
 *
 * @param cwd - Repository root, paths are shown relative to it.
 * @param updates - Written updates.
 */
export function printFileUpdates(
  cwd: string,
  updates: ChartFileUpdate[],
): void {
  if (updates.length === 0) {
    console.info(pc.green('\n✨ Chart files are already up to date'))
    return
  }

  console.info('')
  for (let update of updates) {
    console.info(pc.cyan(relative(cwd, update.path)))
    for (let change of update.changes) {
      console.info(pc.gray(`   ${change}`))
    }
  }
}
