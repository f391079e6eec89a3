import type { ChartPlan } from '../types/chart-plan'

/**
 * Print one `name:tag` line per image, for scripts consuming the output.
 *
 * @param plans - Plans returned by `planCharts`.
 */
export function printImageList(plans: ChartPlan[]): void {
  for (let plan of plans) {
    for (let image of plan.images) {
      console.info(image.reference)
    }
  }
}
