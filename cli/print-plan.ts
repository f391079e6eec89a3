import pc from 'picocolors'

import type { BuildDecision } from '../types/build-decision'
import type { ChartPlan } from '../types/chart-plan'

/**
 * Format a yes/no answer.
 *
 * @param value - Decision flag.
 * @returns Coloured answer.
 */
function formatFlag(value: boolean): string {
  return value ? pc.green('yes') : pc.gray('no')
}

/**
 * Format a build decision on one line.
 *
 * @param decision - Build/push decision.
 * @returns Line describing the decision and its reasons.
 */
function formatDecision(decision: BuildDecision): string {
  return (
    `build: ${formatFlag(decision.needsBuild)}, ` +
    `push: ${formatFlag(decision.needsPush)} ` +
    pc.gray(`(${decision.reasons.join('; ')})`)
  )
}

/**
 * Print resolved versions, tags and decisions of every chart.
 *
 * @param plans - Plans returned by `planCharts`.
 */
export function printPlan(plans: ChartPlan[]): void {
  for (let plan of plans) {
    console.info(`\n${pc.cyan(plan.chartName)} ${pc.yellow(plan.version)}`)

    for (let image of plan.images) {
      let commit = image.commit ? pc.gray(` @ ${image.commit.abbreviatedHash}`) : ''
      console.info(`   • ${image.reference}${commit}`)
      if (image.decision) {
        console.info(`     ${formatDecision(image.decision)}`)
      }
    }

    if (plan.publish) {
      console.info(
        `   publish: ${formatFlag(plan.publish.needsPublish)} ` +
          pc.gray(`(${plan.publish.reason})`),
      )
    }

    for (let warning of plan.warnings) {
      console.warn(pc.yellow(`⚠️  ${warning}`))
    }
  }
}
