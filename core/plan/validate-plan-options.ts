import type { ChartwrightConfig } from '../../types/chartwright-config'
import type { PlanOptions } from '../../types/plan-options'

import { isVersionKeyword } from '../versions/is-version-keyword'
import { isBaseVersion } from '../versions/is-base-version'
import { ConfigError } from '../errors/config-error'

/**
 * Reject contradictory options before any history or registry query.
 *
 * @param config - Loaded configuration.
 * @param options - Run options.
 * @throws {ConfigError} Describing the first conflict.
 */
export function validatePlanOptions(
  config: ChartwrightConfig,
  options: PlanOptions,
): void {
  if (options.tag !== undefined && !options.tag.trim()) {
    throw new ConfigError('--tag must not be empty')
  }
  if (options.tag && options.long) {
    throw new ConfigError('--tag and --long cannot be used together')
  }
  if (options.forcePush && !options.push) {
    throw new ConfigError('--force-push requires --push')
  }
  if (options.forcePublishChart && !options.publishChart) {
    throw new ConfigError('--force-publish-chart requires --publish-chart')
  }

  for (let chart of config.charts) {
    let baseVersion = chart.baseVersion?.trim()
    if (baseVersion && !isBaseVersion(baseVersion)) {
      throw new ConfigError(
        `baseVersion "${baseVersion}" of chart ${chart.name} must be a ` +
          'SemVer2 version or one of major, minor, patch',
      )
    }
    if (options.tag && isVersionKeyword(chart.baseVersion)) {
      throw new ConfigError(
        `--tag conflicts with baseVersion "${chart.baseVersion}" of chart ` +
          `${chart.name}; an explicit tag cannot be incremented`,
      )
    }
    if (options.publishChart && !chart.repo) {
      throw new ConfigError(
        `Chart ${chart.name} has no repo.published to publish into`,
      )
    }
  }
}
