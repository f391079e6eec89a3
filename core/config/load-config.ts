import { join } from 'node:path'

import type { ChartwrightConfig } from '../../types/chartwright-config'
import type { ChartConfig } from '../../types/chart-config'

import { isImageConfig } from '../schema/config/is-image-config'
import { isChartConfig } from '../schema/config/is-chart-config'
import { isBaseVersion } from '../versions/is-base-version'
import { readYamlDocument } from '../fs/read-yaml-document'
import { ConfigError } from '../errors/config-error'
import { isRecord } from '../utils/is-record'

/** Default configuration file name. */
export const CONFIG_FILE = 'chartwright.yaml'

/**
 * Read and validate the configuration file.
 *
 * @param cwd - Repository root.
 * @param file - Config path relative to `cwd`.
 * @returns Validated configuration.
 * @throws {ConfigError} When the file is missing, unparsable or invalid.
 */
export async function loadConfig(
  cwd: string,
  file: string = CONFIG_FILE,
): Promise<ChartwrightConfig> {
  let { document } = await readYamlDocument(join(cwd, file))
  return validateConfig(document.toJSON(), file)
}

/**
 * Validate a parsed configuration object.
 *
 * @param value - Parsed YAML.
 * @param file - File name, for messages.
 * @returns Validated configuration.
 * @throws {ConfigError} Naming the first invalid entry.
 */
export function validateConfig(
  value: unknown,
  file: string = CONFIG_FILE,
): ChartwrightConfig {
  let entries = isRecord(value) ? value['charts'] : undefined
  if (!Array.isArray(entries)) {
    throw new ConfigError(`${file} must define a "charts" list`)
  }

  let charts: ChartConfig[] = []
  let names = new Set<string>()
  for (let [index, chart] of entries.entries()) {
    if (!isChartConfig(chart)) {
      throw new ConfigError(`${file}: charts[${index}] is not a valid chart`)
    }
    if (names.has(chart.name)) {
      throw new ConfigError(`${file}: chart "${chart.name}" is listed twice`)
    }
    names.add(chart.name)

    let baseVersion = chart.baseVersion?.trim()
    if (baseVersion && !isBaseVersion(baseVersion)) {
      throw new ConfigError(
        `${file}: charts[${index}].baseVersion "${baseVersion}" must be a ` +
          'SemVer2 version or one of major, minor, patch',
      )
    }

    for (let [key, image] of Object.entries(chart.images ?? {})) {
      if (!isImageConfig(image)) {
        throw new ConfigError(
          `${file}: charts[${index}].images.${key} is not a valid image`,
        )
      }
      if (!image.imageName && chart.imagePrefix === undefined) {
        throw new ConfigError(
          `${file}: charts[${index}] needs imagePrefix or ` +
            `images.${key}.imageName`,
        )
      }
    }
    charts.push(chart)
  }

  return { charts }
}
