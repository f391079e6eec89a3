import type { ChartConfig } from '../../../types/chart-config'

import { isRecord } from '../../utils/is-record'
import { isStringList } from './is-string-list'

/** Optional string settings of a chart. */
const STRING_KEYS = [
  'baseVersion',
  'imagePrefix',
  'resetVersion',
  'resetTag',
] as const

/**
 * Type guard to check if a value has the shape of a chart entry. Images are
 * only required to be an object here; each one is checked with
 * `isImageConfig`.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid chart definition.
 */
export function isChartConfig(value: unknown): value is ChartConfig {
  if (!isRecord(value)) {
    return false
  }

  if (typeof value['name'] !== 'string' || value['name'].trim() === '') {
    return false
  }

  for (let key of STRING_KEYS) {
    if (value[key] !== undefined && typeof value[key] !== 'string') {
      return false
    }
  }

  if (value['paths'] !== undefined && !isStringList(value['paths'])) {
    return false
  }

  if (value['images'] !== undefined && !isRecord(value['images'])) {
    return false
  }

  let { repo } = value
  return (
    repo === undefined ||
    (isRecord(repo) &&
      typeof repo['published'] === 'string' &&
      (repo['git'] === undefined || typeof repo['git'] === 'string'))
  )
}
