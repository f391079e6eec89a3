import type { ChartIndex } from '../../../types/chart-index'

import { isRecord } from '../../utils/is-record'

/**
 * Type guard to check if a value is a chart repository index: an object
 * whose `entries` map chart names to lists of objects with a string
 * `version`. A missing `entries` key is invalid; `entries: {}` is valid.
 *
 * @param value - Parsed `index.yaml`.
 * @returns True if the value is a valid chart index.
 */
export function isChartIndex(value: unknown): value is ChartIndex {
  if (!isRecord(value) || !isRecord(value['entries'])) {
    return false
  }

  return Object.values(value['entries']).every(
    versions =>
      Array.isArray(versions) &&
      versions.every(
        (entry: unknown) =>
          isRecord(entry) && typeof entry['version'] === 'string',
      ),
  )
}
