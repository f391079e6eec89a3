import { parse } from 'yaml'

import type { ChartIndexSource } from '../../types/chart-index-source'
import type { ChartIndex } from '../../types/chart-index'

import { isChartIndex } from '../schema/chart-index/is-chart-index'
import { RegistryError } from '../errors/registry-error'

/**
 * Create a chart index source reading `index.yaml` over HTTP.
 *
 * @returns Chart index source.
 */
export function createChartIndexSource(): ChartIndexSource {
  return {
    getChartIndex: url => fetchChartIndex(url),
  }
}

/**
 * Fetch and validate a chart repository index.
 *
 * @param url - Published base URL of the chart repository.
 * @returns Parsed index, empty when the repository has no index yet.
 * @throws {RegistryError} On network failures, unexpected statuses and
 *   malformed indexes.
 */
export async function fetchChartIndex(url: string): Promise<ChartIndex> {
  let indexUrl = `${url.replace(/\/+$/u, '')}/index.yaml`

  let response: Response
  try {
    response = await fetch(indexUrl, {
      headers: { 'User-Agent': 'chartwright' },
    })
  } catch (error) {
    throw new RegistryError(
      `Cannot fetch ${indexUrl}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    )
  }

  if (response.status === 404) {
    return { entries: {} }
  }
  if (!response.ok) {
    throw new RegistryError(
      `Chart repository responded ${response.status} ` +
        `${response.statusText} for ${indexUrl}`,
      response.status,
    )
  }

  let data: unknown
  try {
    data = parse(await response.text())
  } catch {
    throw new RegistryError(`${indexUrl} is not valid YAML`)
  }

  if (!isChartIndex(data)) {
    throw new RegistryError(`${indexUrl} is not a chart repository index`)
  }
  return data
}
