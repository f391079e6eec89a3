import type { RegistryClientContext } from '../../types/registry-client-context'

import { RegistryError } from '../errors/registry-error'
import { isRecord } from '../utils/is-record'

/**
 * Exchange a bearer challenge for a registry token.
 *
 * Uses the stored credentials of the registry when there are any, otherwise
 * requests an anonymous pull token.
 *
 * @param context - Registry client context.
 * @param parameters - Challenge parameters.
 * @param parameters.registry - Registry host the challenge came from.
 * @param parameters.realm - Token endpoint.
 * @param parameters.service - Service name, if given.
 * @param parameters.scope - Requested scope.
 * @returns Bearer token.
 * @throws {RegistryError} When the token endpoint rejects the request.
 */
export async function getRegistryToken(
  context: RegistryClientContext,
  parameters: {
    service: string | null
    registry: string
    realm: string
    scope: string
  },
): Promise<string> {
  let { registry, service, realm, scope } = parameters
  let cacheKey = `${realm}|${service ?? ''}|${scope}`
  let cached = context.tokens.get(cacheKey)
  if (cached) {
    return cached
  }

  let url: URL
  try {
    url = new URL(realm)
  } catch {
    throw new RegistryError(`Registry ${registry} sent an invalid realm`)
  }
  if (service) {
    url.searchParams.set('service', service)
  }
  url.searchParams.set('scope', scope)

  let headers: Record<string, string> = { 'User-Agent': 'chartwright' }
  let credentials = context.credentials.get(registry)
  if (credentials) {
    let encoded = Buffer.from(
      `${credentials.username}:${credentials.password}`,
    ).toString('base64')
    headers['Authorization'] = `Basic ${encoded}`
  }

  let response: Response
  try {
    response = await fetch(url, { headers })
  } catch (error) {
    throw new RegistryError(
      `Cannot reach token endpoint of ${registry}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    )
  }

  if (!response.ok) {
    throw new RegistryError(
      `Authentication against ${registry} failed: ` +
        `${response.status} ${response.statusText}`,
      response.status,
    )
  }

  let data: unknown = await response.json()
  let token = isRecord(data) ? (data['token'] ?? data['access_token']) : null
  if (typeof token !== 'string' || !token) {
    throw new RegistryError(`Token endpoint of ${registry} returned no token`)
  }

  context.tokens.set(cacheKey, token)
  return token
}
