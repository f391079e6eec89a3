import type { RegistryClientContext } from '../../types/registry-client-context'

import { parseAuthenticateHeader } from './parse-authenticate-header'
import { getRegistryBaseUrl } from './get-registry-base-url'
import { RegistryError } from '../errors/registry-error'
import { getRegistryToken } from './get-registry-token'

/**
 * Perform a GET request against the registry HTTP API, answering an
 * authentication challenge once when the registry asks for one.
 *
 * @param context - Registry client context.
 * @param parameters - Request parameters.
 * @param parameters.registry - Registry host.
 * @param parameters.repository - Repository the request is scoped to.
 * @param parameters.path - API path beginning with `/v2/`.
 * @param parameters.accept - Accepted media types.
 * @returns Successful response, or null when the registry answers 404.
 * @throws {RegistryError} On network failures and other non-2xx statuses.
 */
export async function makeRegistryRequest(
  context: RegistryClientContext,
  parameters: {
    repository: string
    accept?: string[]
    registry: string
    path: string
  },
): Promise<Response | null> {
  let { repository, registry, accept, path } = parameters
  let url = `${getRegistryBaseUrl(registry)}${path}`

  let headers: Record<string, string> = { 'User-Agent': 'chartwright' }
  if (accept && accept.length > 0) {
    headers['Accept'] = accept.join(', ')
  }

  let response = await send(registry, url, headers)

  if (response.status === 401) {
    let authorization = await authorize(
      context,
      registry,
      repository,
      response.headers.get('www-authenticate'),
    )
    if (authorization) {
      response = await send(registry, url, {
        ...headers,
        Authorization: authorization,
      })
    }
  }

  if (response.status === 404) {
    return null
  }

  if (!response.ok) {
    throw new RegistryError(
      `Registry ${registry} responded ${response.status} ` +
        `${response.statusText} for ${path}`,
      response.status,
    )
  }

  return response
}

/**
 * Fetch a URL, converting network failures into RegistryError.
 *
 * @param registry - Registry host, for messages.
 * @param url - Request URL.
 * @param headers - Request headers.
 * @returns Response.
 */
async function send(
  registry: string,
  url: string,
  headers: Record<string, string>,
): Promise<Response> {
  try {
    return await fetch(url, { headers })
  } catch (error) {
    throw new RegistryError(
      `Cannot reach registry ${registry}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    )
  }
}

/**
 * Build the Authorization header answering a challenge.
 *
 * @param context - Registry client context.
 * @param registry - Registry host.
 * @param repository - Repository the request is scoped to.
 * @param header - `WWW-Authenticate` header value.
 * @returns Header value, or null when the challenge cannot be answered.
 */
async function authorize(
  context: RegistryClientContext,
  registry: string,
  repository: string,
  header: string | null,
): Promise<string | null> {
  let challenge = parseAuthenticateHeader(header)
  if (!challenge) {
    return null
  }

  if (challenge.scheme === 'bearer') {
    let realm = challenge.parameters['realm']
    if (!realm) {
      return null
    }
    let token = await getRegistryToken(context, {
      scope: challenge.parameters['scope'] ?? `repository:${repository}:pull`,
      service: challenge.parameters['service'] ?? null,
      registry,
      realm,
    })
    return `Bearer ${token}`
  }

  let credentials = context.credentials.get(registry)
  if (challenge.scheme === 'basic' && credentials) {
    let encoded = Buffer.from(
      `${credentials.username}:${credentials.password}`,
    ).toString('base64')
    return `Basic ${encoded}`
  }

  return null
}
