import type { RegistryClientContext } from '../../types/registry-client-context'
import type { RegistryCredentials } from '../../types/registry-credentials'
import type { RegistrySource } from '../../types/registry-source'

import { resolveRegistryCredentialsSync } from './resolve-registry-credentials-sync'
import { hasLocalImage } from './has-local-image'
import { getManifest } from './get-manifest'

/**
 * Create a registry source backed by the docker CLI and the registry HTTP
 * API.
 *
 * @param options - Client options.
 * @param options.credentials - Credentials by registry host, read from the
 *   docker config when omitted.
 * @param options.cwd - Working directory for docker commands.
 * @returns Registry source with its own token cache.
 */
export function createRegistryClient(
  options: {
    credentials?: Map<string, RegistryCredentials>
    cwd?: string
  } = {},
): RegistrySource {
  let context: RegistryClientContext = {
    credentials: options.credentials ?? resolveRegistryCredentialsSync(),
    cwd: options.cwd ?? process.cwd(),
    tokens: new Map(),
  }

  return {
    hasLocalImage: reference => hasLocalImage(context, reference),
    getManifest: reference => getManifest(context, reference),
  }
}
