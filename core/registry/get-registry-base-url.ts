import { DEFAULT_REGISTRY } from './parse-image-reference'

/**
 * Build the HTTP API base URL of a registry host.
 *
 * Docker Hub is served from `registry-1.docker.io`. Registries on the local
 * machine are reached over plain HTTP, matching the container engine's
 * insecure-registry default.
 *
 * @param registry - Registry host, optionally with a port.
 * @returns Base URL without trailing slash.
 */
export function getRegistryBaseUrl(registry: string): string {
  if (registry === DEFAULT_REGISTRY || registry === 'index.docker.io') {
    return 'https://registry-1.docker.io'
  }

  let host = registry.replace(/:\d+$/u, '')
  let isLocal =
    host === 'localhost' || host === '127.0.0.1' || host === '[::1]'
  return `${isLocal ? 'http' : 'https'}://${registry}`
}
