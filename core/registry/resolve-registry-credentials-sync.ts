import { readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'

import type { RegistryCredentials } from '../../types/registry-credentials'

import { DEFAULT_REGISTRY } from './parse-image-reference'
import { isRecord } from '../utils/is-record'

/** Keys Docker Hub credentials may be stored under. */
const DOCKER_HUB_KEYS = [
  'https://index.docker.io/v1/',
  'index.docker.io',
  'docker.io',
  'registry-1.docker.io',
]

/**
 * Read registry credentials from the container engine config
 * (`$DOCKER_CONFIG/config.json` or `~/.docker/config.json`).
 *
 * Only inline `auths` entries with a username and password are supported;
 * identity tokens and credential helpers (`credsStore`, `credHelpers`) are
 * ignored.
 *
 * @returns Credentials keyed by registry host.
 */
export function resolveRegistryCredentialsSync(): Map<
  string,
  RegistryCredentials
> {
  let result = new Map<string, RegistryCredentials>()
  let directory = process.env['DOCKER_CONFIG'] ?? join(homedir(), '.docker')

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(join(directory, 'config.json'), 'utf8'))
  } catch {
    /** Missing or unreadable config means anonymous access. */
    return result
  }

  if (!isRecord(parsed) || !isRecord(parsed['auths'])) {
    return result
  }

  for (let [key, entry] of Object.entries(parsed['auths'])) {
    if (!isRecord(entry)) {
      continue
    }
    let credentials = readCredentials(entry)
    if (!credentials) {
      continue
    }
    let host = DOCKER_HUB_KEYS.includes(key)
      ? DEFAULT_REGISTRY
      : key.replace(/^https?:\/\//u, '').replace(/\/.*$/u, '')
    result.set(host, credentials)
  }

  return result
}

/**
 * Extract username and password from an `auths` entry.
 *
 * @param entry - Entry of the `auths` map.
 * @returns Credentials or null.
 */
function readCredentials(
  entry: Record<string, unknown>,
): RegistryCredentials | null {
  let { username, password, auth } = entry

  if (typeof username === 'string' && typeof password === 'string') {
    return { username, password }
  }
  if (typeof auth === 'string' && auth) {
    let decoded = Buffer.from(auth, 'base64').toString('utf8')
    let separator = decoded.indexOf(':')
    if (separator > 0) {
      return {
        password: decoded.slice(separator + 1),
        username: decoded.slice(0, separator),
      }
    }
  }
  return null
}
