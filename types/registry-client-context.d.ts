import type { RegistryCredentials } from './registry-credentials'

/**
 * Internal client context shared by all registry functions: credentials and
 * bearer tokens obtained during the run.
 */
export interface RegistryClientContext {
  /** Bearer tokens keyed by realm, service and scope. */
  tokens: Map<string, string>

  /** Credentials keyed by registry host. */
  credentials: Map<string, RegistryCredentials>

  /** Working directory for container engine commands. */
  cwd: string
}
