/** Parsed `WWW-Authenticate` challenge. */
export interface AuthenticateChallenge {
  /** Challenge parameters (realm, service, scope, ...). */
  parameters: Record<string, string>

  /** Lowercase scheme, e.g. `bearer` or `basic`. */
  scheme: string
}

/**
 * Parse a `WWW-Authenticate` header such as
 * `Bearer realm="https://auth.docker.io/token",service="registry.docker.io"`.
 *
 * @param header - Header value.
 * @returns Challenge, or null when the header is empty.
 */
export function parseAuthenticateHeader(
  header: undefined | string | null,
): AuthenticateChallenge | null {
  let value = header?.trim()
  if (!value) {
    return null
  }

  let spaceIndex = value.indexOf(' ')
  let scheme = (spaceIndex === -1 ? value : value.slice(0, spaceIndex))
    .toLowerCase()
  let rest = spaceIndex === -1 ? '' : value.slice(spaceIndex + 1)

  let parameters: Record<string, string> = {}
  let pattern = /(?<key>[\w-]+)\s*=\s*(?:"(?<quoted>[^"]*)"|(?<bare>[^\s,]+))/gu
  for (let match of rest.matchAll(pattern)) {
    let key = match.groups?.['key']
    if (!key) {
      continue
    }
    parameters[key.toLowerCase()] =
      match.groups?.['quoted'] ?? match.groups?.['bare'] ?? ''
  }

  return { parameters, scheme }
}
