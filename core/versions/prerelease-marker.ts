/**
 * Prerelease marker appended to release bases so development builds sort
 * after the previous release and before the next one.
 */
export const DEV_PRERELEASE = '0.dev'

/** Identifier introducing the commit distance and hash. */
export const BUILD_IDENTIFIER = 'git'

/** Prefix keeping the abbreviated hash a non-numeric identifier. */
export const HASH_PREFIX = 'h'
