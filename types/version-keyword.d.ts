/** Base version keywords that increment the latest tag. */
export type VersionKeyword = 'major' | 'minor' | 'patch'
