import type { ValuesPathSegment } from './values-path-segment'

/** Repository and tag to write at one location of `values.yaml`. */
export interface ValueModification {
  /** Parsed location inside the values document. */
  path: ValuesPathSegment[]

  /** Image name without tag. */
  repository: string

  /** Original dotted path, used in messages. */
  source: string

  tag: string
}
