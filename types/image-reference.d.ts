/** A `name:tag` image reference split into its registry coordinates. */
export interface ImageReference {
  /** Repository path on the registry (e.g. `library/alpine`). */
  repository: string

  /** Registry host as written in the reference (e.g. `docker.io`). */
  registry: string

  /** Original `name:tag` string. */
  reference: string

  tag: string
}
