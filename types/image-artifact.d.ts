/** An image to build, identified by name, resolved tag and platforms. */
export interface ImageArtifact {
  /** Requested platforms minus skipped ones. */
  platforms: string[]

  /** Full image name including registry and prefix. */
  name: string

  tag: string
}
