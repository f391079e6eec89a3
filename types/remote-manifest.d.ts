/** What a registry knows about one `name:tag`. */
export interface RemoteManifest {
  /**
   * Platforms (`os/arch[/variant]`) the tag provides. Empty when the registry
   * did not expose the platform of a single-image manifest.
   */
  platforms: string[]
}
