/** New content of one chart file, prepared before anything is written. */
export interface ChartFileUpdate {
  /** Human-readable change lines. */
  changes: string[]

  /** Serialized document. */
  content: string

  /** Absolute file path. */
  path: string
}
