/** One step of a values path: a mapping key or a sequence index. */
export type ValuesPathSegment =
  | { type: 'index'; index: number }
  | { type: 'key'; key: string }
