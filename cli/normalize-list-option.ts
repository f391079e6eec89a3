/**
 * Flatten a repeatable flag into a list, accepting comma-separated values
 * inside a single flag.
 *
 * @param values - Raw flag values.
 * @returns Trimmed, non-empty entries in order.
 */
export function normalizeListOption(values: readonly string[]): string[] {
  return values
    .flatMap(item => item.split(','))
    .map(item => item.trim())
    .filter(Boolean)
}
