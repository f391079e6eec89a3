/**
 * Type guard for a list of strings.
 *
 * @param value - The value to check.
 * @returns True if the value is an array containing only strings.
 */
export function isStringList(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.every((item: unknown) => typeof item === 'string')
  )
}
