/**
 * Check for a plain object.
 *
 * @param value - Value to check.
 * @returns True for non-null, non-array objects.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}
