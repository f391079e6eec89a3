/**
 * Read a property of an unknown thrown value, such as the `stderr` or `code`
 * of a failed child process.
 *
 * @param value - Thrown value.
 * @param key - Property name.
 * @returns Property value, or undefined when absent. Buffers become strings.
 */
export function readErrorProperty(value: unknown, key: string): unknown {
  if (value === null || typeof value !== 'object' || !(key in value)) {
    return undefined
  }

  let property: unknown = Reflect.get(value, key)
  if (Buffer.isBuffer(property)) {
    return property.toString('utf8')
  }
  return property
}
