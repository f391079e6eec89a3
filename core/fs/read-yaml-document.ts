import type { Document } from 'yaml'

import { readFile } from 'node:fs/promises'
import { parseDocument } from 'yaml'

import { readErrorProperty } from '../utils/read-error-property'
import { ConfigError } from '../errors/config-error'

/**
 * Reads a YAML file and returns both its raw content and the parsed Document,
 * which keeps comments and formatting for later edits.
 *
 * @param filePath - Path to the YAML file.
 * @returns Parsed YAML document along with original content.
 * @throws {ConfigError} When the file is missing or is not valid YAML.
 */
export async function readYamlDocument(
  filePath: string,
): Promise<{ document: Document; content: string }> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    if (readErrorProperty(error, 'code') === 'ENOENT') {
      throw new ConfigError(`${filePath} not found`)
    }
    throw error
  }

  let document: Document = parseDocument(content)
  let [firstError] = document.errors
  if (firstError) {
    throw new ConfigError(`${filePath}: ${firstError.message}`)
  }
  return { document, content }
}
