import type { Document } from 'yaml'

import { isScalar, Scalar, isMap, isSeq } from 'yaml'

import type { ValuesPathSegment } from '../../types/values-path-segment'
import type { ValueModification } from '../../types/value-modification'

import { ConfigError } from '../errors/config-error'

/** Keys holding the image name inside an image mapping. */
const REPOSITORY_KEYS = ['name', 'repository']

/**
 * Write image repositories and tags into a values document.
 *
 * A mapping target gets its `name`/`repository` key and a single-quoted
 * `tag`; a string target becomes `repository:tag`. Nodes are edited in place
 * so comments and formatting survive.
 *
 * @param document - Parsed `values.yaml`.
 * @param modifications - Values to write.
 * @returns One line per changed value, e.g. `image.tag: 1.2.3`.
 * @throws {ConfigError} When a path is missing or points at another node.
 */
export function applyValueModifications(
  document: Document,
  modifications: ValueModification[],
): string[] {
  let changes: string[] = []

  for (let modification of modifications) {
    let { repository, source, path, tag } = modification
    let node = resolveNode(document.contents, path)

    if (isMap(node)) {
      let map = node
      let keys = REPOSITORY_KEYS.filter(key => map.has(key))
      if (keys.length === 0) {
        throw new ConfigError(
          `Could not find ${REPOSITORY_KEYS.join(' or ')} in values at ${source}`,
        )
      }
      for (let key of keys) {
        let current = map.get(key, true)
        if (!isScalar(current)) {
          map.set(key, repository)
          changes.push(`${source}.${key}: ${repository}`)
        } else if (writeScalar(current, repository)) {
          changes.push(`${source}.${key}: ${repository}`)
        }
      }

      let tagNode = map.get('tag', true)
      if (!isScalar(tagNode)) {
        let scalar = new Scalar(tag)
        scalar.type = Scalar.QUOTE_SINGLE
        map.set('tag', scalar)
        changes.push(`${source}.tag: ${tag}`)
      } else if (writeScalar(tagNode, tag, Scalar.QUOTE_SINGLE)) {
        changes.push(`${source}.tag: ${tag}`)
      }
      continue
    }

    if (isScalar(node) && typeof node.value === 'string') {
      let image = `${repository}:${tag}`
      if (writeScalar(node, image)) {
        changes.push(`${source}: ${image}`)
      }
      continue
    }

    if (node === undefined) {
      throw new ConfigError(`values path ${source} does not exist`)
    }
    throw new ConfigError(
      `values path ${source} must point at a mapping or a string`,
    )
  }

  return changes
}

/**
 * Walk a node along path segments.
 *
 * @param root - Document contents.
 * @param path - Segments to follow.
 * @returns The node at the path, or undefined when a segment is missing.
 */
export function resolveNode(
  root: unknown,
  path: ValuesPathSegment[],
): unknown {
  let node = root
  for (let segment of path) {
    if (segment.type === 'index' && isSeq(node)) {
      node = node.get(segment.index, true)
    } else if (isMap(node)) {
      node = node.get(
        segment.type === 'key' ? segment.key : String(segment.index),
        true,
      )
    } else {
      return undefined
    }
  }
  return node
}

/**
 * Set a scalar value in place.
 *
 * @param node - Scalar node.
 * @param value - New value.
 * @param type - Scalar style to apply.
 * @returns True when the value changed.
 */
function writeScalar(node: Scalar, value: string, type?: Scalar.Type): boolean {
  if (type) {
    node.type = type
  }
  if (node.value === value) {
    return false
  }
  node.value = value
  return true
}
