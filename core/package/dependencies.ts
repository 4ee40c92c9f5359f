/**
 * Dependency mapping adaptation
 *
 * Turns a raw `name -> constraint` mapping, as found in a manifest or a
 * registry version document, into an ordered Dependency list.
 */

import { ManifestShapeError } from '../errors/index.js'
import { createDependency, type Dependency } from '../resolver/dependency.js'
import { isRecord } from '../shape.js'

/**
 * Keys with this prefix are registry/tooling bookkeeping, not packages.
 */
export const RESERVED_KEY_PREFIX = '_'

/**
 * Adapt a raw dependency mapping.
 *
 * - `undefined` or `null` is zero dependencies
 * - keys starting with `_` are skipped
 * - order follows the mapping's insertion order
 *
 * @throws ManifestShapeError if the mapping is not an object or a
 *   constraint is not a string
 */
export function toDependencies(raw: unknown, source?: string): Dependency[] {
  if (raw === undefined || raw === null) {
    return []
  }

  if (!isRecord(raw)) {
    throw new ManifestShapeError(
      `Dependencies must be an object mapping names to version constraints${source ? ` in ${source}` : ''}`,
      { path: source }
    )
  }

  const dependencies: Dependency[] = []
  for (const [name, constraint] of Object.entries(raw)) {
    if (name.startsWith(RESERVED_KEY_PREFIX)) continue

    if (typeof constraint !== 'string') {
      throw new ManifestShapeError(
        `Version constraint for ${name} must be a string, got ${describe(constraint)}`,
        { package: name, path: source }
      )
    }

    dependencies.push(createDependency(name, constraint))
  }

  return dependencies
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}
