/**
 * Manifest source
 *
 * Reads a package.json-style manifest (`name`, `version`,
 * `dependencies`) into the root Dependency and its declared list.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { ManifestShapeError } from '../errors/index.js'
import { createDependency, type Dependency } from '../resolver/dependency.js'
import { isRecord } from '../shape.js'
import { toDependencies } from './dependencies.js'

export const MANIFEST_FILENAME = 'package.json'

export interface Manifest {
  /** `{ name, versionConstraint: version }` of the manifest's own package */
  root: Dependency
  dependencies: Dependency[]
}

/**
 * Parse manifest text.
 *
 * @param source - file path or label used in error messages
 * @throws ManifestShapeError on invalid JSON, a non-object document, or a
 *   missing or non-string `name` / `version`
 */
export function parseManifest(text: string, source?: string): Manifest {
  let document: unknown
  try {
    document = JSON.parse(text)
  } catch (error) {
    throw new ManifestShapeError(
      `Couldn't parse manifest${source ? ` ${source}` : ''}: ${error instanceof Error ? error.message : String(error)}`,
      { path: source }
    )
  }

  if (!isRecord(document)) {
    throw new ManifestShapeError(`Manifest${source ? ` ${source}` : ''} must be a JSON object`, { path: source })
  }

  const name = document['name']
  const version = document['version']
  if (typeof name !== 'string' || name.length === 0) {
    throw new ManifestShapeError(`Manifest${source ? ` ${source}` : ''} is missing a string "name"`, { path: source })
  }
  if (typeof version !== 'string' || version.length === 0) {
    throw new ManifestShapeError(`Manifest${source ? ` ${source}` : ''} is missing a string "version"`, {
      package: name,
      path: source,
    })
  }

  return {
    root: createDependency(name, version),
    dependencies: toDependencies(document['dependencies'], source),
  }
}

/**
 * Path of the manifest for `path`: `path` itself when it already names a
 * package.json, otherwise `path/package.json`.
 */
export function manifestPath(path: string): string {
  return path.endsWith(MANIFEST_FILENAME) ? path : join(path, MANIFEST_FILENAME)
}

/**
 * Read and parse the manifest at a file or directory path.
 *
 * @throws ManifestShapeError if the file cannot be read or is malformed
 */
export async function readManifest(path: string): Promise<Manifest> {
  const file = manifestPath(path)

  let text: string
  try {
    text = await readFile(file, 'utf8')
  } catch (error) {
    throw new ManifestShapeError(
      `Couldn't read manifest ${file}: ${error instanceof Error ? error.message : String(error)}`,
      { path: file }
    )
  }

  return parseManifest(text, file)
}
