/**
 * Package manifest handling
 *
 * Manifest reading and dependency mapping adaptation.
 */

export { toDependencies, RESERVED_KEY_PREFIX } from './dependencies.js'
export {
  parseManifest,
  readManifest,
  manifestPath,
  MANIFEST_FILENAME,
  type Manifest,
} from './manifest.js'
