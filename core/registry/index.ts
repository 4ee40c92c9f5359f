/**
 * Registry metadata providers
 *
 * @module core/registry
 */

export type {
  RegistryMetadataProvider,
  RawDependencyMap,
  VersionMetadata,
  VersionMetadataMap,
  VersionDist,
} from './types.js'

export {
  RegistryClient,
  DEFAULT_REGISTRY,
  isValidPackageName,
  type RegistryClientOptions,
  type CacheConfig,
} from './client.js'

export { MemoryRegistry, type MemoryPackageVersions } from './memory.js'

export { memberKeyOrder } from './key-order.js'
