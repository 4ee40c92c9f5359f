/**
 * Core library entry point
 *
 * Dependency graph resolution, version range matching, registry metadata
 * providers, manifest handling and installation planning.
 */

// Semver - version range matching
export * as semver from './semver/index.js'
export { matchVersion, matchDependency, type MatchOptions } from './semver/index.js'

// Resolver - closure discovery and linearization
export * as resolver from './resolver/index.js'
export {
  DependencyResolver,
  resolveDependencies,
  createDependency,
  formatDependency,
  type Dependency,
  type DependencyId,
  type ResolverOptions,
  type ResolutionResult,
  type ResolutionStats,
} from './resolver/index.js'

// Registry - metadata providers
export * as registry from './registry/index.js'
export {
  RegistryClient,
  MemoryRegistry,
  type RegistryMetadataProvider,
  type RegistryClientOptions,
  type VersionMetadata,
  type VersionMetadataMap,
  type RawDependencyMap,
} from './registry/index.js'

// Package - manifest handling
export * as pkg from './package/index.js'
export { toDependencies, parseManifest, readManifest, type Manifest } from './package/index.js'

// Installer - install planning
export {
  install,
  planInstall,
  planStep,
  type InstallStep,
  type InstallSink,
  type InstallOptions,
  type InstallResult,
} from './installer/index.js'

// Errors - structured error types
export * from './errors/index.js'

// Config
export { loadConfig, DEFAULT_CONFIG, type PkgResolveConfig, type ConfigEnv } from './config.js'

// Cache - LRU cache for registry documents
export { LRUCache, type CacheOptions, type CacheStats } from './cache/lru.js'
