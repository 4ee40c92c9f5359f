/**
 * In-memory registry provider.
 *
 * Holds package metadata in process. Used as the registry stand-in for
 * tests and for embedding callers that already have metadata at hand.
 */

import { RegistryFetchError } from '../errors/index.js'
import type {
  RawDependencyMap,
  RegistryMetadataProvider,
  VersionDist,
  VersionMetadataMap,
} from './types.js'

/**
 * Versions accepted by addPackage, each mapped to its declared
 * dependencies. Pass entries instead of an object to keep integer-like
 * version keys in declaration order.
 */
export type MemoryPackageVersions =
  | Record<string, RawDependencyMap>
  | Array<[version: string, dependencies: RawDependencyMap]>

export class MemoryRegistry implements RegistryMetadataProvider {
  private packages: Map<string, VersionMetadataMap> = new Map()

  /**
   * Add or replace a package. Versions keep the order given, which is the
   * order matching walks (last first).
   *
   * @example
   * ```typescript
   * registry.addPackage('a', {
   *   '1.0.0': { b: '^1.0.0' },
   *   '1.1.0': { b: '^1.1.0' },
   * })
   * ```
   */
  addPackage(name: string, versions: MemoryPackageVersions): void {
    const entries = Array.isArray(versions) ? versions : Object.entries(versions)
    const normalized: VersionMetadataMap = new Map()
    for (const [version, dependencies] of entries) {
      normalized.set(version, { name, version, dependencies })
    }
    this.packages.set(name, normalized)
  }

  /**
   * Append a version to a package, creating the package if needed.
   * Re-adding a version replaces it in place.
   */
  addVersion(name: string, version: string, dependencies: RawDependencyMap = {}, dist?: VersionDist): void {
    const versions = this.packages.get(name) ?? new Map()
    versions.set(version, { name, version, dependencies, ...(dist ? { dist } : {}) })
    this.packages.set(name, versions)
  }

  hasPackage(name: string): boolean {
    return this.packages.has(name)
  }

  async fetchAllVersions(name: string): Promise<VersionMetadataMap> {
    const versions = this.packages.get(name)
    if (!versions) {
      throw new RegistryFetchError(`Package not found: ${name}`, { status: 404, package: name })
    }

    const copy: VersionMetadataMap = new Map()
    for (const [version, metadata] of versions) {
      copy.set(version, { ...metadata, dependencies: { ...metadata.dependencies } })
    }
    return copy
  }

  async fetchVersionDeclaredDependencies(name: string, version: string): Promise<RawDependencyMap> {
    const metadata = this.packages.get(name)?.get(version)
    if (!metadata) {
      throw new RegistryFetchError(`Package not found: ${name}@${version}`, { status: 404, package: name })
    }
    return { ...metadata.dependencies }
  }
}
