/**
 * Registry metadata provider interface and the metadata shapes it returns.
 *
 * The resolver only ever talks to a registry through this interface, so
 * any source of package metadata (HTTP registry, in-memory fixture,
 * mirror) can be passed in explicitly.
 */

/**
 * Declared dependencies as published: name -> constraint text.
 * Values are left unchecked here; manifest adaptation validates them.
 */
export type RawDependencyMap = Record<string, unknown>

/**
 * Distribution information for a version's tarball.
 */
export interface VersionDist {
  tarball?: string
  shasum?: string
  integrity?: string
}

/**
 * Metadata for one published version.
 */
export interface VersionMetadata {
  name?: string
  version: string
  /** Always present; a version that declares none has an empty map */
  dependencies: RawDependencyMap
  dist?: VersionDist
}

/**
 * All published versions of a package, keyed by version string in the
 * order the registry declared them. A Map, since plain objects move
 * integer-like keys such as `"2"` to the front.
 */
export type VersionMetadataMap = Map<string, VersionMetadata>

export interface RegistryMetadataProvider {
  /**
   * Fetch metadata for every published version of a package.
   *
   * @throws RegistryFetchError on transport or shape failure
   */
  fetchAllVersions(name: string): Promise<VersionMetadataMap>

  /**
   * Fetch the dependencies declared by one exact version.
   *
   * @throws RegistryFetchError on transport or shape failure
   */
  fetchVersionDeclaredDependencies(name: string, version: string): Promise<RawDependencyMap>
}
