/**
 * npm Registry Client
 *
 * Fetch-based HTTP implementation of RegistryMetadataProvider with:
 * - Timeout/retry support
 * - LRU caching for package documents
 * - Scoped package handling
 * - Custom registry support
 *
 * Every failure (network, timeout, non-2xx, malformed body, missing
 * `versions`) surfaces as a RegistryFetchError.
 *
 * @module core/registry/client
 */

import { LRUCache, type CacheStats } from '../cache/lru.js'
import { RegistryFetchError } from '../errors/index.js'
import { isRecord, optionalString } from '../shape.js'
import { memberKeyOrder } from './key-order.js'
import type {
  RawDependencyMap,
  RegistryMetadataProvider,
  VersionDist,
  VersionMetadata,
  VersionMetadataMap,
} from './types.js'

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_REGISTRY = 'https://registry.npmjs.org'

/**
 * Cache configuration for registry documents.
 */
export interface CacheConfig {
  enabled: boolean
  maxSize: number
}

/**
 * Configuration options for RegistryClient.
 */
export interface RegistryClientOptions {
  /**
   * Base URL of the npm registry.
   * @default 'https://registry.npmjs.org'
   */
  registry?: string

  /**
   * Request timeout in milliseconds.
   * @default 30000 (30 seconds)
   */
  timeout?: number

  /**
   * Total attempts per request, including the first.
   * @default 3
   */
  retries?: number

  /**
   * Base delay between retries in milliseconds.
   * Actual delay is retryDelay * attemptNumber.
   * @default 1000
   */
  retryDelay?: number

  cache?: Partial<CacheConfig>

  /**
   * User agent string for HTTP requests.
   * @default 'pkgresolve/0.1.0'
   */
  userAgent?: string

  /**
   * Custom fetch function (useful for testing or custom implementations).
   * @default globalThis.fetch
   */
  fetch?: typeof fetch
}

// =============================================================================
// RegistryClient Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const client = new RegistryClient({ registry: 'https://registry.npmjs.org' })
 *
 * const versions = await client.fetchAllVersions('left-pad')
 * const deps = await client.fetchVersionDeclaredDependencies('left-pad', '1.3.0')
 * ```
 */
export class RegistryClient implements RegistryMetadataProvider {
  private readonly registry: string
  private readonly timeout: number
  private readonly retries: number
  private readonly retryDelay: number
  private readonly userAgent: string
  private readonly _fetch: typeof fetch
  private readonly cacheConfig: CacheConfig
  private readonly packageCache: LRUCache<string, VersionMetadataMap>
  private readonly versionCache: LRUCache<string, RawDependencyMap>

  constructor(options?: RegistryClientOptions) {
    this.registry = (options?.registry ?? DEFAULT_REGISTRY).replace(/\/$/, '')
    this.timeout = options?.timeout ?? 30000
    this.retries = Math.max(1, options?.retries ?? 3)
    this.retryDelay = options?.retryDelay ?? 1000
    this.userAgent = options?.userAgent ?? 'pkgresolve/0.1.0'
    this._fetch = options?.fetch ?? globalThis.fetch.bind(globalThis)

    this.cacheConfig = {
      enabled: options?.cache?.enabled ?? true,
      maxSize: options?.cache?.maxSize ?? 100,
    }

    this.packageCache = new LRUCache({ maxSize: this.cacheConfig.maxSize })
    this.versionCache = new LRUCache({ maxSize: this.cacheConfig.maxSize })
  }

  // =========================================================================
  // RegistryMetadataProvider Implementation
  // =========================================================================

  /**
   * Fetch every published version of a package.
   * Results are cached according to cache configuration.
   */
  async fetchAllVersions(name: string): Promise<VersionMetadataMap> {
    this.assertValidPackageName(name)

    if (this.cacheConfig.enabled) {
      const cached = this.packageCache.get(name)
      if (cached) {
        return copyVersions(cached)
      }
    }

    const url = this.buildPackageUrl(name)
    const { body, text } = await this.getJson(url, name)

    const versions = body['versions']
    if (!isRecord(versions)) {
      throw new RegistryFetchError(`Versions was not a JSON object in ${url}`, {
        registry: this.registry,
        package: name,
      })
    }

    const normalized: VersionMetadataMap = new Map()
    for (const version of memberKeyOrder(text, 'versions') ?? Object.keys(versions)) {
      normalized.set(version, this.normalizeVersion(name, version, versions[version], url))
    }

    if (this.cacheConfig.enabled) {
      this.packageCache.set(name, normalized)
    }

    return copyVersions(normalized)
  }

  /**
   * Fetch the dependencies declared by one exact version, from the
   * registry's per-version document.
   */
  async fetchVersionDeclaredDependencies(name: string, version: string): Promise<RawDependencyMap> {
    this.assertValidPackageName(name)

    const key = `${name}@${version}`
    if (this.cacheConfig.enabled) {
      const cached = this.versionCache.get(key)
      if (cached) {
        return { ...cached }
      }
    }

    const url = `${this.buildPackageUrl(name)}/${encodeURIComponent(version)}`
    const { body } = await this.getJson(url, name)
    const dependencies = this.readDependencies(body['dependencies'], name, url)

    if (this.cacheConfig.enabled) {
      this.versionCache.set(key, dependencies)
    }

    return { ...dependencies }
  }

  // =========================================================================
  // Cache Management
  // =========================================================================

  getCacheConfig(): CacheConfig {
    return { ...this.cacheConfig }
  }

  /**
   * Invalidate cached documents for a package.
   */
  invalidateCache(name: string): void {
    this.packageCache.delete(name)
    for (const key of this.versionCache.keys()) {
      if (key.startsWith(`${name}@`)) {
        this.versionCache.delete(key)
      }
    }
  }

  clearCache(): void {
    this.packageCache.clear()
    this.versionCache.clear()
  }

  getCacheStats(): CacheStats {
    return this.packageCache.getStats()
  }

  // =========================================================================
  // Private Methods
  // =========================================================================

  private assertValidPackageName(name: string): void {
    if (!isValidPackageName(name)) {
      throw new RegistryFetchError(`Invalid package name: ${JSON.stringify(name)}`, {
        registry: this.registry,
        package: name,
      })
    }
  }

  /**
   * Build the URL for a package.
   * Scoped names keep the leading @ and encode the slash.
   */
  private buildPackageUrl(name: string): string {
    const encodedName = name.startsWith('@')
      ? `@${encodeURIComponent(name.slice(1))}`
      : encodeURIComponent(name)

    return `${this.registry}/${encodedName}`
  }

  /**
   * GET a JSON object document. The raw text is returned alongside the
   * parsed body for callers that need source key order.
   */
  private async getJson(url: string, name: string): Promise<{ body: Record<string, unknown>; text: string }> {
    let response: Response
    try {
      response = await this.fetchWithRetry(url)
    } catch (error) {
      if (error instanceof RegistryFetchError) {
        throw error
      }
      throw new RegistryFetchError(
        `Couldn't GET URL: ${url}: ${error instanceof Error ? error.message : String(error)}`,
        { registry: this.registry, package: name }
      )
    }

    if (response.status === 404) {
      throw new RegistryFetchError(`Package not found: ${name}`, {
        status: 404,
        registry: this.registry,
        package: name,
      })
    }

    if (!response.ok) {
      throw new RegistryFetchError(
        `Registry returned ${response.status}: ${response.statusText}`,
        { status: response.status, registry: this.registry, package: name }
      )
    }

    let text: string
    let body: unknown
    try {
      text = await response.text()
      body = JSON.parse(text)
    } catch {
      throw new RegistryFetchError(`Couldn't JSON parse metadata from ${url}`, {
        status: response.status,
        registry: this.registry,
        package: name,
      })
    }

    if (!isRecord(body)) {
      throw new RegistryFetchError(`Metadata from ${url} was not a JSON object`, {
        status: response.status,
        registry: this.registry,
        package: name,
      })
    }

    return { body, text }
  }

  /**
   * Fetch with timeout and retry support.
   * Retries network errors, timeouts and 5xx responses.
   */
  private async fetchWithRetry(url: string, attempt: number = 1): Promise<Response> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeout)

    try {
      const response = await this._fetch(url, {
        headers: {
          'Accept': 'application/json',
          'User-Agent': this.userAgent,
        },
        signal: controller.signal,
      })

      clearTimeout(timeoutId)

      if (response.status >= 500 && attempt < this.retries) {
        await this.delay(this.retryDelay * attempt)
        return this.fetchWithRetry(url, attempt + 1)
      }

      return response
    } catch (error) {
      clearTimeout(timeoutId)

      if (attempt < this.retries) {
        await this.delay(this.retryDelay * attempt)
        return this.fetchWithRetry(url, attempt + 1)
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new RegistryFetchError(`Request timed out after ${this.timeout}ms: ${url}`, {
          registry: this.registry,
        })
      }

      throw error
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
  }

  private readDependencies(value: unknown, name: string, url: string): RawDependencyMap {
    if (value === undefined || value === null) {
      return {}
    }
    if (!isRecord(value)) {
      throw new RegistryFetchError(`Dependencies in ${url} was not a JSON object`, {
        registry: this.registry,
        package: name,
      })
    }
    return value
  }

  private normalizeVersion(name: string, version: string, data: unknown, url: string): VersionMetadata {
    const raw = isRecord(data) ? data : {}
    const metadata: VersionMetadata = {
      name: optionalString(raw['name']) ?? name,
      version: optionalString(raw['version']) ?? version,
      dependencies: this.readDependencies(raw['dependencies'], name, url),
    }

    const dist = raw['dist']
    if (isRecord(dist)) {
      const normalizedDist: VersionDist = {}
      const tarball = optionalString(dist['tarball'])
      const shasum = optionalString(dist['shasum'])
      const integrity = optionalString(dist['integrity'])
      if (tarball !== undefined) normalizedDist.tarball = tarball
      if (shasum !== undefined) normalizedDist.shasum = shasum
      if (integrity !== undefined) normalizedDist.integrity = integrity
      metadata.dist = normalizedDist
    }

    return metadata
  }
}

/**
 * Copy a versions map deeply enough that callers cannot reach cached
 * dependency maps.
 */
function copyVersions(versions: VersionMetadataMap): VersionMetadataMap {
  const copy: VersionMetadataMap = new Map()
  for (const [version, metadata] of versions) {
    copy.set(version, { ...metadata, dependencies: { ...metadata.dependencies } })
  }
  return copy
}

/**
 * Validate a package name: non-empty, no path traversal or
 * percent-encoding, and scoped names of the form @scope/name.
 */
export function isValidPackageName(name: string): boolean {
  if (!name || name.length === 0) {
    return false
  }

  if (name.includes('..') || name.includes('%')) {
    return false
  }

  if (name.startsWith('@')) {
    const slashIndex = name.indexOf('/')
    if (slashIndex === -1 || slashIndex === 1 || slashIndex === name.length - 1) {
      return false
    }
    if (name.indexOf('/', slashIndex + 1) !== -1) {
      return false
    }
  }

  return true
}
