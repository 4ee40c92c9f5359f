/**
 * RegistryClient Tests
 *
 * Tests for the registry HTTP client against a mocked fetch.
 */

import { describe, it, expect, vi } from 'vitest'
import { RegistryClient, isValidPackageName } from '../../../core/registry/client.js'
import { RegistryFetchError } from '../../../core/errors/index.js'

// =============================================================================
// Mock Response Helpers
// =============================================================================

function createMockResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    statusText: status === 200 ? 'OK' : status === 404 ? 'Not Found' : 'Service Unavailable',
    headers: { 'Content-Type': 'application/json' },
  })
}

function createMockPackageDocument(name: string, versions: Record<string, Record<string, string>>) {
  const versionsObj: Record<string, unknown> = {}
  for (const [version, dependencies] of Object.entries(versions)) {
    versionsObj[version] = {
      name,
      version,
      dependencies,
      devDependencies: { vitest: '^2.0.0' },
      dist: {
        tarball: `https://registry.example.test/${name}/-/${name}-${version}.tgz`,
        shasum: 'abc123',
      },
    }
  }
  return {
    name,
    'dist-tags': { latest: Object.keys(versions).pop() },
    versions: versionsObj,
  }
}

function mockFetchOf(...bodies: Array<[unknown, number?]>) {
  const queue = [...bodies]
  return vi.fn(async () => {
    const next = queue.shift()
    if (!next) throw new Error('unexpected request')
    return createMockResponse(next[0], next[1])
  })
}

async function failureOf(promise: Promise<unknown>): Promise<RegistryFetchError> {
  const error = await promise.then(
    () => undefined,
    (err: unknown) => err
  )
  if (!(error instanceof RegistryFetchError)) {
    throw new Error(`expected RegistryFetchError, got ${String(error)}`)
  }
  return error
}

// =============================================================================
// Tests
// =============================================================================

describe('RegistryClient', () => {
  describe('constructor', () => {
    it('should strip trailing slash from registry URL', async () => {
      const mockFetch = mockFetchOf([createMockPackageDocument('test-pkg', { '1.0.0': {} })])
      const client = new RegistryClient({ registry: 'https://registry.example.test/', fetch: mockFetch })

      await client.fetchAllVersions('test-pkg')

      expect(mockFetch).toHaveBeenCalledWith('https://registry.example.test/test-pkg', expect.any(Object))
    })

    it('should accept custom cache configuration', () => {
      const client = new RegistryClient({ cache: { enabled: false, maxSize: 50 } })
      expect(client.getCacheConfig()).toEqual({ enabled: false, maxSize: 50 })
    })

    it('should enable caching by default', () => {
      const client = new RegistryClient()
      expect(client.getCacheConfig()).toEqual({ enabled: true, maxSize: 100 })
    })
  })

  describe('fetchAllVersions', () => {
    it('should return versions in document order with their dependencies', async () => {
      const mockFetch = mockFetchOf([
        createMockPackageDocument('left-pad', { '1.0.0': {}, '1.1.0': { 'right-pad': '^1.0.0' } }),
      ])
      const client = new RegistryClient({ registry: 'https://registry.example.test', fetch: mockFetch })

      const versions = await client.fetchAllVersions('left-pad')

      expect([...versions.keys()]).toEqual(['1.0.0', '1.1.0'])
      expect(versions.get('1.1.0')).toEqual({
        name: 'left-pad',
        version: '1.1.0',
        dependencies: { 'right-pad': '^1.0.0' },
        dist: {
          tarball: 'https://registry.example.test/left-pad/-/left-pad-1.1.0.tgz',
          shasum: 'abc123',
        },
      })
    })

    it('should send JSON accept and user agent headers', async () => {
      const mockFetch = mockFetchOf([createMockPackageDocument('a', { '1.0.0': {} })])
      const client = new RegistryClient({ fetch: mockFetch, userAgent: 'test-agent' })

      await client.fetchAllVersions('a')

      expect(mockFetch).toHaveBeenCalledWith(
        'https://registry.npmjs.org/a',
        expect.objectContaining({
          headers: { 'Accept': 'application/json', 'User-Agent': 'test-agent' },
        })
      )
    })

    it('should encode scoped package names', async () => {
      const mockFetch = mockFetchOf([createMockPackageDocument('@scope/pkg', { '1.0.0': {} })])
      const client = new RegistryClient({ registry: 'https://registry.example.test', fetch: mockFetch })

      await client.fetchAllVersions('@scope/pkg')

      expect(mockFetch).toHaveBeenCalledWith('https://registry.example.test/@scope%2Fpkg', expect.any(Object))
    })

    it('should default missing dependencies to an empty map', async () => {
      const mockFetch = mockFetchOf([{ name: 'a', versions: { '1.0.0': { version: '1.0.0' } } }])
      const client = new RegistryClient({ fetch: mockFetch })

      const versions = await client.fetchAllVersions('a')

      expect(versions.get('1.0.0')).toEqual({ name: 'a', version: '1.0.0', dependencies: {} })
    })

    it('should keep integer-like versions in document order', async () => {
      const body = '{"name":"a","versions":{"1.0.0":{"version":"1.0.0"},"2":{"version":"2"},"0.9.0":{}}}'
      const mockFetch = vi.fn(async () => new Response(body, { status: 200 }))
      const client = new RegistryClient({ fetch: mockFetch })

      const versions = await client.fetchAllVersions('a')

      expect([...versions.keys()]).toEqual(['1.0.0', '2', '0.9.0'])
      expect(versions.get('2')?.version).toBe('2')
    })

    it('should return copies of cached documents', async () => {
      const mockFetch = mockFetchOf([createMockPackageDocument('a', { '1.0.0': { b: '^1.0.0' } })])
      const client = new RegistryClient({ fetch: mockFetch })

      const first = await client.fetchAllVersions('a')
      first.delete('1.0.0')
      const second = await client.fetchAllVersions('a')
      const metadata = second.get('1.0.0')
      if (metadata) metadata.dependencies['c'] = '^1.0.0'
      const third = await client.fetchAllVersions('a')

      expect([...third.keys()]).toEqual(['1.0.0'])
      expect(third.get('1.0.0')?.dependencies).toEqual({ b: '^1.0.0' })
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('should serve repeated lookups from cache', async () => {
      const mockFetch = mockFetchOf([createMockPackageDocument('a', { '1.0.0': {} })])
      const client = new RegistryClient({ fetch: mockFetch })

      await client.fetchAllVersions('a')
      await client.fetchAllVersions('a')

      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(client.getCacheStats()).toMatchObject({ hits: 1, misses: 1, count: 1 })
    })

    it('should refetch after invalidation', async () => {
      const mockFetch = mockFetchOf(
        [createMockPackageDocument('a', { '1.0.0': {} })],
        [createMockPackageDocument('a', { '1.0.0': {}, '1.1.0': {} })]
      )
      const client = new RegistryClient({ fetch: mockFetch })

      await client.fetchAllVersions('a')
      client.invalidateCache('a')
      const versions = await client.fetchAllVersions('a')

      expect([...versions.keys()]).toEqual(['1.0.0', '1.1.0'])
      expect(mockFetch).toHaveBeenCalledTimes(2)
    })

    it('should not cache when caching is disabled', async () => {
      const mockFetch = mockFetchOf(
        [createMockPackageDocument('a', { '1.0.0': {} })],
        [createMockPackageDocument('a', { '1.0.0': {} })]
      )
      const client = new RegistryClient({ fetch: mockFetch, cache: { enabled: false } })

      await client.fetchAllVersions('a')
      await client.fetchAllVersions('a')

      expect(mockFetch).toHaveBeenCalledTimes(2)
    })
  })

  describe('fetchVersionDeclaredDependencies', () => {
    it('should fetch the per-version document', async () => {
      const mockFetch = mockFetchOf([{ name: 'a', version: '1.0.0', dependencies: { b: '^2.0.0' } }])
      const client = new RegistryClient({ registry: 'https://registry.example.test', fetch: mockFetch })

      const deps = await client.fetchVersionDeclaredDependencies('a', '1.0.0')

      expect(deps).toEqual({ b: '^2.0.0' })
      expect(mockFetch).toHaveBeenCalledWith('https://registry.example.test/a/1.0.0', expect.any(Object))
    })

    it('should treat missing or null dependencies as none', async () => {
      const mockFetch = mockFetchOf(
        [{ name: 'a', version: '1.0.0' }],
        [{ name: 'a', version: '2.0.0', dependencies: null }]
      )
      const client = new RegistryClient({ fetch: mockFetch })

      expect(await client.fetchVersionDeclaredDependencies('a', '1.0.0')).toEqual({})
      expect(await client.fetchVersionDeclaredDependencies('a', '2.0.0')).toEqual({})
    })

    it('should reject dependencies that are not an object', async () => {
      const mockFetch = mockFetchOf([{ name: 'a', version: '1.0.0', dependencies: ['b'] }])
      const client = new RegistryClient({ registry: 'https://registry.example.test', fetch: mockFetch })

      const error = await failureOf(client.fetchVersionDeclaredDependencies('a', '1.0.0'))

      expect(error.message).toBe('Dependencies in https://registry.example.test/a/1.0.0 was not a JSON object')
    })

    it('should cache per version', async () => {
      const mockFetch = mockFetchOf([{ name: 'a', version: '1.0.0', dependencies: { b: '^1.0.0' } }])
      const client = new RegistryClient({ fetch: mockFetch })

      await client.fetchVersionDeclaredDependencies('a', '1.0.0')
      await client.fetchVersionDeclaredDependencies('a', '1.0.0')

      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('should return copies of cached dependency maps', async () => {
      const mockFetch = mockFetchOf([{ name: 'a', version: '1.0.0', dependencies: { b: '^1.0.0' } }])
      const client = new RegistryClient({ fetch: mockFetch })

      const first = await client.fetchVersionDeclaredDependencies('a', '1.0.0')
      first['c'] = '^1.0.0'

      expect(await client.fetchVersionDeclaredDependencies('a', '1.0.0')).toEqual({ b: '^1.0.0' })
    })
  })

  describe('error handling', () => {
    it('should report a missing package', async () => {
      const client = new RegistryClient({ fetch: mockFetchOf([{ error: 'Not found' }, 404]) })

      const error = await failureOf(client.fetchAllVersions('nope'))

      expect(error.message).toBe('Package not found: nope')
      expect(error.status).toBe(404)
      expect(error.code).toBe('EFETCH')
    })

    it('should report other error statuses', async () => {
      const client = new RegistryClient({ fetch: mockFetchOf([{}, 403]) })

      const error = await failureOf(client.fetchAllVersions('a'))

      expect(error.status).toBe(403)
      expect(error.message).toMatch(/^Registry returned 403/)
    })

    it('should reject a body that is not JSON', async () => {
      const mockFetch = vi.fn(async () => new Response('<html>', { status: 200 }))
      const client = new RegistryClient({ registry: 'https://registry.example.test', fetch: mockFetch })

      const error = await failureOf(client.fetchAllVersions('a'))

      expect(error.message).toBe("Couldn't JSON parse metadata from https://registry.example.test/a")
    })

    it('should reject a body that is not an object', async () => {
      const client = new RegistryClient({
        registry: 'https://registry.example.test',
        fetch: mockFetchOf([['1.0.0']]),
      })

      const error = await failureOf(client.fetchAllVersions('a'))

      expect(error.message).toBe('Metadata from https://registry.example.test/a was not a JSON object')
    })

    it('should reject a document without versions', async () => {
      const client = new RegistryClient({
        registry: 'https://registry.example.test',
        fetch: mockFetchOf([{ name: 'a', versions: 'none' }]),
      })

      const error = await failureOf(client.fetchAllVersions('a'))

      expect(error.message).toBe('Versions was not a JSON object in https://registry.example.test/a')
    })

    it('should wrap network failures', async () => {
      const mockFetch = vi.fn(async (): Promise<Response> => {
        throw new Error('connection refused')
      })
      const client = new RegistryClient({
        registry: 'https://registry.example.test',
        fetch: mockFetch,
        retries: 1,
      })

      const error = await failureOf(client.fetchAllVersions('a'))

      expect(error.message).toBe("Couldn't GET URL: https://registry.example.test/a: connection refused")
    })

    it('should report timeouts', async () => {
      const mockFetch = vi.fn(async (): Promise<Response> => {
        throw Object.assign(new Error('This operation was aborted'), { name: 'AbortError' })
      })
      const client = new RegistryClient({
        registry: 'https://registry.example.test',
        fetch: mockFetch,
        retries: 1,
        timeout: 50,
      })

      const error = await failureOf(client.fetchAllVersions('a'))

      expect(error.message).toBe('Request timed out after 50ms: https://registry.example.test/a')
    })

    it('should reject invalid package names without fetching', async () => {
      const mockFetch = mockFetchOf()
      const client = new RegistryClient({ fetch: mockFetch })

      const error = await failureOf(client.fetchAllVersions('../etc/passwd'))

      expect(error.message).toBe('Invalid package name: "../etc/passwd"')
      expect(mockFetch).not.toHaveBeenCalled()
    })
  })

  describe('retries', () => {
    it('should retry server errors', async () => {
      const mockFetch = mockFetchOf([{}, 503], [createMockPackageDocument('a', { '1.0.0': {} })])
      const client = new RegistryClient({ fetch: mockFetch, retries: 3, retryDelay: 0 })

      const versions = await client.fetchAllVersions('a')

      expect([...versions.keys()]).toEqual(['1.0.0'])
      expect(mockFetch).toHaveBeenCalledTimes(2)
    })

    it('should retry network failures', async () => {
      const mockFetch = vi
        .fn(async () => createMockResponse(createMockPackageDocument('a', { '1.0.0': {} })))
        .mockRejectedValueOnce(new Error('socket hang up'))
      const client = new RegistryClient({ fetch: mockFetch, retries: 2, retryDelay: 0 })

      await client.fetchAllVersions('a')

      expect(mockFetch).toHaveBeenCalledTimes(2)
    })

    it('should give up after the configured attempts', async () => {
      const mockFetch = mockFetchOf([{}, 503], [{}, 503])
      const client = new RegistryClient({ fetch: mockFetch, retries: 2, retryDelay: 0 })

      const error = await failureOf(client.fetchAllVersions('a'))

      expect(error.status).toBe(503)
      expect(mockFetch).toHaveBeenCalledTimes(2)
    })

    it('should not retry client errors', async () => {
      const mockFetch = mockFetchOf([{}, 404])
      const client = new RegistryClient({ fetch: mockFetch, retries: 3, retryDelay: 0 })

      await failureOf(client.fetchAllVersions('a'))

      expect(mockFetch).toHaveBeenCalledTimes(1)
    })
  })
})

describe('isValidPackageName', () => {
  it.each(['left-pad', '@scope/pkg', 'a.b_c'])('should accept %s', (name) => {
    expect(isValidPackageName(name)).toBe(true)
  })

  it.each(['', '../x', 'a%2f', '@scope', '@/pkg', '@scope/', '@a/b/c'])('should reject %j', (name) => {
    expect(isValidPackageName(name)).toBe(false)
  })
})
