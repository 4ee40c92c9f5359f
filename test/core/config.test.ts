/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import { DEFAULT_CONFIG, loadConfig } from '../../core/config.js'

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      registry: 'https://registry.npmjs.org',
      timeout: 30000,
      retries: 3,
      verbose: false,
      includeRoot: false,
    })
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG)
  })

  it('reads the environment', () => {
    const config = loadConfig({
      PKGRESOLVE_REGISTRY: 'https://registry.example.test',
      PKGRESOLVE_TIMEOUT: '5000',
      PKGRESOLVE_RETRIES: '1',
      PKGRESOLVE_VERBOSE: 'true',
    })

    expect(config).toEqual({
      registry: 'https://registry.example.test',
      timeout: 5000,
      retries: 1,
      verbose: true,
      includeRoot: false,
    })
  })

  it('falls back to npm_config_registry', () => {
    expect(loadConfig({ npm_config_registry: 'https://mirror.example.test' }).registry).toBe(
      'https://mirror.example.test'
    )
  })

  it('prefers its own registry variable', () => {
    const config = loadConfig({
      PKGRESOLVE_REGISTRY: 'https://own.example.test',
      npm_config_registry: 'https://mirror.example.test',
    })
    expect(config.registry).toBe('https://own.example.test')
  })

  it('ignores blank and malformed values', () => {
    const config = loadConfig({
      PKGRESOLVE_REGISTRY: '  ',
      PKGRESOLVE_TIMEOUT: '10s',
      PKGRESOLVE_RETRIES: '0',
      PKGRESOLVE_VERBOSE: 'loud',
    })

    expect(config).toEqual(DEFAULT_CONFIG)
  })

  it('accepts 1 and 0 as flags', () => {
    expect(loadConfig({ PKGRESOLVE_VERBOSE: '1' }).verbose).toBe(true)
    expect(loadConfig({ PKGRESOLVE_VERBOSE: '0' }).verbose).toBe(false)
  })

  it('lets overrides win over the environment', () => {
    const config = loadConfig(
      { PKGRESOLVE_REGISTRY: 'https://env.example.test', PKGRESOLVE_TIMEOUT: '5000' },
      { registry: 'https://flag.example.test', timeout: 100, includeRoot: true }
    )

    expect(config.registry).toBe('https://flag.example.test')
    expect(config.timeout).toBe(100)
    expect(config.includeRoot).toBe(true)
  })

  it('treats undefined overrides as absent', () => {
    const config = loadConfig({ PKGRESOLVE_TIMEOUT: '5000' }, { timeout: undefined })
    expect(config.timeout).toBe(5000)
  })
})
