/**
 * Runtime configuration
 *
 * Defaults, overridable from the environment, overridable again by
 * explicit options (CLI flags or SDK callers).
 */

import { DEFAULT_REGISTRY } from './registry/client.js'

export interface PkgResolveConfig {
  /** Registry base URL */
  registry: string
  /** Registry request timeout in milliseconds */
  timeout: number
  /** Attempts per registry request */
  retries: number
  verbose: boolean
  /** Keep the root package at the end of the install order */
  includeRoot: boolean
}

export const DEFAULT_CONFIG: Readonly<PkgResolveConfig> = Object.freeze({
  registry: DEFAULT_REGISTRY,
  timeout: 30000,
  retries: 3,
  verbose: false,
  includeRoot: false,
})

export type ConfigEnv = Record<string, string | undefined>

/**
 * Build the effective configuration.
 *
 * Environment variables:
 * - `PKGRESOLVE_REGISTRY`, falling back to `npm_config_registry`
 * - `PKGRESOLVE_TIMEOUT` (ms), `PKGRESOLVE_RETRIES`
 * - `PKGRESOLVE_VERBOSE` (`1` or `true`)
 *
 * Unparseable numbers fall back to the defaults.
 */
export function loadConfig(
  env: ConfigEnv = process.env,
  overrides: Partial<PkgResolveConfig> = {}
): PkgResolveConfig {
  return {
    registry: overrides.registry
      ?? nonEmpty(env['PKGRESOLVE_REGISTRY'])
      ?? nonEmpty(env['npm_config_registry'])
      ?? DEFAULT_CONFIG.registry,
    timeout: overrides.timeout ?? positiveInt(env['PKGRESOLVE_TIMEOUT']) ?? DEFAULT_CONFIG.timeout,
    retries: overrides.retries ?? positiveInt(env['PKGRESOLVE_RETRIES']) ?? DEFAULT_CONFIG.retries,
    verbose: overrides.verbose ?? flag(env['PKGRESOLVE_VERBOSE']) ?? DEFAULT_CONFIG.verbose,
    includeRoot: overrides.includeRoot ?? DEFAULT_CONFIG.includeRoot,
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined
  }
  const parsed = parseInt(value, 10)
  return parsed > 0 ? parsed : undefined
}

function flag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined
  const normalized = value.trim().toLowerCase()
  if (normalized === '1' || normalized === 'true') return true
  if (normalized === '0' || normalized === 'false' || normalized === '') return false
  return undefined
}
