/**
 * CLI Types for pkgresolve
 */

import type { ConfigEnv, PkgResolveConfig } from '../core/config.js'
import type { Manifest } from '../core/package/manifest.js'
import type { RegistryMetadataProvider } from '../core/registry/types.js'

/**
 * Result of executing a CLI command
 */
export interface CommandResult {
  exitCode: number
  output?: string
  error?: string
}

/**
 * Options shared by resolve and plan, after cac parsing
 */
export interface CommandOptions {
  registry?: string
  timeout?: number
  retries?: number
  includeRoot: boolean
  prerelease: boolean
  verbose: boolean
  json: boolean
}

/**
 * CLI context for dependency injection
 */
export interface CLIContext {
  stdout: (text: string) => void
  stderr: (text: string) => void
  cwd: string
  env: ConfigEnv
  /** Registry provider for the effective configuration; defaults to RegistryClient */
  createRegistry?: (config: PkgResolveConfig) => RegistryMetadataProvider
  /** Manifest loader; defaults to reading package.json from disk */
  loadManifest?: (path: string) => Promise<Manifest>
}
