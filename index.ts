/**
 * pkgresolve - dependency graph resolution for npm-style registries
 *
 * Resolves the transitive dependencies of a package manifest against a
 * registry and returns a deterministic install order in which every
 * dependency precedes the packages that declared it.
 *
 * @example
 * ```typescript
 * import { RegistryClient, readManifest, resolveDependencies, formatDependency } from 'pkgresolve'
 *
 * const registry = new RegistryClient()
 * const { root, dependencies } = await readManifest('.')
 * const order = await resolveDependencies(root, dependencies, { registry, includeRoot: false })
 *
 * for (const dep of order) console.log(formatDependency(dep))
 * ```
 *
 * @example CLI
 * ```bash
 * npx pkgresolve resolve
 * npx pkgresolve plan ./packages/app --json
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Core library
// =============================================================================

export * from './core/index.js'

// =============================================================================
// CLI exports
// =============================================================================

export { createCLI, runCLI, formatOrder, formatPlan } from './cli/index.js'

export type { CommandResult, CLIContext } from './cli/types.js'
