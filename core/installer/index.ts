/**
 * Installer
 *
 * Walks a resolved install order and hands each package to an
 * InstallSink. Each entry's version is resolved again here, with the
 * same matcher, against fresh registry data; the version the resolver
 * picked is not threaded through. For a registry whose data did not
 * change in between, both picks are the same.
 *
 * Fetching, unpacking and writing packages is the sink's job.
 */

import type { RegistryMetadataProvider } from '../registry/types.js'
import { dependencyKey, type Dependency } from '../resolver/dependency.js'
import { matchDependency } from '../semver/matcher.js'
import type { MatchOptions } from '../semver/types.js'

// =============================================================================
// Types
// =============================================================================

/**
 * One package to install, with its freshly resolved version.
 */
export interface InstallStep {
  dependency: Dependency
  version: string
  /** Tarball URL from the registry's dist metadata, when published */
  tarball?: string
}

/**
 * Destination for planned packages (download + unpack, a dry-run
 * printer, a test recorder...).
 */
export interface InstallSink {
  install(step: InstallStep): Promise<void>
}

export interface InstallOptions {
  match?: MatchOptions
  /**
   * The root package of the resolution. Entries equal to it are skipped,
   * since the root is the package being installed into.
   */
  root?: Dependency
  verbose?: boolean
  /**
   * Receives verbose log lines.
   * @default console.log
   */
  log?: (line: string) => void
}

export interface InstallResult {
  installed: Array<{ name: string; version: string }>
  stats: {
    /** Number of registry lookups made while re-resolving */
    resolved: number
    /** Total duration in milliseconds */
    duration: number
  }
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Resolve the concrete version of one install-order entry.
 */
export async function planStep(
  dependency: Dependency,
  registry: RegistryMetadataProvider,
  match: MatchOptions = {}
): Promise<InstallStep> {
  const versions = await registry.fetchAllVersions(dependency.name)
  const version = matchDependency(dependency, [...versions.keys()], match)
  const tarball = versions.get(version)?.dist?.tarball

  return tarball ? { dependency, version, tarball } : { dependency, version }
}

/**
 * Re-resolve every entry of an install order, in order.
 */
export async function planInstall(
  order: readonly Dependency[],
  registry: RegistryMetadataProvider,
  options: InstallOptions = {}
): Promise<InstallStep[]> {
  const steps: InstallStep[] = []
  for (const dependency of installable(order, options.root)) {
    steps.push(await planStep(dependency, registry, options.match))
  }
  return steps
}

// =============================================================================
// Installation
// =============================================================================

/**
 * Install an order sequentially: resolve an entry, hand it to the sink,
 * then move on. The first failure aborts the run.
 *
 * @example
 * ```typescript
 * const order = await resolveDependencies(root, dependencies, { registry })
 * await install(order, registry, { install: async (step) => unpack(step) }, { root })
 * ```
 */
export async function install(
  order: readonly Dependency[],
  registry: RegistryMetadataProvider,
  sink: InstallSink,
  options: InstallOptions = {}
): Promise<InstallResult> {
  const start = Date.now()
  const installed: Array<{ name: string; version: string }> = []
  const log = options.log ?? ((line: string) => console.log(line))
  let resolved = 0

  for (const dependency of installable(order, options.root)) {
    try {
      const step = await planStep(dependency, registry, options.match)
      resolved++

      if (options.verbose) {
        log(`[install] ${dependency.name}@${step.version}`)
      }

      await sink.install(step)
      installed.push({ name: dependency.name, version: step.version })
    } catch (error) {
      console.error(`Failed to install ${dependency.name}:`, error)
      throw error
    }
  }

  return {
    installed,
    stats: {
      resolved,
      duration: Date.now() - start,
    },
  }
}

function installable(order: readonly Dependency[], root: Dependency | undefined): Dependency[] {
  if (!root) {
    return [...order]
  }
  const rootKey = dependencyKey(root)
  return order.filter((dependency) => dependencyKey(dependency) !== rootKey)
}
