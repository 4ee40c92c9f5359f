/**
 * Dependency Graph Resolver
 *
 * Discovers the transitive closure of a root package's dependencies and
 * linearizes it into an install order where every dependency precedes the
 * packages that declared it.
 *
 * - One graph node per distinct (name, versionConstraint) pair
 * - A pair seen again only gains an edge; its subtree is fetched once
 * - Declared dependencies are visited last-declared first, depth-first
 * - Any cycle fails the whole resolution with CyclicDependencyError
 *
 * Expansion runs on an explicit stack rather than recursion, and every
 * registry call is awaited before the next step, so resolution is strictly
 * sequential.
 */

import { CyclicDependencyError } from '../errors/index.js'
import { toDependencies } from '../package/dependencies.js'
import type { RegistryMetadataProvider } from '../registry/types.js'
import { matchDependency } from '../semver/matcher.js'
import type { MatchOptions } from '../semver/types.js'
import {
  ROOT_ID,
  dependencyKey,
  type Dependency,
  type DependencyId,
} from './dependency.js'
import { DependencyGraph } from './graph.js'
import { IdentityMap } from './identity.js'

// =============================================================================
// Types
// =============================================================================

export interface ResolverOptions {
  /** Source of package and version metadata */
  registry: RegistryMetadataProvider
  /** Passed to the version range matcher */
  match?: MatchOptions
  /**
   * Keep the root package (last, after everything it depends on) in the
   * returned order.
   * @default true
   */
  includeRoot?: boolean
  /** Log each visited dependency and chosen version */
  verbose?: boolean
  /**
   * Receives verbose log lines.
   * @default console.log
   */
  log?: (line: string) => void
  /** Called with each newly discovered dependency and its chosen version */
  onResolved?: (dependency: Dependency, version: string) => void
}

export interface ResolutionStats {
  /** Graph nodes, root included */
  nodes: number
  edges: number
  /** Registry provider calls made */
  registryFetches: number
  /** Time taken for resolution (ms) */
  resolutionTime: number
}

export interface ResolutionResult {
  order: Dependency[]
  stats: ResolutionStats
}

/**
 * Per-call state. Created fresh by every resolve and discarded after
 * linearization.
 */
interface ResolveContext {
  identities: IdentityMap
  graph: DependencyGraph
  fetchCount: number
}

/**
 * A node whose declared dependencies are still being visited.
 * `remaining` is consumed from the end.
 */
interface PendingExpansion {
  node: DependencyId
  remaining: Dependency[]
}

// =============================================================================
// Resolver
// =============================================================================

export class DependencyResolver {
  private readonly registry: RegistryMetadataProvider
  private readonly matchOptions: MatchOptions
  private readonly includeRoot: boolean
  private readonly verbose: boolean
  private readonly logLine: (line: string) => void
  private readonly onResolved: ((dependency: Dependency, version: string) => void) | undefined

  constructor(options: ResolverOptions) {
    this.registry = options.registry
    this.matchOptions = options.match ?? {}
    this.includeRoot = options.includeRoot ?? true
    this.verbose = options.verbose ?? false
    this.logLine = options.log ?? ((line) => console.log(line))
    this.onResolved = options.onResolved
  }

  /**
   * Resolve the install order for `root` and its declared dependencies.
   *
   * @throws CyclicDependencyError, ConstraintParseError, VersionParseError,
   *   NoMatchingVersionError, RegistryFetchError or ManifestShapeError;
   *   no partial order is ever returned
   */
  async resolve(root: Dependency, rootDeclaredDeps: readonly Dependency[]): Promise<Dependency[]> {
    const { order } = await this.resolveWithStats(root, rootDeclaredDeps)
    return order
  }

  async resolveWithStats(
    root: Dependency,
    rootDeclaredDeps: readonly Dependency[]
  ): Promise<ResolutionResult> {
    const startTime = Date.now()

    const ctx: ResolveContext = {
      identities: new IdentityMap(),
      graph: new DependencyGraph(),
      fetchCount: 0,
    }

    ctx.identities.assign(root)
    ctx.graph.addNode(ROOT_ID)

    await this.expand(ctx, rootDeclaredDeps)

    const order = this.linearize(ctx)

    return {
      order: this.includeRoot ? order : order.filter((dep) => dependencyKey(dep) !== dependencyKey(root)),
      stats: {
        nodes: ctx.graph.nodeCount,
        edges: ctx.graph.size,
        registryFetches: ctx.fetchCount,
        resolutionTime: Date.now() - startTime,
      },
    }
  }

  /**
   * Depth-first discovery. A new dependency gets the next id, an edge to
   * its declarer, and its own frame which runs to completion before the
   * declarer's next dependency is visited.
   */
  private async expand(ctx: ResolveContext, rootDeclaredDeps: readonly Dependency[]): Promise<void> {
    const stack: PendingExpansion[] = [{ node: ROOT_ID, remaining: [...rootDeclaredDeps] }]

    while (stack.length > 0) {
      const frame = stack[stack.length - 1]
      if (!frame) break

      const dependency = frame.remaining.pop()
      if (!dependency) {
        stack.pop()
        continue
      }

      this.log(`${dependency.name} ${dependency.versionConstraint}`)

      const existing = ctx.identities.idOf(dependency)
      if (existing !== undefined) {
        ctx.graph.addEdge(existing, frame.node)
        continue
      }

      const node = ctx.identities.assign(dependency)
      ctx.graph.addNode(node)
      ctx.graph.addEdge(node, frame.node)

      const declared = await this.fetchDeclaredDependencies(ctx, dependency)
      stack.push({ node, remaining: declared })
    }
  }

  /**
   * Pick a version for `dependency` and return that version's own
   * declared dependencies.
   */
  private async fetchDeclaredDependencies(ctx: ResolveContext, dependency: Dependency): Promise<Dependency[]> {
    const versions = await this.registry.fetchAllVersions(dependency.name)
    ctx.fetchCount++

    const version = matchDependency(dependency, [...versions.keys()], this.matchOptions)
    this.log(`Found version: ${dependency.name}@${version}`)
    this.onResolved?.(dependency, version)

    const declared = await this.registry.fetchVersionDeclaredDependencies(dependency.name, version)
    ctx.fetchCount++

    return toDependencies(declared, `${dependency.name}@${version}`)
  }

  /**
   * Topologically sort the finished graph and map nodes back to their
   * dependencies, each appended once.
   */
  private linearize(ctx: ResolveContext): Dependency[] {
    const sorted = ctx.graph.topologicalSort()
    if (!sorted.ok) {
      throw new CyclicDependencyError(this.dependencyAt(ctx, sorted.cycleNode))
    }

    const seen = new Set<string>()
    const ordered: Dependency[] = []
    for (const node of sorted.order) {
      const dependency = this.dependencyAt(ctx, node)
      const key = dependencyKey(dependency)
      if (!seen.has(key)) {
        seen.add(key)
        ordered.push(dependency)
      }
    }

    return ordered
  }

  private dependencyAt(ctx: ResolveContext, node: DependencyId): Dependency {
    const dependency = ctx.identities.dependencyOf(node)
    if (!dependency) {
      throw new Error(`Graph node ${node} has no registered dependency`)
    }
    return dependency
  }

  private log(message: string): void {
    if (this.verbose) {
      this.logLine(`[resolve] ${message}`)
    }
  }
}

/**
 * Resolve an install order with a one-off resolver.
 *
 * @example
 * ```typescript
 * const registry = new RegistryClient()
 * const { root, dependencies } = await readManifest('.')
 * const order = await resolveDependencies(root, dependencies, { registry })
 * console.log(order.map(formatDependency))
 * ```
 */
export function resolveDependencies(
  root: Dependency,
  rootDeclaredDeps: readonly Dependency[],
  options: ResolverOptions
): Promise<Dependency[]> {
  return new DependencyResolver(options).resolve(root, rootDeclaredDeps)
}
