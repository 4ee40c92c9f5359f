/**
 * Dependency Graph Resolver
 *
 * Closure discovery, node identity and memoization, cycle detection and
 * topological linearization.
 */

export {
  ROOT_ID,
  createDependency,
  dependencyKey,
  dependencyEquals,
  formatDependency,
  type Dependency,
  type DependencyId,
} from './dependency.js'

export { IdentityMap } from './identity.js'

export { DependencyGraph, type TopologicalSortResult } from './graph.js'

export {
  DependencyResolver,
  resolveDependencies,
  type ResolverOptions,
  type ResolutionResult,
  type ResolutionStats,
} from './resolver.js'
