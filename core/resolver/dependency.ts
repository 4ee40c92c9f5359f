/**
 * Dependency identity values.
 *
 * A Dependency is the (name, versionConstraint) pair as declared by a
 * manifest. Two values with the same name but different constraint text
 * are distinct identities.
 */

export interface Dependency {
  readonly name: string
  /** Raw constraint text as declared, never a resolved version */
  readonly versionConstraint: string
}

/**
 * Graph node identity, dense and assigned in discovery order.
 * The root is always 0.
 */
export type DependencyId = number

export const ROOT_ID: DependencyId = 0

export function createDependency(name: string, versionConstraint: string): Dependency {
  return Object.freeze({ name, versionConstraint })
}

/**
 * Collision-free map key for a dependency.
 */
export function dependencyKey(dependency: Dependency): string {
  return JSON.stringify([dependency.name, dependency.versionConstraint])
}

export function dependencyEquals(a: Dependency, b: Dependency): boolean {
  return a.name === b.name && a.versionConstraint === b.versionConstraint
}

/**
 * Human-readable `name@constraint` form used in logs and CLI output.
 */
export function formatDependency(dependency: Dependency): string {
  return `${dependency.name}@${dependency.versionConstraint}`
}
