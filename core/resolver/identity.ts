/**
 * Bidirectional Dependency <-> DependencyId association.
 *
 * Both directions live in one owner and are only ever updated together.
 */

import { dependencyKey, type Dependency, type DependencyId } from './dependency.js'

export class IdentityMap {
  private readonly byKey: Map<string, DependencyId> = new Map()
  private readonly byId: Map<DependencyId, Dependency> = new Map()

  get size(): number {
    return this.byId.size
  }

  /**
   * Register a dependency and return its newly assigned id.
   * Ids are dense: the first call yields 0.
   *
   * @throws Error if the dependency is already registered
   */
  assign(dependency: Dependency): DependencyId {
    const key = dependencyKey(dependency)
    if (this.byKey.has(key)) {
      throw new Error(`Dependency ${dependency.name}@${dependency.versionConstraint} already has an id`)
    }

    const id = this.byId.size
    this.byKey.set(key, id)
    this.byId.set(id, dependency)
    return id
  }

  idOf(dependency: Dependency): DependencyId | undefined {
    return this.byKey.get(dependencyKey(dependency))
  }

  dependencyOf(id: DependencyId): Dependency | undefined {
    return this.byId.get(id)
  }

  has(dependency: Dependency): boolean {
    return this.byKey.has(dependencyKey(dependency))
  }
}
