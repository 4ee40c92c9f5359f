/**
 * Dependency Graph
 *
 * Directed graph over DependencyId nodes. An edge (A -> B) means
 * "A must be installed before B". Edges are unweighted and deduplicated.
 *
 * Adjacency is kept in insertion order so that traversal, and therefore
 * the topological order, is deterministic for a fixed construction order.
 */

import type { DependencyId } from './dependency.js'

/**
 * Outcome of a topological sort: a full order, or the node at which a
 * cycle was detected.
 */
export type TopologicalSortResult =
  | { ok: true; order: DependencyId[] }
  | { ok: false; cycleNode: DependencyId }

const WHITE = 0
const GRAY = 1
const BLACK = 2

type Color = typeof WHITE | typeof GRAY | typeof BLACK

interface Frame {
  node: DependencyId
  next: number
}

export class DependencyGraph {
  private readonly successors: Map<DependencyId, DependencyId[]> = new Map()
  private edgeCount = 0

  get nodeCount(): number {
    return this.successors.size
  }

  get size(): number {
    return this.edgeCount
  }

  addNode(node: DependencyId): void {
    if (!this.successors.has(node)) {
      this.successors.set(node, [])
    }
  }

  hasNode(node: DependencyId): boolean {
    return this.successors.has(node)
  }

  /**
   * Add edge (from -> to) unless already present. Missing endpoints are
   * added as nodes.
   *
   * @returns true if a new edge was recorded
   */
  addEdge(from: DependencyId, to: DependencyId): boolean {
    this.addNode(to)
    const out = this.successors.get(from) ?? []
    if (!this.successors.has(from)) {
      this.successors.set(from, out)
    }
    if (out.includes(to)) {
      return false
    }
    out.push(to)
    this.edgeCount++
    return true
  }

  hasEdge(from: DependencyId, to: DependencyId): boolean {
    return this.successors.get(from)?.includes(to) ?? false
  }

  nodes(): DependencyId[] {
    return [...this.successors.keys()].sort((a, b) => a - b)
  }

  edges(): Array<[DependencyId, DependencyId]> {
    const result: Array<[DependencyId, DependencyId]> = []
    for (const from of this.nodes()) {
      for (const to of this.successors.get(from) ?? []) {
        result.push([from, to])
      }
    }
    return result
  }

  outgoing(node: DependencyId): readonly DependencyId[] {
    return this.successors.get(node) ?? []
  }

  /**
   * Order nodes so that every edge's source precedes its target.
   *
   * Depth-first from each unvisited node in ascending id order, visiting
   * successors in edge-insertion order; the result is the reverse
   * post-order. Reaching a node that is still on the DFS path means a
   * cycle, reported at that node.
   */
  topologicalSort(): TopologicalSortResult {
    const color: Map<DependencyId, Color> = new Map()
    const postOrder: DependencyId[] = []

    for (const start of this.nodes()) {
      if ((color.get(start) ?? WHITE) !== WHITE) continue

      const stack: Frame[] = [{ node: start, next: 0 }]
      color.set(start, GRAY)

      while (stack.length > 0) {
        const frame = stack[stack.length - 1]
        if (!frame) break

        const out = this.outgoing(frame.node)
        if (frame.next < out.length) {
          const succ = out[frame.next]
          frame.next++
          if (succ === undefined) continue

          const state = color.get(succ) ?? WHITE
          if (state === GRAY) {
            return { ok: false, cycleNode: succ }
          }
          if (state === WHITE) {
            color.set(succ, GRAY)
            stack.push({ node: succ, next: 0 })
          }
          continue
        }

        color.set(frame.node, BLACK)
        postOrder.push(frame.node)
        stack.pop()
      }
    }

    return { ok: true, order: postOrder.reverse() }
  }
}
