/**
 * Output formatting utilities for CLI
 */

import type { InstallStep } from '../../core/installer/index.js'
import { formatDependency, type Dependency } from '../../core/resolver/dependency.js'

/**
 * Format an install order, one name@constraint per line
 */
export function formatOrder(order: readonly Dependency[], options?: { json?: boolean }): string {
  if (options?.json) {
    return JSON.stringify(
      order.map((dep) => ({ name: dep.name, versionConstraint: dep.versionConstraint })),
      null,
      2
    )
  }

  if (order.length === 0) {
    return '(no dependencies)'
  }

  return order.map(formatDependency).join('\n')
}

/**
 * Format an install plan, one name@version per line
 */
export function formatPlan(steps: readonly InstallStep[], options?: { json?: boolean }): string {
  if (options?.json) {
    return JSON.stringify(
      steps.map((step) => ({
        name: step.dependency.name,
        versionConstraint: step.dependency.versionConstraint,
        version: step.version,
        ...(step.tarball ? { tarball: step.tarball } : {}),
      })),
      null,
      2
    )
  }

  if (steps.length === 0) {
    return '(nothing to install)'
  }

  return steps.map((step) => `${step.dependency.name}@${step.version}`).join('\n')
}
