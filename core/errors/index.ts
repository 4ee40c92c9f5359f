/**
 * Resolution Error Types
 *
 * Structured error types for dependency resolution with:
 * - Typed error codes for programmatic handling
 * - Context naming the package, constraint or version involved
 * - JSON serialization for transport across process boundaries
 */

import type { Dependency } from '../resolver/dependency.js'

// =============================================================================
// Error Code Types
// =============================================================================

/**
 * Error codes for resolution operations
 */
export type PkgResolveErrorCode =
  | 'ECONSTRAINT'    // Declared constraint is not a valid range
  | 'EVERSION'       // Registry-reported version is not valid semver
  | 'ENOMATCH'       // No published version satisfies a constraint
  | 'ECYCLE'         // Dependency graph contains a cycle
  | 'EFETCH'         // Registry transport or response shape failure
  | 'EMANIFEST'      // Malformed manifest or dependency mapping

// =============================================================================
// Error Context Types
// =============================================================================

/**
 * Context for resolution errors
 */
export interface PkgResolveErrorContext {
  package?: string
  constraint?: string
  version?: string
  registry?: string
  path?: string
  cause?: string
}

/**
 * JSON-serializable error representation
 */
export interface PkgResolveErrorJSON {
  name: string
  code: PkgResolveErrorCode
  message: string
  context?: PkgResolveErrorContext
  stack?: string
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for resolution failures
 */
export class PkgResolveError extends Error {
  readonly code: PkgResolveErrorCode
  readonly context?: PkgResolveErrorContext

  constructor(
    code: PkgResolveErrorCode,
    message: string,
    context?: PkgResolveErrorContext
  ) {
    super(message)
    this.name = 'PkgResolveError'
    this.code = code
    this.context = context

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for JSON transport
   */
  toJSON(): PkgResolveErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    }
  }

  /**
   * Create PkgResolveError from JSON representation
   */
  static fromJSON(json: PkgResolveErrorJSON): PkgResolveError {
    const error = new PkgResolveError(json.code, json.message, json.context)
    if (json.stack) {
      error.stack = json.stack
    }
    return error
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * A declared version constraint is not a valid range expression
 */
export class ConstraintParseError extends PkgResolveError {
  constructor(constraint: string, packageName?: string) {
    const message = packageName
      ? `Version ${constraint} of ${packageName} didn't parse`
      : `Version constraint ${constraint} didn't parse`

    super('ECONSTRAINT', message, { package: packageName, constraint })
    this.name = 'ConstraintParseError'
  }
}

/**
 * A registry-reported version string is not a valid version
 */
export class VersionParseError extends PkgResolveError {
  constructor(version: string, packageName?: string) {
    const message = packageName
      ? `Version ${version} of ${packageName} didn't parse`
      : `Version ${version} didn't parse`

    super('EVERSION', message, { package: packageName, version })
    this.name = 'VersionParseError'
  }
}

/**
 * No published version satisfies a constraint
 */
export class NoMatchingVersionError extends PkgResolveError {
  constructor(constraint: string, packageName?: string) {
    const message = packageName
      ? `No version of ${packageName} satisfies ${constraint}`
      : `No version satisfies ${constraint}`

    super('ENOMATCH', message, { package: packageName, constraint })
    this.name = 'NoMatchingVersionError'
  }
}

/**
 * The completed dependency graph contains a cycle
 */
export class CyclicDependencyError extends PkgResolveError {
  /** Dependency at the node where the cycle was detected */
  readonly dependency: Dependency

  constructor(dependency: Dependency) {
    super(
      'ECYCLE',
      `Cyclic dependency ${dependency.name}@${dependency.versionConstraint}`,
      { package: dependency.name, constraint: dependency.versionConstraint }
    )
    this.name = 'CyclicDependencyError'
    this.dependency = dependency
  }
}

/**
 * Registry transport or response shape failure
 */
export class RegistryFetchError extends PkgResolveError {
  readonly status?: number

  constructor(message: string, options?: { status?: number; registry?: string; package?: string }) {
    super('EFETCH', message, { registry: options?.registry, package: options?.package })
    this.name = 'RegistryFetchError'
    this.status = options?.status
  }
}

/**
 * Malformed manifest or dependency mapping
 */
export class ManifestShapeError extends PkgResolveError {
  constructor(message: string, context?: PkgResolveErrorContext) {
    super('EMANIFEST', message, context)
    this.name = 'ManifestShapeError'
  }
}

// =============================================================================
// Error Type Guards
// =============================================================================

/**
 * Check if an error is a PkgResolveError
 */
export function isPkgResolveError(error: unknown): error is PkgResolveError {
  return error instanceof PkgResolveError
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: PkgResolveErrorCode): boolean {
  return isPkgResolveError(error) && error.code === code
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Wrap an unknown error as a PkgResolveError
 */
export function wrapError(error: unknown, code: PkgResolveErrorCode = 'EFETCH'): PkgResolveError {
  if (isPkgResolveError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new PkgResolveError(code, error.message, { cause: error.message })
  }

  return new PkgResolveError(code, String(error))
}
