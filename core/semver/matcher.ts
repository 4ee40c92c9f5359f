/**
 * Version Range Matcher
 *
 * Picks a concrete published version for a semver range. Candidates are
 * tried last-declared first, exactly as the registry listed them; the
 * list is never re-sorted, so for a registry that lists versions
 * ascending the result is the highest satisfying version.
 */

import semver, { type Range, type SemVer } from 'semver'
import type { Dependency } from '../resolver/dependency.js'
import {
  ConstraintParseError,
  NoMatchingVersionError,
  VersionParseError,
} from '../errors/index.js'
import type { MatchOptions } from './types.js'

/**
 * Parse a range expression.
 *
 * @throws ConstraintParseError if the range is not valid
 */
export function parseConstraint(
  constraint: string,
  packageName?: string,
  options: MatchOptions = {}
): Range {
  try {
    return new semver.Range(constraint, options)
  } catch {
    throw new ConstraintParseError(constraint, packageName)
  }
}

/**
 * Parse a registry-reported version.
 *
 * @throws VersionParseError if the version is not valid
 */
export function parseVersion(
  version: string,
  packageName?: string,
  options: MatchOptions = {}
): SemVer {
  try {
    return new semver.SemVer(version, options)
  } catch {
    throw new VersionParseError(version, packageName)
  }
}

/**
 * Return the first version, iterating `availableVersions` from last to
 * first, that satisfies `constraint`.
 *
 * Versions are parsed lazily in that order, so an invalid version is only
 * reported if it is reached before a match.
 *
 * @example
 * ```typescript
 * matchVersion('^1.2.0', ['1.1.0', '1.2.5', '2.0.0']) // '1.2.5'
 * ```
 */
export function matchVersion(
  constraint: string,
  availableVersions: readonly string[],
  options: MatchOptions & { packageName?: string } = {}
): string {
  const { packageName, ...semverOptions } = options
  const range = parseConstraint(constraint, packageName, semverOptions)

  for (let i = availableVersions.length - 1; i >= 0; i--) {
    const candidate = availableVersions[i]
    if (candidate === undefined) continue

    const parsed = parseVersion(candidate, packageName, semverOptions)
    if (range.test(parsed)) {
      return candidate
    }
  }

  throw new NoMatchingVersionError(constraint, packageName)
}

/**
 * Match a dependency's constraint, naming the dependency in any error.
 */
export function matchDependency(
  dependency: Dependency,
  availableVersions: readonly string[],
  options: MatchOptions = {}
): string {
  return matchVersion(dependency.versionConstraint, availableVersions, {
    ...options,
    packageName: dependency.name,
  })
}
