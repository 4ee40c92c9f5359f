/**
 * Semver Types
 *
 * Type definitions for version range matching.
 */

/**
 * Options for range matching, passed through to the semver parser
 */
export interface MatchOptions {
  /** Include prerelease versions when checking ranges */
  includePrerelease?: boolean
  /** Enable loose parsing (allow leading v, =, whitespace) */
  loose?: boolean
}
