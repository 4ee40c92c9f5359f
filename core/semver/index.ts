/**
 * Semver - version range matching
 *
 * npm-compatible range matching over registry version lists, built on
 * the `semver` package.
 */

export type { MatchOptions } from './types.js'

export {
  matchVersion,
  matchDependency,
  parseConstraint,
  parseVersion,
} from './matcher.js'
