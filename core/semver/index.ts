/**
 * Semver - version parsing, ordering and interval matching
 *
 * Strict (`major.minor.patch`) and loose NuGet-style versions, bracket
 * interval ranges, and the comparisons between them.
 */

// Types
export type {
  ParseMode,
  CompareResult,
  VersionComponents,
  SemanticVersionObject,
  VersionInput,
  VersionRangeBounds,
  SemverConfig,
} from './types'

// Parsing
export {
  SemanticVersion,
  MAX_COMPONENT,
  compareVersions,
  tryParse,
  parse,
  tryParseStrict,
  parseStrict,
  tryParseLoose,
  parseLoose,
  valid,
} from './parse'

// Comparison
export {
  compare,
  rcompare,
  eq,
  neq,
  lt,
  lte,
  gt,
  gte,
  sort,
  rsort,
} from './compare'

// Range resolution
export {
  VersionRange,
  tryParseRange,
  parseRange,
  satisfies,
  toBracketString,
  toMathString,
  validRange,
  maxSatisfying,
  minSatisfying,
} from './range'

// Configuration and caching
export { configure, getConfig, resetConfig, clearCaches } from './config'
export { getCacheStats, type SemverCacheStats } from './cache'
