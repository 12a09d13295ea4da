/**
 * Semver Types
 *
 * Type definitions for versions and version ranges.
 */

import type { SemanticVersion } from './parse'

/**
 * Which version grammar to parse with.
 *
 * - `strict`: exactly `major.minor.patch`, no interior whitespace
 * - `loose`: one to four numeric components, whitespace allowed around dots
 */
export type ParseMode = 'strict' | 'loose'

/**
 * Comparison result: -1 (less), 0 (equal), 1 (greater)
 */
export type CompareResult = -1 | 0 | 1

/**
 * The normalized numeric part of a version
 */
export interface VersionComponents {
  major: number
  minor: number
  patch: number
  revision: number
}

/**
 * Plain-data view of a SemanticVersion
 */
export interface SemanticVersionObject extends Readonly<VersionComponents> {
  /** Pre-release label without the leading hyphen, or null */
  readonly preRelease: string | null
}

/**
 * Anything accepted where a version is expected. Strings are parsed loosely.
 */
export type VersionInput = SemanticVersion | string

/**
 * Bounds of a version range
 */
export interface VersionRangeBounds {
  /** Lower bound, null for unbounded below */
  minVersion?: SemanticVersion | null
  /** True if minVersion itself is in the range */
  isMinInclusive?: boolean
  /** Upper bound, null for unbounded above */
  maxVersion?: SemanticVersion | null
  /** True if maxVersion itself is in the range */
  isMaxInclusive?: boolean
}

/**
 * Library-wide settings
 */
export interface SemverConfig {
  /** Max entries per parse cache (versions and ranges are cached separately) */
  cacheSize: number
  /** Log parse failures and cache clears to the console */
  verbose: boolean
}
