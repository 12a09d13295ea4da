/**
 * Semver Range Resolution
 *
 * Parse and evaluate version ranges written in bracket interval notation:
 *
 * | Range          | Meaning            |
 * | -------------- | ------------------ |
 * | `1.0`          | 1.0 ≤ x            |
 * | `(1.0,)`       | 1.0 < x            |
 * | `[1.0]`        | x == 1.0           |
 * | `(,1.0]`       | x ≤ 1.0            |
 * | `(,1.0)`       | x < 1.0            |
 * | `[1.0,2.0]`    | 1.0 ≤ x ≤ 2.0      |
 * | `(1.0,2.0)`    | 1.0 < x < 2.0      |
 * | `[1.0,2.0)`    | 1.0 ≤ x < 2.0      |
 *
 * Bounds are parsed with the loose version grammar.
 */

import { FormatError, NullOrEmptyInputError } from '../errors'
import { rangeCache } from './cache'
import { gt, gte, lt, lte } from './compare'
import { log } from './config'
import { SemanticVersion, tryParseLoose } from './parse'
import type { VersionInput, VersionRangeBounds } from './types'

const LESS_THAN_OR_EQUAL_TO = '≤'
const GREATER_THAN_OR_EQUAL_TO = '≥'

/**
 * An interval of versions. Each bound is optional and independently
 * inclusive or exclusive.
 */
export class VersionRange {
  readonly minVersion: SemanticVersion | null
  readonly isMinInclusive: boolean
  readonly maxVersion: SemanticVersion | null
  readonly isMaxInclusive: boolean

  constructor(bounds: VersionRangeBounds = {}) {
    this.minVersion = bounds.minVersion ?? null
    this.isMinInclusive = bounds.isMinInclusive ?? false
    this.maxVersion = bounds.maxVersion ?? null
    this.isMaxInclusive = bounds.isMaxInclusive ?? false
  }

  /**
   * A range containing exactly one version: `[v]`
   */
  static exact(version: SemanticVersion): VersionRange {
    return new VersionRange({
      minVersion: version,
      isMinInclusive: true,
      maxVersion: version,
      isMaxInclusive: true,
    })
  }

  /**
   * The range a bare version string stands for: `v` or higher
   */
  static atLeast(version: SemanticVersion): VersionRange {
    return new VersionRange({ minVersion: version, isMinInclusive: true })
  }

  private get isAtLeast(): boolean {
    return this.minVersion !== null && this.isMinInclusive &&
      this.maxVersion === null && !this.isMaxInclusive
  }

  private get isExact(): boolean {
    return this.minVersion !== null && this.maxVersion !== null &&
      this.minVersion.equals(this.maxVersion) &&
      this.isMinInclusive && this.isMaxInclusive
  }

  satisfies(version: VersionInput): boolean {
    return this.toPredicate((v: VersionInput) => v)(version)
  }

  /**
   * Build a membership test over arbitrary items.
   *
   * @example
   * ```typescript
   * const inRange = parseRange('[1.0,2.0)').toPredicate((pkg: Pkg) => pkg.version)
   * packages.filter(inRange)
   * ```
   */
  toPredicate<T>(extractor: (item: T) => VersionInput): (item: T) => boolean {
    return (item) => {
      const version = extractor(item)
      let condition = true

      if (this.minVersion) {
        condition = condition && (this.isMinInclusive
          ? gte(version, this.minVersion)
          : gt(version, this.minVersion))
      }

      if (this.maxVersion) {
        condition = condition && (this.isMaxInclusive
          ? lte(version, this.maxVersion)
          : lt(version, this.maxVersion))
      }

      return condition
    }
  }

  /**
   * Bracket notation, the inverse of parseRange
   */
  toBracketString(): string {
    if (this.isAtLeast) {
      return String(this.minVersion)
    }

    if (this.isExact) {
      return `[${this.minVersion}]`
    }

    const open = this.isMinInclusive ? '[' : '('
    const close = this.isMaxInclusive ? ']' : ')'
    return `${open}${this.minVersion ?? ''}, ${this.maxVersion ?? ''}${close}`
  }

  /**
   * Human readable notation, e.g. `(≥ 1.0 && < 2.0)`
   */
  toMathString(): string {
    if (this.isAtLeast) {
      return `(${GREATER_THAN_OR_EQUAL_TO} ${this.minVersion})`
    }

    if (this.isExact) {
      return `(= ${this.minVersion})`
    }

    let text = ''
    if (this.minVersion) {
      text += this.isMinInclusive ? `(${GREATER_THAN_OR_EQUAL_TO} ` : '(> '
      text += this.minVersion.toString()
    }

    if (this.maxVersion) {
      text += text.length === 0 ? '(' : ' && '
      text += this.isMaxInclusive ? `${LESS_THAN_OR_EQUAL_TO} ` : '< '
      text += this.maxVersion.toString()
    }

    return text.length > 0 ? `${text})` : text
  }

  toString(): string {
    return this.toBracketString()
  }
}

// =============================================================================
// Parsing
// =============================================================================

function isBlank(text: string): boolean {
  return text.trim().length === 0
}

function parseRangeUncached(text: string): VersionRange | null {
  const trimmed = text.trim()
  const open = trimmed.charAt(0)
  const close = trimmed.charAt(trimmed.length - 1)

  // A plain version is an inclusive minimum. Versions never start with a bracket.
  if (open !== '[' && open !== '(') {
    const version = tryParseLoose(trimmed)
    return version ? VersionRange.atLeast(version) : null
  }

  if (trimmed.length < 3 || (close !== ']' && close !== ')')) {
    return null
  }

  const parts = trimmed.slice(1, -1).split(',')
  if (parts.length > 2 || parts.every(isBlank)) {
    return null
  }

  // A single part is both bounds: [1.0] or (1.0)
  const [minText = '', maxText = minText] = parts

  let minVersion: SemanticVersion | null = null
  if (!isBlank(minText)) {
    minVersion = tryParseLoose(minText)
    if (!minVersion) return null
  }

  let maxVersion: SemanticVersion | null = null
  if (!isBlank(maxText)) {
    maxVersion = tryParseLoose(maxText)
    if (!maxVersion) return null
  }

  return new VersionRange({
    minVersion,
    isMinInclusive: open === '[',
    maxVersion,
    isMaxInclusive: close === ']',
  })
}

/**
 * Parse a range string, or return null if it is not valid. Never throws.
 */
export function tryParseRange(text: string | null | undefined): VersionRange | null {
  if (typeof text !== 'string') {
    return null
  }

  const cached = rangeCache.get(text)
  if (cached !== undefined) {
    return cached
  }

  const result = parseRangeUncached(text)
  if (!result) {
    log(`Invalid range: '${text}'`)
  }
  rangeCache.set(text, result)
  return result
}

/**
 * Parse a range string.
 *
 * @throws {NullOrEmptyInputError} if text is null, undefined or empty
 * @throws {FormatError} if text is not a valid range
 */
export function parseRange(text: string | null | undefined): VersionRange {
  if (typeof text !== 'string' || text.length === 0) {
    throw new NullOrEmptyInputError('range')
  }

  const range = tryParseRange(text)
  if (!range) {
    throw new FormatError(text, 'range')
  }
  return range
}

/**
 * Check if a version lies within a range
 */
export function satisfies(range: VersionRange | string, version: VersionInput): boolean {
  const parsed = range instanceof VersionRange ? range : parseRange(range)
  return parsed.satisfies(version)
}

export function toBracketString(range: VersionRange): string {
  return range.toBracketString()
}

export function toMathString(range: VersionRange): string {
  return range.toMathString()
}

/**
 * Return the bracket rendering of a valid range, or null
 */
export function validRange(text: string | null | undefined): string | null {
  return tryParseRange(text)?.toBracketString() ?? null
}

function satisfyingVersions(
  versions: readonly string[],
  range: VersionRange | string
): Array<{ text: string; version: SemanticVersion }> {
  const parsed = range instanceof VersionRange ? range : tryParseRange(range)
  if (!parsed) return []

  const matches: Array<{ text: string; version: SemanticVersion }> = []
  for (const text of versions) {
    const version = tryParseLoose(text)
    if (version && parsed.satisfies(version)) {
      matches.push({ text, version })
    }
  }
  return matches
}

/**
 * Return the highest version that satisfies the range.
 * Strings that are not versions are skipped.
 */
export function maxSatisfying(
  versions: readonly string[],
  range: VersionRange | string
): string | null {
  let best: { text: string; version: SemanticVersion } | null = null
  for (const match of satisfyingVersions(versions, range)) {
    if (!best || gt(match.version, best.version)) {
      best = match
    }
  }
  return best?.text ?? null
}

/**
 * Return the lowest version that satisfies the range.
 * Strings that are not versions are skipped.
 */
export function minSatisfying(
  versions: readonly string[],
  range: VersionRange | string
): string | null {
  let best: { text: string; version: SemanticVersion } | null = null
  for (const match of satisfyingVersions(versions, range)) {
    if (!best || lt(match.version, best.version)) {
      best = match
    }
  }
  return best?.text ?? null
}
