/**
 * Semver Parsing
 *
 * Parse and validate version strings in strict (`major.minor.patch`) or
 * loose (NuGet-style, one to four components) form.
 */

import {
  FormatError,
  InvalidArgumentError,
  NullOrEmptyInputError,
  TypeMismatchError,
} from '../errors'
import { versionCache } from './cache'
import { log } from './config'
import type {
  CompareResult,
  ParseMode,
  SemanticVersionObject,
  VersionComponents,
} from './types'

/** Largest component value, matching a signed 32-bit integer */
export const MAX_COMPONENT = 2147483647

// =============================================================================
// Grammar
// =============================================================================

interface GrammarShape {
  /** Quantifier for the components after the first */
  extraComponents: string
  /** Pattern between two components */
  separator: string
}

const GRAMMAR_SHAPES: Record<ParseMode, GrammarShape> = {
  strict: { extraComponents: '{2}', separator: '\\.' },
  loose: { extraComponents: '{0,3}', separator: '\\s*\\.\\s*' },
}

// Pre-release label: a letter, then letters, digits or hyphens
const RELEASE_PATTERN = '(?<release>-[a-z][0-9a-z-]*)?'

function compileGrammar(shape: GrammarShape): RegExp {
  return new RegExp(
    `^(?<version>\\d+(?:${shape.separator}\\d+)${shape.extraComponents})${RELEASE_PATTERN}$`,
    'i'
  )
}

const GRAMMARS: Record<ParseMode, RegExp> = {
  strict: compileGrammar(GRAMMAR_SHAPES.strict),
  loose: compileGrammar(GRAMMAR_SHAPES.loose),
}

/**
 * Convert the matched numeric part into components. Missing components are 0.
 * Returns null if a component does not fit in MAX_COMPONENT.
 */
function toComponents(text: string): VersionComponents | null {
  const values: number[] = []
  for (const part of text.split('.')) {
    const value = Number(part.trim())
    if (value > MAX_COMPONENT) {
      return null
    }
    values.push(value)
  }

  const [major = 0, minor = 0, patch = 0, revision = 0] = values
  return { major, minor, patch, revision }
}

function assertComponent(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_COMPONENT) {
    throw new InvalidArgumentError(
      name,
      `${name} must be an integer between 0 and ${MAX_COMPONENT}, got ${value}`
    )
  }
}

// =============================================================================
// SemanticVersion
// =============================================================================

/**
 * A parsed version: four non-negative numeric components and an optional
 * pre-release label.
 *
 * `toString()` returns the text the version was parsed from (trimmed, with
 * whitespace removed), so `parseLoose('1.0').toString()` is `'1.0'` even
 * though the version equals `1.0.0.0`.
 *
 * @example
 * ```typescript
 * new SemanticVersion(1, 2, 3, 'beta').toString()  // '1.2.3-beta'
 * new SemanticVersion(1, 2, 3, 4).toString()       // '1.2.3.4'
 * ```
 */
export class SemanticVersion implements SemanticVersionObject {
  readonly major: number
  readonly minor: number
  readonly patch: number
  readonly revision: number
  readonly preRelease: string | null
  private raw: string

  constructor(major: number, minor: number, patch: number, preRelease?: string | null)
  constructor(major: number, minor: number, build: number, revision: number, preRelease?: string | null)
  constructor(
    major: number,
    minor: number,
    patch: number,
    revisionOrPreRelease?: number | string | null,
    preRelease?: string | null
  ) {
    const hasRevision = typeof revisionOrPreRelease === 'number'
    const revision = hasRevision ? revisionOrPreRelease : 0
    const label = hasRevision ? preRelease : revisionOrPreRelease

    assertComponent('major', major)
    assertComponent('minor', minor)
    assertComponent('patch', patch)
    assertComponent('revision', revision)

    this.major = major
    this.minor = minor
    this.patch = patch
    this.revision = revision
    this.preRelease = label ? label : null

    const numeric = hasRevision
      ? `${major}.${minor}.${patch}.${revision}`
      : `${major}.${minor}.${patch}`
    this.raw = this.preRelease === null ? numeric : `${numeric}-${this.preRelease}`
  }

  /**
   * Build a version from parsed components, keeping the display text.
   */
  static fromParsed(
    components: VersionComponents,
    preRelease: string | null,
    raw: string
  ): SemanticVersion {
    const { major, minor, patch, revision } = components
    const version = new SemanticVersion(major, minor, patch, revision, preRelease)
    version.raw = raw
    return version
  }

  /**
   * Third component under its loose-mode name
   */
  get build(): number {
    return this.patch
  }

  get isPrerelease(): boolean {
    return this.preRelease !== null
  }

  /**
   * Compare with any value. Null and undefined sort first.
   *
   * @throws {TypeMismatchError} if other is not a SemanticVersion
   */
  compareTo(other: unknown): CompareResult {
    if (other === null || other === undefined) {
      return 1
    }
    if (!(other instanceof SemanticVersion)) {
      throw new TypeMismatchError()
    }
    return compareVersions(this, other)
  }

  equals(other: unknown): boolean {
    return other instanceof SemanticVersion && compareVersions(this, other) === 0
  }

  /**
   * Equal versions produce equal hashes; the label is hashed upper-cased.
   */
  hashCode(): number {
    let hash = 0
    hash |= (this.major & 0x0f) << 28
    hash |= (this.minor & 0xff) << 20
    hash |= (this.patch & 0xff) << 12
    hash |= this.revision & 0xfff

    const label = (this.preRelease ?? '').toUpperCase()
    return (Math.imul(hash, 4567) + hashString(label)) | 0
  }

  toString(): string {
    return this.raw
  }
}

function hashString(text: string): number {
  let hash = 0
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(hash, 31) + text.charCodeAt(i)) | 0
  }
  return hash
}

function compareLabels(a: string, b: string): CompareResult {
  const upperA = a.toUpperCase()
  const upperB = b.toUpperCase()
  if (upperA === upperB) return 0
  return upperA < upperB ? -1 : 1
}

/**
 * Compare two versions by precedence.
 *
 * Numeric components decide first; on a tie a release outranks a pre-release
 * and two labels compare case-insensitively. Null sorts before any version.
 */
export function compareVersions(
  a: SemanticVersionObject | null | undefined,
  b: SemanticVersionObject | null | undefined
): CompareResult {
  if (a == null) return b == null ? 0 : -1
  if (b == null) return 1

  if (a.major !== b.major) return a.major > b.major ? 1 : -1
  if (a.minor !== b.minor) return a.minor > b.minor ? 1 : -1
  if (a.patch !== b.patch) return a.patch > b.patch ? 1 : -1
  if (a.revision !== b.revision) return a.revision > b.revision ? 1 : -1

  if (a.preRelease === null && b.preRelease === null) return 0
  if (a.preRelease === null) return 1
  if (b.preRelease === null) return -1

  return compareLabels(a.preRelease, b.preRelease)
}

// =============================================================================
// Parsing
// =============================================================================

function parseUncached(text: string, mode: ParseMode): SemanticVersion | null {
  const trimmed = text.trim()
  const match = GRAMMARS[mode].exec(trimmed)
  const numeric = match?.groups?.version
  if (numeric === undefined) {
    return null
  }

  const components = toComponents(numeric)
  if (!components) {
    return null
  }

  const release = match?.groups?.release
  const preRelease = release ? release.slice(1) : null

  return SemanticVersion.fromParsed(components, preRelease, trimmed.replace(/\s+/g, ''))
}

/**
 * Parse a version string, or return null if it is not valid in the given mode.
 * Never throws.
 */
export function tryParse(
  text: string | null | undefined,
  mode: ParseMode = 'strict'
): SemanticVersion | null {
  if (typeof text !== 'string' || text.length === 0) {
    return null
  }

  const key = `${mode}:${text}`
  const cached = versionCache.get(key)
  if (cached !== undefined) {
    return cached
  }

  const result = parseUncached(text, mode)
  if (!result) {
    log(`Invalid ${mode} version: '${text}'`)
  }
  versionCache.set(key, result)
  return result
}

/**
 * Parse a version string.
 *
 * @throws {NullOrEmptyInputError} if text is null, undefined or empty
 * @throws {FormatError} if text is not a valid version in the given mode
 */
export function parse(
  text: string | null | undefined,
  mode: ParseMode = 'strict'
): SemanticVersion {
  if (typeof text !== 'string' || text.length === 0) {
    throw new NullOrEmptyInputError('version')
  }

  const version = tryParse(text, mode)
  if (!version) {
    throw new FormatError(text, 'version')
  }
  return version
}

export function tryParseStrict(text: string | null | undefined): SemanticVersion | null {
  return tryParse(text, 'strict')
}

export function parseStrict(text: string | null | undefined): SemanticVersion {
  return parse(text, 'strict')
}

export function tryParseLoose(text: string | null | undefined): SemanticVersion | null {
  return tryParse(text, 'loose')
}

export function parseLoose(text: string | null | undefined): SemanticVersion {
  return parse(text, 'loose')
}

/**
 * Return the display string if valid, or null
 */
export function valid(
  text: string | null | undefined,
  mode: ParseMode = 'strict'
): string | null {
  return tryParse(text, mode)?.toString() ?? null
}
