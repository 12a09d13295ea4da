/**
 * Semver Comparison Functions
 *
 * Compare, sort, and test version relationships.
 *
 * String arguments are parsed with the loose grammar and throw a FormatError
 * if they are not valid. Null is ordered before every version; the relational
 * helpers reject a null left operand unless both sides are null.
 */

import { InvalidArgumentError } from '../errors'
import { compareVersions, parseLoose, SemanticVersion } from './parse'
import type { CompareResult, VersionInput } from './types'

type MaybeVersion = VersionInput | null | undefined

function toVersion(input: MaybeVersion): SemanticVersion | null {
  if (input == null) return null
  return input instanceof SemanticVersion ? input : parseLoose(input)
}

function requireLeft(input: MaybeVersion, operator: string): SemanticVersion {
  const version = toVersion(input)
  if (!version) {
    throw new InvalidArgumentError(
      'version1',
      `Left operand of ${operator} cannot be null`
    )
  }
  return version
}

/**
 * Compare two versions.
 * Returns:
 *  - -1 if v1 < v2
 *  -  0 if v1 == v2
 *  -  1 if v1 > v2
 */
export function compare(v1: MaybeVersion, v2: MaybeVersion): CompareResult {
  return compareVersions(toVersion(v1), toVersion(v2))
}

/**
 * Reverse compare: rcompare(v1, v2) = compare(v2, v1)
 */
export function rcompare(v1: MaybeVersion, v2: MaybeVersion): CompareResult {
  return compare(v2, v1)
}

/**
 * v1 == v2. Two nulls are equal; null never equals a version.
 */
export function eq(v1: MaybeVersion, v2: MaybeVersion): boolean {
  return compare(v1, v2) === 0
}

/**
 * v1 != v2
 */
export function neq(v1: MaybeVersion, v2: MaybeVersion): boolean {
  return !eq(v1, v2)
}

/**
 * v1 < v2
 *
 * @throws {InvalidArgumentError} if v1 is null or undefined
 */
export function lt(v1: MaybeVersion, v2: MaybeVersion): boolean {
  return compareVersions(requireLeft(v1, '<'), toVersion(v2)) < 0
}

/**
 * v1 <= v2
 *
 * @throws {InvalidArgumentError} if v1 is null and v2 is not
 */
export function lte(v1: MaybeVersion, v2: MaybeVersion): boolean {
  return eq(v1, v2) || lt(v1, v2)
}

/**
 * v1 > v2
 *
 * @throws {InvalidArgumentError} if v1 is null or undefined
 */
export function gt(v1: MaybeVersion, v2: MaybeVersion): boolean {
  return compareVersions(requireLeft(v1, '>'), toVersion(v2)) > 0
}

/**
 * v1 >= v2
 *
 * @throws {InvalidArgumentError} if v1 is null and v2 is not
 */
export function gte(v1: MaybeVersion, v2: MaybeVersion): boolean {
  return eq(v1, v2) || gt(v1, v2)
}

/**
 * Sort versions ascending. Returns a new array; strings keep their form.
 */
export function sort<T extends VersionInput>(versions: readonly T[]): T[] {
  return [...versions].sort((a, b) => compare(a, b))
}

/**
 * Sort versions descending. Returns a new array.
 */
export function rsort<T extends VersionInput>(versions: readonly T[]): T[] {
  return [...versions].sort((a, b) => rcompare(a, b))
}
