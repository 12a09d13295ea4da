/**
 * version-spec - semantic versions and version ranges
 *
 * Parses strict (`1.2.3-beta`) and loose NuGet-style (`1.2`, `1.2.3.4-rc-1`)
 * versions, orders them, and tests them against bracket interval ranges.
 *
 * @example
 * ```typescript
 * import { parseLoose, parseRange, lt } from 'version-spec'
 *
 * const range = parseRange('[1.2, 3.2.5)')
 * range.satisfies('2.0.0')                  // true
 * range.toMathString()                      // '(≥ 1.2 && < 3.2.5)'
 *
 * lt(parseLoose('1.01-RC-1'), '1.01')       // true
 * ```
 *
 * @packageDocumentation
 */

export * from './core/index.js'
