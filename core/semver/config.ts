/**
 * Semver Configuration
 *
 * Process-wide settings for cache sizes and verbose logging.
 */

import { InvalidArgumentError } from '../errors'
import { DEFAULT_CACHE_SIZE, rangeCache, versionCache } from './cache'
import type { SemverConfig } from './types'

const DEFAULT_CONFIG: SemverConfig = {
  cacheSize: DEFAULT_CACHE_SIZE,
  verbose: false,
}

let config: SemverConfig = { ...DEFAULT_CONFIG }

/**
 * Update settings. Changing cacheSize resizes both parse caches,
 * evicting least recently used entries if they no longer fit.
 *
 * @example
 * ```typescript
 * configure({ verbose: true })
 * tryParseRange('[1.0,') // logs: [semver] Invalid range: '[1.0,'
 * ```
 */
export function configure(options: Partial<SemverConfig>): void {
  const cacheSize = options.cacheSize ?? config.cacheSize
  if (!Number.isInteger(cacheSize) || cacheSize < 1) {
    throw new InvalidArgumentError(
      'cacheSize',
      `cacheSize must be a positive integer, got ${cacheSize}`
    )
  }

  config = {
    cacheSize,
    verbose: options.verbose ?? config.verbose,
  }

  versionCache.resize(cacheSize)
  rangeCache.resize(cacheSize)
}

export function getConfig(): Readonly<SemverConfig> {
  return Object.freeze({ ...config })
}

export function resetConfig(): void {
  configure(DEFAULT_CONFIG)
}

/**
 * Clear all caches (useful for testing or memory management)
 */
export function clearCaches(): void {
  versionCache.clear()
  rangeCache.clear()
  log('Caches cleared')
}

export function log(message: string): void {
  if (config.verbose) {
    console.log(`[semver] ${message}`)
  }
}
