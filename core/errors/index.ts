/**
 * Semver Error Types
 *
 * Structured error types for version and range operations with:
 * - Typed error codes for programmatic handling
 * - The offending input kept as context
 * - JSON serialization
 */

// =============================================================================
// Error Code Types
// =============================================================================

/**
 * Error codes for version operations
 */
export type SemverErrorCode =
  | 'ENULLINPUT'     // Null or empty input where a value is required
  | 'EFORMAT'        // Input does not match the version or range grammar
  | 'EINVALIDARG'    // Argument outside what the operation accepts
  | 'ETYPEMISMATCH'  // Compared against something that is not a version

// =============================================================================
// Error Context Types
// =============================================================================

/**
 * What a failed parse was expecting
 */
export type ExpectedInput = 'version' | 'range'

/**
 * Context attached to version errors
 */
export interface SemverErrorContext {
  input?: string
  argument?: string
  expected?: ExpectedInput
}

/**
 * JSON-serializable error representation
 */
export interface SemverErrorJSON {
  name: string
  code: SemverErrorCode
  message: string
  context?: SemverErrorContext
  stack?: string
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for version operations
 */
export class SemverError extends Error {
  readonly code: SemverErrorCode
  readonly context?: SemverErrorContext

  constructor(
    code: SemverErrorCode,
    message: string,
    context?: SemverErrorContext
  ) {
    super(message)
    this.name = 'SemverError'
    this.code = code
    this.context = context

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SemverErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    }
  }

  static fromJSON(json: SemverErrorJSON): SemverError {
    const error = new SemverError(json.code, json.message, json.context)
    error.name = json.name
    if (json.stack) {
      error.stack = json.stack
    }
    return error
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * A null, undefined or empty string was passed where a value is mandatory
 */
export class NullOrEmptyInputError extends SemverError {
  readonly argument: string

  constructor(argument: string) {
    super('ENULLINPUT', `Value cannot be null or empty: ${argument}`, { argument })
    this.name = 'NullOrEmptyInputError'
    this.argument = argument
  }
}

/**
 * Text that does not match the version or range grammar
 */
export class FormatError extends SemverError {
  readonly input: string
  readonly expected: ExpectedInput

  constructor(input: string, expected: ExpectedInput = 'version') {
    const message = expected === 'range'
      ? `'${input}' is not a valid version range string`
      : `'${input}' is not a valid version string`

    super('EFORMAT', message, { input, expected })
    this.name = 'FormatError'
    this.input = input
    this.expected = expected
  }
}

/**
 * An argument the operation cannot work with (null left operand, bad component)
 */
export class InvalidArgumentError extends SemverError {
  readonly argument: string

  constructor(argument: string, message?: string) {
    super('EINVALIDARG', message ?? `Invalid argument: ${argument}`, { argument })
    this.name = 'InvalidArgumentError'
    this.argument = argument
  }
}

/**
 * Comparison against a value that is not a SemanticVersion
 */
export class TypeMismatchError extends SemverError {
  constructor(message = 'Type to compare must be an instance of SemanticVersion') {
    super('ETYPEMISMATCH', message)
    this.name = 'TypeMismatchError'
  }
}

// =============================================================================
// Error Type Guards
// =============================================================================

export function isSemverError(error: unknown): error is SemverError {
  return error instanceof SemverError
}

export function hasErrorCode(error: unknown, code: SemverErrorCode): boolean {
  return isSemverError(error) && error.code === code
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Wrap an unknown error as a SemverError
 */
export function wrapError(error: unknown, code: SemverErrorCode = 'EINVALIDARG'): SemverError {
  if (isSemverError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new SemverError(code, error.message)
  }

  return new SemverError(code, String(error))
}
