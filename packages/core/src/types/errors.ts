/**
 * Error codes for pattern validation failures.
 * @public
 */
export type PatternErrorCode =
  | 'UNCLOSED_BRACKET' // [abc without ]
  | 'UNMATCHED_BRACKET' // ] with no opening [
  | 'DANGLING_QUANTIFIER' // * or + with no preceding atom
  | 'CLASS_SIZE_LIMIT' // Character class expands past the configured limit

/**
 * A pattern validation error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Character position in source where error starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Error thrown when a pattern cannot be compiled.
 *
 * Carries every problem the parser found, not only the first one.
 *
 * @public
 */
export class RegexSyntaxError extends Error {
  /** Code of the first error */
  readonly code: PatternErrorCode

  /** The pattern that failed to compile */
  readonly source: string

  /** All errors reported for the pattern */
  readonly errors: readonly PatternError[]

  constructor(source: string, errors: readonly [PatternError, ...PatternError[]]) {
    super(`Invalid pattern ${JSON.stringify(source)}: ${errors.map(formatPatternError).join('; ')}`)
    this.name = 'RegexSyntaxError'
    this.code = errors[0].code
    this.source = source
    this.errors = errors
  }
}

function formatPatternError(error: PatternError): string {
  return error.position === undefined ? error.message : `${error.message} at position ${error.position}`
}

/**
 * Error thrown when automaton construction exceeds configured limits.
 *
 * This typically occurs when a character class range expands to more
 * members than the compile options allow.
 *
 * @public
 */
export class AutomatonLimitError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(code: PatternErrorCode, message: string, limit: number, actual: number) {
    super(message)
    this.name = 'AutomatonLimitError'
    this.code = code
    this.limit = limit
    this.actual = actual
  }
}
