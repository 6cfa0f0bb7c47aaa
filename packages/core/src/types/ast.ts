import type { PatternError } from './errors'

// =============================================================================
// PATTERN AST
// =============================================================================

/**
 * A parsed pattern: a flat sequence of terms.
 *
 * The grammar has no alternation or grouping, so concatenation is the only
 * combinator and a list is enough to describe the whole pattern.
 *
 * @public
 */
export interface RegexPattern {
  /** Original pattern string */
  readonly source: string

  /** Terms in left-to-right order */
  readonly terms: readonly Term[]

  /** Errors found while parsing (undefined if none) */
  readonly errors?: readonly PatternError[]
}

/**
 * A single atom with its optional postfix quantifier.
 *
 * @example "a+" -> { atom: { type: "literal", char: "a" }, quantifier: "+" }
 *
 * @public
 */
export interface Term {
  readonly atom: Atom

  /** `*` (zero or more) or `+` (one or more); undefined for exactly once */
  readonly quantifier?: Quantifier
}

/**
 * Postfix repetition operator.
 * @public
 */
export type Quantifier = '*' | '+'

// =============================================================================
// ATOM TYPES
// =============================================================================

/**
 * A pattern element that consumes exactly one character.
 * @public
 */
export type Atom = LiteralAtom | WildcardAtom | CharClassAtom

/**
 * An exact character match.
 * @public
 */
export interface LiteralAtom {
  readonly type: 'literal'
  readonly char: string

  /** Position of the atom in the source */
  readonly position: number
}

/**
 * The `.` wildcard, matching any single character.
 * @public
 */
export interface WildcardAtom {
  readonly type: 'wildcard'
  readonly position: number
}

/**
 * A character class like [a-z0-9_].
 * @public
 */
export interface CharClassAtom {
  readonly type: 'charclass'

  /** Text between the brackets, e.g. "a-z0-9_" */
  readonly definition: string

  /** Character ranges (e.g., a-z, 0-9) */
  readonly ranges: readonly CharRange[]

  /** Individual characters not in ranges */
  readonly chars: string

  readonly position: number
}

/**
 * A character range within a character class.
 * @public
 */
export interface CharRange {
  /** Single character - start of range */
  readonly start: string
  /** Single character - end of range */
  readonly end: string
}
