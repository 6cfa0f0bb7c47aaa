/**
 * Pattern validation.
 * @packageDocumentation
 */

import type { RegexPattern, PatternError } from '../types'
import { parsePattern } from './parser'

/**
 * Validate a pattern against the supported grammar.
 *
 * Returns errors for:
 * - Character classes opened with `[` and never closed
 * - A `]` with no opening `[`
 * - `*` or `+` with no preceding atom
 *
 * @param pattern - The parsed pattern, or a pattern string to parse first
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePattern(pattern: RegexPattern | string): readonly PatternError[] {
  const parsed = typeof pattern === 'string' ? parsePattern(pattern) : pattern
  return parsed.errors ?? []
}

/**
 * Check if a pattern is valid (has no errors).
 *
 * @param pattern - The pattern to check
 * @returns true if the pattern has no errors
 *
 * @public
 */
export function isValidPattern(pattern: RegexPattern | string): boolean {
  return validatePattern(pattern).length === 0
}
