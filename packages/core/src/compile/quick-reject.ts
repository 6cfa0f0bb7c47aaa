/**
 * Quick-reject filter construction.
 * @packageDocumentation
 */

import type { RegexPattern, QuickRejectFilter, QuickRejectMode } from '../types'
import { getMinLength, getMaxLength } from './automaton-builder'

/**
 * Build quick-reject filters for a pattern.
 *
 * Quick-reject filters enable fast elimination of non-matching texts
 * before automaton simulation.
 *
 * @param pattern - Pattern AST
 * @returns Quick-reject filter configuration
 *
 * @public
 */
export function buildQuickRejectFilter(pattern: RegexPattern): QuickRejectFilter {
  // Required prefix: leading literals before any wildcard, class or quantifier
  let prefix = ''
  for (const term of pattern.terms) {
    if (term.atom.type !== 'literal' || term.quantifier !== undefined) {
      // "ab+" still requires "ab", but "ab*" only requires "a"
      if (term.atom.type === 'literal' && term.quantifier === '+') {
        prefix += term.atom.char
      }
      break
    }
    prefix += term.atom.char
  }

  return {
    minLength: getMinLength(pattern),
    maxLength: getMaxLength(pattern),
    requiredPrefix: prefix.length > 0 ? prefix : undefined,
  }
}

/**
 * Apply quick-reject filter to a text.
 *
 * In `full` mode the whole text must match, so every filter applies.
 * In `substring` mode only the minimum length applies.
 *
 * @param text - Text to check
 * @param filter - Quick-reject filter
 * @param mode - Anchored or substring match
 * @returns false if text definitely doesn't match, true if it might match
 *
 * @public
 */
export function applyQuickReject(text: string, filter: QuickRejectFilter, mode: QuickRejectMode = 'full'): boolean {
  // Check minimum length
  if (text.length < filter.minLength) {
    return false
  }

  if (mode === 'substring') {
    return true
  }

  // Check maximum length
  if (filter.maxLength !== undefined && text.length > filter.maxLength) {
    return false
  }

  // Check required prefix
  if (filter.requiredPrefix !== undefined && !text.startsWith(filter.requiredPrefix)) {
    return false
  }

  return true
}
