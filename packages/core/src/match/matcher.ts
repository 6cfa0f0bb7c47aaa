/**
 * Text matching - matches texts against compiled patterns.
 * @packageDocumentation
 */

import registerDebug from 'debug'

import type { CompiledRegex, RegexAutomaton } from '../types'
import { applyQuickReject } from '../compile/quick-reject'
import { startAttempt, advance, isAccepting } from './simulation'

const debugMatch = registerDebug('restricted-regex:match')

/**
 * Where an attempt starts and when it may stop.
 */
interface AttemptOptions {
  /** Index of the first character to consume */
  readonly offset: number

  /**
   * Succeed as soon as the termination state is active (substring search)
   * instead of only after the last character (anchored match).
   */
  readonly earlyAccept: boolean
}

/**
 * Test if the entire text matches a compiled pattern.
 *
 * @param text - Text to match
 * @param pattern - Compiled pattern
 * @returns true if the whole text matches (anchored at both ends)
 *
 * @public
 */
export function isFullMatch(text: string, pattern: CompiledRegex): boolean {
  if (!applyQuickReject(text, pattern.quickReject, 'full')) {
    debugMatch('isFullMatch %o on %o: quick reject', pattern.source, text)
    return false
  }

  const matched = runAttempt(pattern.automaton, text, { offset: 0, earlyAccept: false })
  debugMatch('isFullMatch %o on %o: %s', pattern.source, text, matched)
  return matched
}

/**
 * Test if some substring of the text matches a compiled pattern.
 *
 * Tries a full match first, then restarts the simulation at every offset
 * from left to right, stopping at the first offset that reaches the
 * termination state. Patterns that can match the empty string match any text.
 *
 * @param text - Text to search
 * @param pattern - Compiled pattern
 * @returns true if a match is found anywhere in the text
 *
 * @public
 */
export function checkString(text: string, pattern: CompiledRegex): boolean {
  if (!applyQuickReject(text, pattern.quickReject, 'substring')) {
    debugMatch('checkString %o on %o: quick reject', pattern.source, text)
    return false
  }

  if (isFullMatch(text, pattern)) {
    return true
  }

  // A match starting later than this cannot fit its required characters
  const lastOffset = text.length - pattern.minLength
  for (let offset = 0; offset <= lastOffset; offset++) {
    if (runAttempt(pattern.automaton, text, { offset, earlyAccept: true })) {
      debugMatch('checkString %o on %o: match at offset %d', pattern.source, text, offset)
      return true
    }
  }

  debugMatch('checkString %o on %o: no match', pattern.source, text)
  return false
}

/**
 * Run one simulation attempt over `text` starting at `options.offset`.
 *
 * An attempt ends with no match as soon as its active set is empty.
 */
function runAttempt(automaton: RegexAutomaton, text: string, options: AttemptOptions): boolean {
  let attempt = startAttempt(automaton)

  if (options.earlyAccept && isAccepting(automaton, attempt)) {
    return true
  }

  for (let i = options.offset; i < text.length; i++) {
    attempt = advance(automaton, attempt, text[i])

    if (attempt.active.size === 0) {
      return false // No valid states - no match possible
    }

    if (options.earlyAccept && isAccepting(automaton, attempt)) {
      return true
    }
  }

  return isAccepting(automaton, attempt)
}
