/**
 * Step-by-step record of an anchored match, for debugging.
 * @packageDocumentation
 */

import type { CompiledRegex } from '../types'
import { startAttempt, advance, isAccepting, type MatchAttempt } from './simulation'

/**
 * Snapshot of an attempt after one step.
 * @public
 */
export interface MatchStep {
  /** Index of the consumed character, or -1 for the initial closure */
  readonly index: number

  /** The consumed character ('' for the initial closure) */
  readonly char: string

  /** Active state ids, ascending */
  readonly active: readonly number[]

  /** Fired `+` loop ids, ascending */
  readonly firedLoops: readonly number[]
}

/**
 * Result of {@link traceMatch}.
 * @public
 */
export interface MatchTrace {
  /** Same answer as `isFullMatch` */
  readonly matched: boolean

  /** Initial closure followed by one entry per consumed character */
  readonly steps: readonly MatchStep[]
}

/**
 * Run the anchored simulation and record every step.
 *
 * Quick-reject filters are skipped so that the trace always shows the
 * automaton's own behavior. Recording stops at the first empty active set.
 *
 * @param text - Text to match
 * @param pattern - Compiled pattern
 * @returns The match result with its steps
 *
 * @public
 */
export function traceMatch(text: string, pattern: CompiledRegex): MatchTrace {
  const { automaton } = pattern
  let attempt = startAttempt(automaton)
  const steps: MatchStep[] = [snapshot(-1, '', attempt)]

  for (let i = 0; i < text.length; i++) {
    attempt = advance(automaton, attempt, text[i])
    steps.push(snapshot(i, text[i], attempt))

    if (attempt.active.size === 0) {
      return { matched: false, steps }
    }
  }

  return { matched: isAccepting(automaton, attempt), steps }
}

function snapshot(index: number, char: string, attempt: MatchAttempt): MatchStep {
  return {
    index,
    char,
    active: [...attempt.active].sort((a, b) => a - b),
    firedLoops: [...attempt.firedLoops].sort((a, b) => a - b),
  }
}
