/**
 * Set-based NFA simulation, one character at a time.
 * @packageDocumentation
 */

import type { RegexAutomaton } from '../types'
import { epsilonClosure } from '../automaton/epsilon-closure'
import { stateAccepts } from './state-matcher'

/**
 * Progress of a single match attempt.
 *
 * A new attempt is created for every query and every start offset, so
 * nothing learned in one attempt is visible to another.
 *
 * @public
 */
export interface MatchAttempt {
  /** States active after the characters consumed so far (epsilon-closed) */
  readonly active: ReadonlySet<number>

  /** `+` loop nodes whose body has consumed at least one character */
  readonly firedLoops: ReadonlySet<number>
}

/**
 * Begin an attempt: the epsilon closure of the start state.
 *
 * @public
 */
export function startAttempt(automaton: RegexAutomaton): MatchAttempt {
  return {
    active: epsilonClosure(automaton, [automaton.startState]),
    firedLoops: new Set(),
  }
}

/**
 * Consume one character.
 *
 * A labeled edge `s -> t` from an active state is taken when `t` accepts
 * the character. The reached states are then epsilon-closed.
 *
 * @param automaton - The automaton being simulated
 * @param attempt - Attempt before the character
 * @param char - The character to consume
 * @returns Attempt after the character (active set may be empty)
 *
 * @public
 */
export function advance(automaton: RegexAutomaton, attempt: MatchAttempt, char: string): MatchAttempt {
  const reached = new Set<number>()

  for (const stateId of attempt.active) {
    for (const targets of automaton.states[stateId].transitions.values()) {
      for (const target of targets) {
        if (!reached.has(target) && stateAccepts(automaton, target, char)) {
          reached.add(target)
        }
      }
    }
  }

  return {
    active: epsilonClosure(automaton, reached),
    firedLoops: markFiredLoops(automaton, attempt.firedLoops, reached),
  }
}

/**
 * Check whether the termination state is active.
 *
 * @public
 */
export function isAccepting(automaton: RegexAutomaton, attempt: MatchAttempt): boolean {
  return attempt.active.has(automaton.terminationState)
}

/**
 * Record the `+` loops whose body was entered by the last step.
 */
function markFiredLoops(
  automaton: RegexAutomaton,
  fired: ReadonlySet<number>,
  reached: ReadonlySet<number>,
): ReadonlySet<number> {
  let result: Set<number> | undefined

  for (const stateId of reached) {
    // A loop body's only epsilon edge leads to its loop node
    for (const target of automaton.states[stateId].epsilon) {
      const loop = automaton.states[target].state
      if (loop.kind === 'plus' && loop.inner === stateId && !fired.has(target)) {
        if (result === undefined) {
          result = new Set(fired)
        }
        result.add(target)
      }
    }
  }

  return result ?? fired
}
