/**
 * Epsilon closure over the regex automaton.
 * @packageDocumentation
 */

import type { RegexAutomaton } from '../types'

/**
 * Compute epsilon closure of a set of states.
 *
 * Returns the smallest superset of `states` closed under epsilon edges.
 * Reads only the automaton's epsilon edges; the input is not modified.
 *
 * @param automaton - The automaton to traverse
 * @param states - State ids to start from
 * @returns Every state reachable through zero or more epsilon edges
 *
 * @public
 */
export function epsilonClosure(automaton: RegexAutomaton, states: Iterable<number>): Set<number> {
  const closure = new Set(states)
  const worklist = [...closure]

  let stateId = worklist.pop()
  while (stateId !== undefined) {
    for (const target of automaton.states[stateId].epsilon) {
      if (!closure.has(target)) {
        closure.add(target)
        worklist.push(target)
      }
    }
    stateId = worklist.pop()
  }

  return closure
}
