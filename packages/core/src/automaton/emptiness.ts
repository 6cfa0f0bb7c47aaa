/**
 * Automaton emptiness checking and witness finding.
 * @packageDocumentation
 */

import type { RegexAutomaton } from '../types'
import { epsilonClosure } from './epsilon-closure'

/**
 * Character used for `.` when building a witness.
 */
const WILDCARD_WITNESS = 'x'

/**
 * Check if an automaton's language is empty.
 *
 * Unlike plain graph reachability this accounts for states that accept
 * nothing, such as the empty class `[]` or a reversed range `[z-a]`.
 *
 * @param automaton - The automaton to check
 * @returns true if the automaton accepts no strings
 *
 * @public
 */
export function isEmpty(automaton: RegexAutomaton): boolean {
  return findWitness(automaton) === undefined
}

/**
 * Find a shortest text accepted by the automaton.
 *
 * Breadth-first search over states; each consuming step appends one
 * character the entered state accepts (the literal itself, the lowest
 * member of a class, or a fixed character for `.`).
 *
 * @param automaton - The automaton to find a witness for
 * @returns A witness text, or undefined if the language is empty
 *
 * @public
 */
export function findWitness(automaton: RegexAutomaton): string | undefined {
  interface SearchState {
    stateId: number
    text: string
  }

  const visited = epsilonClosure(automaton, [automaton.startState])
  const queue: SearchState[] = [...visited].map((stateId) => ({ stateId, text: '' }))

  for (let head = 0; head < queue.length; head++) {
    const { stateId, text } = queue[head]

    if (stateId === automaton.terminationState) {
      return text
    }

    for (const targets of automaton.states[stateId].transitions.values()) {
      for (const target of targets) {
        const char = witnessChar(automaton, target)
        if (char === undefined) continue

        for (const reached of epsilonClosure(automaton, [target])) {
          if (!visited.has(reached)) {
            visited.add(reached)
            queue.push({ stateId: reached, text: text + char })
          }
        }
      }
    }
  }

  return undefined
}

/**
 * Pick one character the state accepts, or undefined if it accepts none.
 */
function witnessChar(automaton: RegexAutomaton, stateId: number): string | undefined {
  const state = automaton.states[stateId].state

  switch (state.kind) {
    case 'start':
    case 'termination':
      return undefined

    case 'wildcard':
      return WILDCARD_WITNESS

    case 'literal':
      return state.symbol

    case 'charclass': {
      let lowest: string | undefined
      for (const member of state.members) {
        if (lowest === undefined || member < lowest) {
          lowest = member
        }
      }
      return lowest
    }

    case 'star':
    case 'plus':
      return witnessChar(automaton, state.inner)
  }
}
