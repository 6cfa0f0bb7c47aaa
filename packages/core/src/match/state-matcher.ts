/**
 * Character acceptance for automaton states.
 * @packageDocumentation
 */

import type { RegexAutomaton } from '../types'

/**
 * Test whether a state can consume a character.
 *
 * This is the only place that interprets state kinds for matching; the
 * simulation step and witness search both go through it.
 *
 * @param automaton - Automaton owning the state
 * @param stateId - State to test
 * @param char - A single character
 * @returns true if the state accepts the character
 *
 * @public
 */
export function stateAccepts(automaton: RegexAutomaton, stateId: number, char: string): boolean {
  const state = automaton.states[stateId].state

  switch (state.kind) {
    case 'start':
    case 'termination':
      return false

    case 'wildcard':
      return true

    case 'literal':
      return state.symbol === char

    case 'charclass':
      return state.members.has(char)

    case 'star':
    case 'plus':
      return stateAccepts(automaton, state.inner, char)
  }
}
