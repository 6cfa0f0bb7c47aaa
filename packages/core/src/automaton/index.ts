/**
 * Automaton operations.
 * @packageDocumentation
 */

export { epsilonClosure } from './epsilon-closure'
export { isEmpty, findWitness } from './emptiness'
export { describeAutomaton } from './describe'
