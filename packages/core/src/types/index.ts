/**
 * Type definitions for the restricted regex engine.
 * @packageDocumentation
 */

// AST types
export type { RegexPattern, Term, Quantifier, Atom, LiteralAtom, WildcardAtom, CharClassAtom, CharRange } from './ast'

// State types
export type {
  RegexState,
  StartState,
  TerminationState,
  WildcardState,
  LiteralState,
  CharClassState,
  StarState,
  PlusState,
  AtomState,
} from './state'

// Automaton types
export type {
  CompiledRegex,
  QuickRejectFilter,
  QuickRejectMode,
  RegexAutomaton,
  AutomatonNode,
} from './automaton'

// Options
export type { CompileOptions } from './options'
export { DEFAULT_MAX_CLASS_MEMBERS } from './options'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { RegexSyntaxError, AutomatonLimitError } from './errors'
