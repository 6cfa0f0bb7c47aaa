/**
 * Restricted Regex Library
 *
 * Compiles a small regular-expression language (literals, `.`, `[...]`
 * classes, postfix `*` and `+`) to a nondeterministic finite automaton and
 * answers anchored and substring queries by simulating it.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // AST types
  RegexPattern,
  Term,
  Quantifier,
  Atom,
  LiteralAtom,
  WildcardAtom,
  CharClassAtom,
  CharRange,
  // State types
  RegexState,
  StartState,
  TerminationState,
  WildcardState,
  LiteralState,
  CharClassState,
  StarState,
  PlusState,
  AtomState,
  // Automaton types
  CompiledRegex,
  QuickRejectFilter,
  QuickRejectMode,
  RegexAutomaton,
  AutomatonNode,
  // Options
  CompileOptions,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'
export { RegexSyntaxError, AutomatonLimitError, DEFAULT_MAX_CLASS_MEMBERS } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { parsePattern } from './parse'
export { validatePattern, isValidPattern } from './parse'

// =============================================================================
// Compilation
// =============================================================================

export { compileRegex } from './compile'
export { buildAutomaton, getMinLength, getMaxLength, isUnbounded } from './compile'
export { buildQuickRejectFilter, applyQuickReject } from './compile'

// =============================================================================
// Matching
// =============================================================================

export { isFullMatch, checkString } from './match'
export { startAttempt, advance, isAccepting, stateAccepts, type MatchAttempt } from './match'
export { traceMatch, type MatchTrace, type MatchStep } from './match'

// =============================================================================
// Automaton Operations
// =============================================================================

export { epsilonClosure } from './automaton'
export { isEmpty, findWitness, describeAutomaton } from './automaton'
