import type { RegexPattern } from './ast'
import type { RegexState } from './state'

// =============================================================================
// COMPILED PATTERN
// =============================================================================

/**
 * A compiled pattern ready for matching.
 *
 * Everything reachable from a compiled pattern is frozen: matching reads
 * the automaton but never writes to it, so one compiled pattern can serve
 * any number of sequential queries.
 *
 * @public
 */
export interface CompiledRegex {
  /** Original source pattern */
  readonly source: string

  /** Parsed AST */
  readonly ast: RegexPattern

  /**
   * Quick-reject filters applied before simulation.
   * If any filter fails, the text definitely doesn't match.
   */
  readonly quickReject: QuickRejectFilter

  /** Character-level NFA */
  readonly automaton: RegexAutomaton

  /** Whether pattern can match texts of any length (contains * or +) */
  readonly isUnbounded: boolean

  /** Minimum number of characters a match consumes */
  readonly minLength: number

  /** Maximum characters (undefined if unbounded) */
  readonly maxLength?: number
}

/**
 * Quick rejection filters for fast text elimination.
 * @public
 */
export interface QuickRejectFilter {
  /** Shortest text that can match */
  readonly minLength: number

  /** Longest text that can match as a whole (undefined if unbounded) */
  readonly maxLength?: number

  /** Leading literal characters every full match starts with */
  readonly requiredPrefix?: string
}

/**
 * Whether a quick-reject check is for an anchored match or a substring search.
 * @public
 */
export type QuickRejectMode = 'full' | 'substring'

// =============================================================================
// REGEX AUTOMATON
// =============================================================================

/**
 * A nondeterministic finite automaton over characters.
 *
 * Nodes live in an arena and refer to each other by index, which keeps the
 * cyclic quantifier loops free of object references.
 *
 * Being in a node means the node's own atom has just been consumed, so a
 * labeled edge `s -> t` is taken on character `c` exactly when `t` accepts `c`.
 *
 * @public
 */
export interface RegexAutomaton {
  /** All states in the automaton (index === id) */
  readonly states: readonly AutomatonNode[]

  /** Index of the start state */
  readonly startState: number

  /** Index of the termination (accepting) state */
  readonly terminationState: number
}

/**
 * A node of the regex automaton with its outgoing edges.
 * @public
 */
export interface AutomatonNode {
  /** Unique identifier for this state (index in the states array) */
  readonly id: number

  /** What this node accepts */
  readonly state: RegexState

  /**
   * Labeled (consuming) edges, keyed by the source text of the target's
   * atom ("a", ".", "[a-z]").
   */
  readonly transitions: ReadonlyMap<string, ReadonlySet<number>>

  /** Unlabeled edges (no input consumed) */
  readonly epsilon: ReadonlySet<number>
}
