// =============================================================================
// STATE VARIANTS
// =============================================================================

/**
 * The kind of a node in the regex automaton.
 *
 * Each kind answers one question: can this state consume a given character?
 * Quantifier states refer to the state they repeat by its arena index.
 *
 * @public
 */
export type RegexState = StartState | TerminationState | WildcardState | LiteralState | CharClassState | StarState | PlusState

/**
 * Sole entry point of the automaton. Accepts no character.
 * @public
 */
export interface StartState {
  readonly kind: 'start'
}

/**
 * Sole accept marker of the automaton. Accepts no character.
 * @public
 */
export interface TerminationState {
  readonly kind: 'termination'
}

/**
 * Accepts any single character (from `.`).
 * @public
 */
export interface WildcardState {
  readonly kind: 'wildcard'
}

/**
 * Accepts exactly one fixed character.
 * @public
 */
export interface LiteralState {
  readonly kind: 'literal'
  readonly symbol: string
}

/**
 * Accepts any character in `members`.
 * @public
 */
export interface CharClassState {
  readonly kind: 'charclass'

  /** Text between the brackets, kept for debugging */
  readonly definition: string

  /** Expanded set of accepted characters */
  readonly members: ReadonlySet<string>
}

/**
 * Loop node for `*`. Accepts whatever `inner` accepts.
 * @public
 */
export interface StarState {
  readonly kind: 'star'

  /** Arena index of the repeated atom */
  readonly inner: number
}

/**
 * Loop node for `+`. Accepts whatever `inner` accepts.
 *
 * Whether the loop has run at least once is tracked per match attempt
 * (see `MatchAttempt.firedLoops`), never on the node.
 *
 * @public
 */
export interface PlusState {
  readonly kind: 'plus'
  readonly inner: number
}

/**
 * Kinds produced from a single pattern atom.
 * @public
 */
export type AtomState = WildcardState | LiteralState | CharClassState
