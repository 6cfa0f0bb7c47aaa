/**
 * Automaton builder - converts pattern AST to a character NFA.
 * @packageDocumentation
 */

import type {
  RegexPattern,
  Term,
  Atom,
  CharClassAtom,
  RegexState,
  AtomState,
  RegexAutomaton,
  AutomatonNode,
  CompileOptions,
} from '../types'
import { AutomatonLimitError, DEFAULT_MAX_CLASS_MEMBERS } from '../types'

/**
 * Node under construction. Edges stay mutable until the automaton is sealed.
 */
interface BuilderNode {
  id: number
  state: RegexState
  transitions: Map<string, Set<number>>
  epsilon: Set<number>
}

/**
 * Mutable state builder for constructing automata.
 */
interface AutomatonBuilder {
  states: BuilderNode[]
  maxClassMembers: number
}

/**
 * Build a regex automaton from a pattern AST.
 *
 * Construction keeps a single "frontier" state that the next term connects
 * from. Concatenation is the only combinator besides repetition, so no
 * fragment stack is needed.
 *
 * For a term with atom node `base` and frontier `f`:
 * - no quantifier: `f -label-> base`
 * - `*`: loop node `Q`, with `f -ε-> Q`, `f -label-> base`, `base -ε-> Q`, `Q -label-> base`
 * - `+`: loop node `P`, with `f -label-> base`, `base -ε-> P`, `P -label-> base`
 *
 * The loop node becomes the new frontier. The final frontier gets an epsilon
 * edge to the termination state.
 *
 * The pattern is assumed valid; `compileRegex` refuses patterns with errors
 * before calling this.
 *
 * @param pattern - Parsed pattern AST
 * @param options - Compile limits
 * @returns Frozen regex automaton (NFA)
 * @throws AutomatonLimitError if a character class exceeds `maxClassMembers`
 *
 * @public
 */
export function buildAutomaton(pattern: RegexPattern, options: CompileOptions = {}): RegexAutomaton {
  const builder: AutomatonBuilder = {
    states: [],
    maxClassMembers: options.maxClassMembers ?? DEFAULT_MAX_CLASS_MEMBERS,
  }

  const startId = createState(builder, { kind: 'start' })
  const terminationId = createState(builder, { kind: 'termination' })

  if (pattern.terms.length === 0) {
    addEpsilon(builder, startId, terminationId)
    return seal(builder, startId, terminationId)
  }

  let frontier = startId
  for (const term of pattern.terms) {
    frontier = buildTerm(builder, term, frontier)
  }

  addEpsilon(builder, frontier, terminationId)

  return seal(builder, startId, terminationId)
}

/**
 * Wire one term onto the frontier and return the new frontier.
 */
function buildTerm(builder: AutomatonBuilder, term: Term, frontier: number): number {
  const label = atomLabel(term.atom)
  const base = createState(builder, createAtomState(builder, term.atom))

  switch (term.quantifier) {
    case undefined:
      addTransition(builder, frontier, base, label)
      return base

    case '*': {
      const loop = createState(builder, { kind: 'star', inner: base })
      addEpsilon(builder, frontier, loop) // zero repetitions
      addTransition(builder, frontier, base, label)
      addEpsilon(builder, base, loop)
      addTransition(builder, loop, base, label)
      return loop
    }

    case '+': {
      const loop = createState(builder, { kind: 'plus', inner: base })
      addTransition(builder, frontier, base, label)
      addEpsilon(builder, base, loop)
      addTransition(builder, loop, base, label)
      return loop
    }
  }
}

/**
 * Create a new state in the automaton.
 */
function createState(builder: AutomatonBuilder, state: RegexState): number {
  const id = builder.states.length
  builder.states.push({
    id,
    state,
    transitions: new Map(),
    epsilon: new Set(),
  })
  return id
}

/**
 * Add a labeled (consuming) edge. Duplicate edges collapse.
 */
function addTransition(builder: AutomatonBuilder, fromState: number, toState: number, label: string): void {
  const transitions = builder.states[fromState].transitions
  let targets = transitions.get(label)
  if (targets === undefined) {
    targets = new Set()
    transitions.set(label, targets)
  }
  targets.add(toState)
}

/**
 * Add an epsilon (non-consuming) edge.
 */
function addEpsilon(builder: AutomatonBuilder, fromState: number, toState: number): void {
  builder.states[fromState].epsilon.add(toState)
}

/**
 * Label used for edges into an atom's node: the atom's source text.
 */
function atomLabel(atom: Atom): string {
  switch (atom.type) {
    case 'literal':
      return atom.char
    case 'wildcard':
      return '.'
    case 'charclass':
      return `[${atom.definition}]`
  }
}

function createAtomState(builder: AutomatonBuilder, atom: Atom): AtomState {
  switch (atom.type) {
    case 'literal':
      return { kind: 'literal', symbol: atom.char }
    case 'wildcard':
      return { kind: 'wildcard' }
    case 'charclass':
      return {
        kind: 'charclass',
        definition: atom.definition,
        members: expandCharClass(atom, builder.maxClassMembers),
      }
  }
}

/**
 * Expand a character class into the set of characters it accepts.
 *
 * Ranges are inclusive over char codes; a reversed range contributes nothing.
 */
function expandCharClass(atom: CharClassAtom, maxMembers: number): ReadonlySet<string> {
  const members = new Set<string>(atom.chars.split(''))
  checkClassSize(atom, members, maxMembers)

  for (const range of atom.ranges) {
    const first = range.start.charCodeAt(0)
    const last = range.end.charCodeAt(0)
    for (let code = first; code <= last; code++) {
      members.add(String.fromCharCode(code))
    }
    checkClassSize(atom, members, maxMembers)
  }

  return members
}

function checkClassSize(atom: CharClassAtom, members: ReadonlySet<string>, maxMembers: number): void {
  if (members.size > maxMembers) {
    throw new AutomatonLimitError(
      'CLASS_SIZE_LIMIT',
      `Character class [${atom.definition}] at position ${atom.position} expands to ${members.size} ` +
        `characters, more than the limit of ${maxMembers}.`,
      maxMembers,
      members.size,
    )
  }
}

/**
 * Freeze the builder's nodes into the public automaton shape.
 */
function seal(builder: AutomatonBuilder, startState: number, terminationState: number): RegexAutomaton {
  const states: AutomatonNode[] = builder.states.map((node) =>
    Object.freeze({
      id: node.id,
      state: Object.freeze(node.state),
      transitions: node.transitions,
      epsilon: node.epsilon,
    }),
  )

  return Object.freeze({
    states: Object.freeze(states),
    startState,
    terminationState,
  })
}

/**
 * Get the minimum number of characters a pattern can match.
 *
 * @param pattern - Pattern AST
 * @returns Minimum text length
 *
 * @public
 */
export function getMinLength(pattern: RegexPattern): number {
  let count = 0
  for (const term of pattern.terms) {
    if (term.quantifier !== '*') {
      count++
    }
    // * contributes 0 to minimum
  }
  return count
}

/**
 * Get the maximum number of characters a pattern can match.
 *
 * @param pattern - Pattern AST
 * @returns Maximum text length, or undefined if unbounded (contains * or +)
 *
 * @public
 */
export function getMaxLength(pattern: RegexPattern): number | undefined {
  for (const term of pattern.terms) {
    if (term.quantifier !== undefined) {
      return undefined // Unbounded
    }
  }
  return pattern.terms.length
}

/**
 * Check if a pattern contains a quantifier.
 *
 * @param pattern - Pattern AST
 * @returns true if pattern is unbounded
 *
 * @public
 */
export function isUnbounded(pattern: RegexPattern): boolean {
  return getMaxLength(pattern) === undefined
}
