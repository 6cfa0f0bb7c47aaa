import type { RegexAutomaton, RegexState } from '../types'

/**
 * Render an automaton as text, one line per state.
 *
 * @example
 * ```
 * s0 start | a -> s2
 * s1 termination
 * s2 literal 'a' | ε -> s1
 * ```
 *
 * @public
 */
export function describeAutomaton(automaton: RegexAutomaton): string {
  return automaton.states
    .map((node) => {
      const edges: string[] = []
      for (const [label, targets] of node.transitions) {
        for (const target of [...targets].sort((a, b) => a - b)) {
          edges.push(`${label} -> s${target}`)
        }
      }
      for (const target of [...node.epsilon].sort((a, b) => a - b)) {
        edges.push(`ε -> s${target}`)
      }

      const head = `s${node.id} ${describeState(node.state)}`
      return edges.length > 0 ? `${head} | ${edges.join(', ')}` : head
    })
    .join('\n')
}

function describeState(state: RegexState): string {
  switch (state.kind) {
    case 'start':
    case 'termination':
    case 'wildcard':
      return state.kind
    case 'literal':
      return `literal '${state.symbol}'`
    case 'charclass':
      return `charclass [${state.definition}]`
    case 'star':
    case 'plus':
      return `${state.kind}(s${state.inner})`
  }
}
