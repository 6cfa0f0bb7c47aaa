import { describe, it, expect } from 'vitest'

import { parsePattern } from '../parse'
import { buildAutomaton } from '../compile/automaton-builder'
import { epsilonClosure } from './epsilon-closure'

describe('epsilonClosure', () => {
  // a*b: s0 start, s1 termination, s2 'a', s3 star(s2), s4 'b'
  const automaton = buildAutomaton(parsePattern('a*b'))

  it('includes the input states', () => {
    expect(epsilonClosure(automaton, [4])).toEqual(new Set([4, 1]))
  })

  it('follows epsilon edges from the start state', () => {
    expect(epsilonClosure(automaton, [automaton.startState])).toEqual(new Set([0, 3]))
  })

  it('follows chains of epsilon edges', () => {
    const empty = buildAutomaton(parsePattern('a*b*'))

    // s0 -ε-> s3 (star a) -ε-> s5 (star b) -ε-> s1
    expect(epsilonClosure(empty, [0])).toEqual(new Set([0, 3, 5, 1]))
  })

  it('does not follow labeled edges', () => {
    expect(epsilonClosure(automaton, [3])).toEqual(new Set([3]))
  })

  it('returns an empty set for no states', () => {
    expect(epsilonClosure(automaton, [])).toEqual(new Set())
  })

  it('does not modify its input', () => {
    const input = new Set([2])
    const closure = epsilonClosure(automaton, input)

    expect(closure).toEqual(new Set([2, 3]))
    expect(input).toEqual(new Set([2]))
  })
})
