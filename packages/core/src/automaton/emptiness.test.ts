import { describe, it, expect } from 'vitest'

import { compileRegex } from '../compile'
import { isFullMatch } from '../match'
import { isEmpty, findWitness } from './emptiness'

function automatonOf(source: string) {
  return compileRegex(source).automaton
}

describe('isEmpty', () => {
  describe('non-empty automata', () => {
    it('returns false for simple pattern', () => {
      expect(isEmpty(automatonOf('abc'))).toBe(false)
    })

    it('returns false for the empty pattern', () => {
      expect(isEmpty(automatonOf(''))).toBe(false)
    })

    it('returns false when an empty class is starred', () => {
      // [] matches nothing, but zero repetitions still match
      expect(isEmpty(automatonOf('a[]*'))).toBe(false)
    })
  })

  describe('empty automata', () => {
    it('returns true for an empty class', () => {
      expect(isEmpty(automatonOf('[]'))).toBe(true)
    })

    it('returns true for a reversed range', () => {
      expect(isEmpty(automatonOf('a[z-a]b'))).toBe(true)
    })

    it('returns true when an empty class must repeat', () => {
      expect(isEmpty(automatonOf('[]+'))).toBe(true)
    })
  })
})

describe('findWitness', () => {
  it('returns the shortest accepted text', () => {
    expect(findWitness(automatonOf('a*b'))).toBe('b')
    expect(findWitness(automatonOf('a+b'))).toBe('ab')
    expect(findWitness(automatonOf('a*'))).toBe('')
    expect(findWitness(automatonOf(''))).toBe('')
  })

  it('picks the lowest member of a class', () => {
    expect(findWitness(automatonOf('[e-g]x[31]'))).toBe('ex1')
  })

  it('picks a fixed character for the wildcard', () => {
    expect(findWitness(automatonOf('.+!'))).toBe('x!')
  })

  it('returns undefined for an empty language', () => {
    expect(findWitness(automatonOf('[]'))).toBeUndefined()
  })

  it('returns texts the pattern accepts', () => {
    for (const source of ['a*4.+hi', '[0-9]+', 'x[a-c]*y+', '...']) {
      const compiled = compileRegex(source)
      const witness = findWitness(compiled.automaton)

      expect(witness).toBeDefined()
      if (witness !== undefined) {
        expect(isFullMatch(witness, compiled), `witness ${witness} for ${source}`).toBe(true)
      }
    }
  })
})
