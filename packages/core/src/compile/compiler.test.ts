import { describe, it, expect } from 'vitest'

import { parsePattern } from '../parse'
import { AutomatonLimitError, RegexSyntaxError } from '../types'
import { compileRegex } from './compiler'

describe('compileRegex', () => {
  it('compiles a pattern string', () => {
    const compiled = compileRegex('a+b')

    expect(compiled.source).toBe('a+b')
    expect(compiled.ast.terms).toHaveLength(2)
    expect(compiled.automaton.states).toHaveLength(5)
    expect(compiled.minLength).toBe(2)
    expect(compiled.maxLength).toBeUndefined()
    expect(compiled.isUnbounded).toBe(true)
    expect(compiled.quickReject).toEqual({ minLength: 2, maxLength: undefined, requiredPrefix: 'a' })
  })

  it('compiles an already parsed pattern', () => {
    const compiled = compileRegex(parsePattern('abc'))

    expect(compiled.source).toBe('abc')
    expect(compiled.maxLength).toBe(3)
    expect(compiled.isUnbounded).toBe(false)
  })

  it('freezes the compiled pattern', () => {
    const compiled = compileRegex('x*')

    expect(Object.isFrozen(compiled)).toBe(true)
    expect(Object.isFrozen(compiled.quickReject)).toBe(true)
    expect(Object.isFrozen(compiled.automaton)).toBe(true)
  })

  describe('malformed patterns', () => {
    it('rejects an unclosed character class', () => {
      expect(() => compileRegex('[abc')).toThrow(RegexSyntaxError)
      expect(() => compileRegex('[abc')).toThrow('Invalid pattern "[abc": Unclosed character class at position 0')
    })

    it('rejects a dangling quantifier', () => {
      try {
        compileRegex('*a')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(RegexSyntaxError)
        if (error instanceof RegexSyntaxError) {
          expect(error.code).toBe('DANGLING_QUANTIFIER')
          expect(error.source).toBe('*a')
          expect(error.errors).toHaveLength(1)
        }
      }
    })

    it('rejects a stray closing bracket', () => {
      expect(() => compileRegex('a]')).toThrow(RegexSyntaxError)
    })

    it('reports every error', () => {
      try {
        compileRegex('+]')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(RegexSyntaxError)
        if (error instanceof RegexSyntaxError) {
          expect(error.errors.map((e) => e.code)).toEqual(['DANGLING_QUANTIFIER', 'UNMATCHED_BRACKET'])
          expect(error.code).toBe('DANGLING_QUANTIFIER')
        }
      }
    })
  })

  describe('limits', () => {
    it('rejects a class larger than maxClassMembers', () => {
      try {
        compileRegex('x[a-z]', { maxClassMembers: 10 })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(AutomatonLimitError)
        if (error instanceof AutomatonLimitError) {
          expect(error.code).toBe('CLASS_SIZE_LIMIT')
          expect(error.limit).toBe(10)
          expect(error.actual).toBe(26)
        }
      }
    })

    it('counts single characters toward the limit', () => {
      expect(() => compileRegex('[abc]', { maxClassMembers: 2 })).toThrow(AutomatonLimitError)
      expect(() => compileRegex('[abc]', { maxClassMembers: 3 })).not.toThrow()
    })

    it('accepts the full code unit range by default', () => {
      expect(() => compileRegex('[\u0000-\uffff]')).not.toThrow()
    })
  })
})
