import { describe, it, expect } from 'vitest'

import { parsePattern } from './parser'
import { validatePattern, isValidPattern } from './validator'

describe('validatePattern', () => {
  it('returns empty array for valid patterns', () => {
    const valid = ['', 'abc', 'a*b', 'a+', '.', '[a-z0-9]+', '[]', '[z-a]', 'x[.*]y']

    for (const src of valid) {
      const errors = validatePattern(parsePattern(src))
      expect(errors, `Expected no errors for ${src}`).toEqual([])
    }
  })

  it('includes parsing errors', () => {
    const errors = validatePattern(parsePattern('[abc'))

    expect(errors.some((e) => e.code === 'UNCLOSED_BRACKET')).toBe(true)
  })

  it('parses a pattern string before validating', () => {
    expect(validatePattern('a]').map((e) => e.code)).toEqual(['UNMATCHED_BRACKET'])
    expect(validatePattern('+').map((e) => e.code)).toEqual(['DANGLING_QUANTIFIER'])
  })
})

describe('isValidPattern', () => {
  it('returns true for valid patterns', () => {
    expect(isValidPattern(parsePattern('a*4.+hi'))).toBe(true)
    expect(isValidPattern('[a-z]')).toBe(true)
  })

  it('returns false for invalid patterns', () => {
    expect(isValidPattern(parsePattern('[abc'))).toBe(false)
    expect(isValidPattern('*')).toBe(false)
    expect(isValidPattern('a]')).toBe(false)
  })
})
