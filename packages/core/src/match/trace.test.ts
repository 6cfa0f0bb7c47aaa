import { describe, it, expect } from 'vitest'

import { compileRegex } from '../compile'
import { isFullMatch } from './matcher'
import { traceMatch } from './trace'

describe('traceMatch', () => {
  // a+: s0 start, s1 termination, s2 'a', s3 plus(s2)
  const pattern = compileRegex('a+')

  it('records the initial closure and every step', () => {
    expect(traceMatch('aa', pattern)).toEqual({
      matched: true,
      steps: [
        { index: -1, char: '', active: [0], firedLoops: [] },
        { index: 0, char: 'a', active: [1, 2, 3], firedLoops: [3] },
        { index: 1, char: 'a', active: [1, 2, 3], firedLoops: [3] },
      ],
    })
  })

  it('stops at the first empty active set', () => {
    expect(traceMatch('ba', pattern)).toEqual({
      matched: false,
      steps: [
        { index: -1, char: '', active: [0], firedLoops: [] },
        { index: 0, char: 'b', active: [], firedLoops: [] },
      ],
    })
  })

  it('does not carry fired loops between calls', () => {
    traceMatch('a', pattern)
    const second = traceMatch('b', pattern)

    expect(second.steps[1].firedLoops).toEqual([])
    expect(second.matched).toBe(false)
  })

  it('agrees with isFullMatch', () => {
    const mixed = compileRegex('a*4.+hi')

    for (const text of ['4uhi', 'aa4xxhi', '4hi', 'a4uh', '']) {
      expect(traceMatch(text, mixed).matched, text).toBe(isFullMatch(text, mixed))
    }
  })
})
