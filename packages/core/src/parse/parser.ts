/**
 * Pattern parser - converts regex pattern strings to AST.
 * @packageDocumentation
 */

import type { RegexPattern, Term, Atom, CharClassAtom, CharRange, PatternError } from '../types'

/**
 * Parser state for tracking position and errors.
 */
interface ParserState {
  source: string
  position: number
  errors: PatternError[]
}

/**
 * Parse a pattern string into an AST.
 *
 * Never throws: problems are collected in `errors` so that callers can
 * report all of them at once.
 *
 * @param source - The pattern string to parse
 * @returns Parsed RegexPattern with AST and any errors
 *
 * @public
 */
export function parsePattern(source: string): RegexPattern {
  const state: ParserState = {
    source,
    position: 0,
    errors: [],
  }

  const terms: Term[] = []

  while (state.position < source.length) {
    const char = source[state.position]

    if (char === '*' || char === '+') {
      // A quantifier is only consumed here when nothing precedes it;
      // quantifiers after an atom are taken by parseQuantifier.
      state.errors.push({
        code: 'DANGLING_QUANTIFIER',
        message: `Quantifier '${char}' has no preceding atom`,
        position: state.position,
        length: 1,
      })
      state.position++
      continue
    }

    const atom = parseAtom(state)
    if (atom === null) {
      continue
    }

    const quantifier = parseQuantifier(state)
    terms.push(quantifier === undefined ? { atom } : { atom, quantifier })
  }

  return {
    source,
    terms,
    errors: state.errors.length > 0 ? state.errors : undefined,
  }
}

/**
 * Parse the atom at the current position and advance past it.
 * Returns null (after recording an error) when no atom starts here.
 */
function parseAtom(state: ParserState): Atom | null {
  const position = state.position
  const char = state.source[position]

  switch (char) {
    case '[':
      return parseCharClass(state)

    case ']':
      state.errors.push({
        code: 'UNMATCHED_BRACKET',
        message: "Closing ']' has no matching '['",
        position,
        length: 1,
      })
      state.position++
      return null

    case '.':
      state.position++
      return { type: 'wildcard', position }

    default:
      state.position++
      return { type: 'literal', char, position }
  }
}

/**
 * Consume a postfix quantifier if one follows the atom just parsed.
 */
function parseQuantifier(state: ParserState): Term['quantifier'] {
  const char = state.source[state.position]
  if (char === '*' || char === '+') {
    state.position++
    return char
  }
  return undefined
}

/**
 * Parse a character class [abc] or [a-z0-9].
 *
 * The class ends at the first `]`. Inside it every character is literal;
 * `X-Y` with a character on both sides is a range.
 */
function parseCharClass(state: ParserState): CharClassAtom | null {
  const { source } = state
  const startIndex = state.position
  const closeIndex = source.indexOf(']', startIndex + 1)

  if (closeIndex === -1) {
    state.errors.push({
      code: 'UNCLOSED_BRACKET',
      message: 'Unclosed character class',
      position: startIndex,
      length: source.length - startIndex,
    })
    state.position = source.length
    return null
  }

  const definition = source.slice(startIndex + 1, closeIndex)
  const ranges: CharRange[] = []
  let chars = ''
  let i = 0

  while (i < definition.length) {
    const char = definition[i]

    // Check for range
    if (i + 2 < definition.length && definition[i + 1] === '-') {
      ranges.push({ start: char, end: definition[i + 2] })
      i += 3
    } else {
      chars += char
      i++
    }
  }

  state.position = closeIndex + 1

  return {
    type: 'charclass',
    definition,
    ranges,
    chars,
    position: startIndex,
  }
}
