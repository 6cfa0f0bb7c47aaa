/**
 * Pattern compiler - compiles a pattern string to its matching form.
 * @packageDocumentation
 */

import registerDebug from 'debug'

import type { RegexPattern, CompiledRegex, CompileOptions } from '../types'
import { RegexSyntaxError } from '../types'
import { parsePattern } from '../parse'
import { describeAutomaton } from '../automaton/describe'
import { buildAutomaton, getMinLength, getMaxLength, isUnbounded } from './automaton-builder'
import { buildQuickRejectFilter } from './quick-reject'

const debugCompile = registerDebug('restricted-regex:compile')

/**
 * Compile a pattern to an efficient matching form.
 *
 * The compiled pattern includes:
 * - Original source and AST for debugging/analysis
 * - Quick-reject filters for fast text elimination
 * - Regex automaton for simulation
 * - Length constraints for optimization
 *
 * @param pattern - Pattern source string, or an already parsed AST
 * @param options - Compile limits
 * @returns Compiled pattern ready for matching
 * @throws RegexSyntaxError if the pattern is malformed
 * @throws AutomatonLimitError if a character class exceeds the configured limit
 *
 * @public
 */
export function compileRegex(pattern: string | RegexPattern, options: CompileOptions = {}): CompiledRegex {
  const ast = typeof pattern === 'string' ? parsePattern(pattern) : pattern

  if (ast.errors !== undefined) {
    const [first, ...rest] = ast.errors
    if (first !== undefined) {
      debugCompile('rejected %o: %d error(s)', ast.source, ast.errors.length)
      throw new RegexSyntaxError(ast.source, [first, ...rest])
    }
  }

  const automaton = buildAutomaton(ast, options)
  if (debugCompile.enabled) {
    debugCompile('compiled %o to %d states\n%s', ast.source, automaton.states.length, describeAutomaton(automaton))
  }

  return Object.freeze({
    source: ast.source,
    ast,
    quickReject: Object.freeze(buildQuickRejectFilter(ast)),
    automaton,
    isUnbounded: isUnbounded(ast),
    minLength: getMinLength(ast),
    maxLength: getMaxLength(ast),
  })
}
