/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compileRegex } from './compiler'
export { buildAutomaton, getMinLength, getMaxLength, isUnbounded } from './automaton-builder'
export { buildQuickRejectFilter, applyQuickReject } from './quick-reject'
