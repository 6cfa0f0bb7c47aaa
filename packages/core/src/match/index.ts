/**
 * Text matching utilities.
 * @packageDocumentation
 */

export { isFullMatch, checkString } from './matcher'

export { startAttempt, advance, isAccepting, type MatchAttempt } from './simulation'

export { traceMatch, type MatchTrace, type MatchStep } from './trace'

export { stateAccepts } from './state-matcher'
