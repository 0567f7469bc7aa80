/**
 * The transition-table abstraction and the helpers both builders share.
 * @packageDocumentation
 */

export { Automaton, DEFAULT_MAX_STATES } from './automaton'
export { failureOf, followFailures, resolveFailureTarget, completeTransitions } from './completion'
export { stateDepths, statePrefixes, findFailureDepthViolation, findTransitionDepthViolation } from './depth'
export { toRecord, fromRecord, automatonRecordSchema } from './record'
