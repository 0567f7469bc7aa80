import type { State } from './automaton'

/**
 * Error codes raised by automaton construction, search and loading.
 * @public
 */
export type AutomatonErrorCode =
  | 'EMPTY_PATTERN_SET' // no patterns given to the multi-pattern builder
  | 'EMPTY_PATTERN' // a pattern is the empty string
  | 'DUPLICATE_INITIAL_STATE' // a second state asked to be initial
  | 'INVALID_STATE_REFERENCE' // state id outside the allocated range
  | 'INVALID_SYMBOL' // symbol outside the alphabet
  | 'DUPLICATE_TRANSITION' // (state, symbol) already has a transition
  | 'MISSING_INITIAL_STATE' // traversal of an automaton without a root
  | 'AUTOMATON_INVARIANT_VIOLATION' // precomputed search hit a missing transition
  | 'MALFORMED_RECORD' // persisted record failed validation
  | 'STATE_LIMIT' // automaton grew past its configured limit

/**
 * A pattern validation problem, reported without throwing.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: AutomatonErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Index of the offending pattern in the input list */
  readonly index?: number

  /** Character position inside the offending pattern */
  readonly position?: number
}

/**
 * Context attached to an {@link AutomatonError}.
 * @public
 */
export interface AutomatonErrorContext {
  readonly state?: State
  readonly symbol?: string
  readonly cause?: unknown
}

/**
 * Error thrown for every failure of the automaton engine.
 *
 * All failures are synchronous and raised at the point of violation.
 * `AUTOMATON_INVARIANT_VIOLATION` signals an internal inconsistency rather
 * than a usage error and should not be retried.
 *
 * @public
 */
export class AutomatonError extends Error {
  /** Error classification code */
  readonly code: AutomatonErrorCode

  /** The state involved, when there is one */
  readonly state?: State

  /** The symbol involved, when there is one */
  readonly symbol?: string

  constructor(code: AutomatonErrorCode, message: string, context: AutomatonErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause })
    this.name = 'AutomatonError'
    this.code = code
    this.state = context.state
    this.symbol = context.symbol
  }
}

/**
 * Error thrown when an automaton would exceed its configured state limit.
 *
 * Large pattern sets allocate one state per distinct prefix, so the limit
 * bounds memory for untrusted input.
 *
 * @public
 */
export class AutomatonLimitError extends AutomatonError {
  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(message: string, limit: number, actual: number) {
    super('STATE_LIMIT', message)
    this.name = 'AutomatonLimitError'
    this.limit = limit
    this.actual = actual
  }
}
