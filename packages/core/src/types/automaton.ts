// =============================================================================
// STATES AND SYMBOLS
// =============================================================================

/**
 * A state identifier.
 *
 * States are dense, zero-based integers allocated in order. Once any state
 * exists, state 0 is the root of every automaton produced by the builders.
 *
 * @public
 */
export type State = number

/**
 * The root state of every matcher automaton.
 * @public
 */
export const ROOT: State = 0

/**
 * Classification of a transition.
 *
 * - `success`: part of the pattern-derived structure (a trie or prefix edge)
 * - `failure`: a fallback edge added while completing the automaton, either
 *   at build time or cached during an on-the-fly search
 *
 * @public
 */
export type TransitionKind = 'success' | 'failure'

/**
 * A single directed edge of the transition table.
 * @public
 */
export interface Edge {
  readonly from: State
  readonly symbol: string
  readonly to: State
}

/**
 * A transition target together with its kind, as stored in the table.
 * @public
 */
export interface TransitionEntry {
  /** Target state ID */
  readonly target: State
  readonly kind: TransitionKind
}

/**
 * Flags for a newly allocated state.
 * @public
 */
export interface StateFlags {
  /** Mark the state as accepting (a pattern completes here) */
  readonly accepting?: boolean

  /** Make the state the automaton's initial state. Allowed once. */
  readonly initial?: boolean
}

/**
 * Construction limits for an automaton.
 * @public
 */
export interface AutomatonOptions {
  /**
   * Maximum number of states before `addState` throws.
   * @defaultValue 1000000
   */
  readonly maxStates?: number
}
