/**
 * The transition table shared by both matchers.
 * @packageDocumentation
 */

import type { State, TransitionKind, Edge, TransitionEntry, StateFlags, AutomatonOptions } from '../types'
import { AutomatonError, AutomatonLimitError } from '../types'

/**
 * Default maximum number of states an automaton may allocate.
 *
 * @public
 */
export const DEFAULT_MAX_STATES = 1_000_000

/**
 * A deterministic automaton over a fixed alphabet.
 *
 * States are dense integers held in an append-only arena; each state owns a
 * symbol-indexed row of transitions tagged `success` or `failure`. Failure
 * edges are ordinary entries in the same table, so the graph never needs
 * object references between states.
 *
 * The table only ever grows. Builders add states and edges; an on-the-fly
 * search adds cached failure edges. An instance must therefore not be shared
 * by concurrent on-the-fly searches.
 *
 * @public
 */
export class Automaton {
  /** Symbols the automaton is defined over */
  readonly alphabet: ReadonlySet<string>

  /** Maximum number of states */
  readonly maxStates: number

  private last: State | undefined = undefined
  private initial: State | undefined = undefined
  private readonly accepting = new Set<State>()
  private readonly rows = new Map<State, Map<string, TransitionEntry>>()

  constructor(alphabet: Iterable<string>, options: AutomatonOptions = {}) {
    this.alphabet = new Set(alphabet)
    this.maxStates = options.maxStates ?? DEFAULT_MAX_STATES
  }

  /** Highest allocated state, or undefined before the first `addState` */
  get lastState(): State | undefined {
    return this.last
  }

  /** Number of allocated states */
  get stateCount(): number {
    return this.last === undefined ? 0 : this.last + 1
  }

  get initialState(): State | undefined {
    return this.initial
  }

  get acceptingStates(): ReadonlySet<State> {
    return this.accepting
  }

  /**
   * Allocate the next state.
   *
   * @throws AutomatonError `DUPLICATE_INITIAL_STATE` if an initial state exists
   * @throws AutomatonLimitError if the state limit would be exceeded
   */
  addState(flags: StateFlags = {}): State {
    if (flags.initial && this.initial !== undefined) {
      throw new AutomatonError(
        'DUPLICATE_INITIAL_STATE',
        `Automaton already has initial state ${this.initial}`,
        { state: this.initial },
      )
    }
    const state = this.stateCount
    if (state >= this.maxStates) {
      throw new AutomatonLimitError(
        `Automaton exceeded limit of ${this.maxStates} states. ` +
          `Use fewer or shorter patterns, or raise the maxStates limit.`,
        this.maxStates,
        state + 1,
      )
    }

    this.last = state
    if (flags.initial) {
      this.initial = state
    }
    if (flags.accepting) {
      this.accepting.add(state)
    }
    return state
  }

  /**
   * Add a transition for (from, symbol).
   *
   * @throws AutomatonError `INVALID_STATE_REFERENCE`, `INVALID_SYMBOL` or `DUPLICATE_TRANSITION`
   */
  addTransition(from: State, symbol: string, to: State, kind: TransitionKind = 'success'): void {
    this.assertState(from)
    this.assertState(to)
    if (!this.alphabet.has(symbol)) {
      throw new AutomatonError('INVALID_SYMBOL', `Symbol ${JSON.stringify(symbol)} is not in the alphabet`, {
        state: from,
        symbol,
      })
    }

    let row = this.rows.get(from)
    if (row === undefined) {
      row = new Map()
      this.rows.set(from, row)
    }
    if (row.has(symbol)) {
      throw new AutomatonError(
        'DUPLICATE_TRANSITION',
        `Transition from ${from} on ${JSON.stringify(symbol)} already exists`,
        { state: from, symbol },
      )
    }
    row.set(symbol, { target: to, kind })
  }

  /**
   * Target of the transition on (from, symbol), or undefined when absent.
   * Never throws.
   */
  transition(from: State, symbol: string): State | undefined {
    return this.rows.get(from)?.get(symbol)?.target
  }

  transitionKind(from: State, symbol: string): TransitionKind | undefined {
    return this.rows.get(from)?.get(symbol)?.kind
  }

  hasTransition(from: State, symbol: string): boolean {
    return this.transition(from, symbol) !== undefined
  }

  /**
   * Target of the success edge on (from, symbol), ignoring failure edges.
   */
  successTarget(from: State, symbol: string): State | undefined {
    const entry = this.rows.get(from)?.get(symbol)
    return entry?.kind === 'success' ? entry.target : undefined
  }

  /**
   * Outgoing transitions of a state, in insertion order.
   */
  outgoing(state: State): ReadonlyMap<string, TransitionEntry> {
    return this.rows.get(state) ?? new Map()
  }

  /**
   * @throws AutomatonError `INVALID_STATE_REFERENCE` for an unallocated state
   */
  isAccepting(state: State): boolean {
    this.assertState(state)
    return this.accepting.has(state)
  }

  /**
   * @throws AutomatonError `INVALID_STATE_REFERENCE` for an unallocated state
   */
  setAccepting(state: State, accepting: boolean): void {
    this.assertState(state)
    if (accepting) {
      this.accepting.add(state)
    } else {
      this.accepting.delete(state)
    }
  }

  /**
   * Whether every state has a transition for every alphabet symbol.
   */
  isComplete(): boolean {
    for (let state = 0; state < this.stateCount; state++) {
      const row = this.rows.get(state)
      if ((row?.size ?? 0) < this.alphabet.size) {
        return false
      }
      for (const symbol of this.alphabet) {
        if (!row?.has(symbol)) return false
      }
    }
    return true
  }

  /**
   * Breadth-first walk over edges reachable from the initial state.
   *
   * Starts with the initial state's edges to other states (self-loops on the
   * root are skipped) and yields each distinct edge once. A state's outgoing
   * edges are queued only after the edge leading to it has been yielded, so a
   * consumer sees every edge of depth d before any edge of depth d + 1.
   *
   * With `kind`, only edges of that kind are followed. The builders pass
   * `'success'` so that failure edges added during the walk stay out of it.
   *
   * @throws AutomatonError `MISSING_INITIAL_STATE` if there is no initial state
   */
  *breadthFirstEdges(kind?: TransitionKind): Generator<Edge, void, undefined> {
    const root = this.initial
    if (root === undefined) {
      throw new AutomatonError('MISSING_INITIAL_STATE', 'Automaton has no initial state')
    }

    const queue: Edge[] = []
    const visited = new Set<string>()
    const enqueue = (from: State, skipSelfLoops: boolean): void => {
      for (const [symbol, entry] of this.outgoing(from)) {
        if (kind !== undefined && entry.kind !== kind) continue
        if (skipSelfLoops && entry.target === from) continue
        // (from, symbol) identifies an edge since rows hold one entry per symbol
        const key = `${from}\u0000${symbol}`
        if (visited.has(key)) continue
        visited.add(key)
        queue.push({ from, symbol, to: entry.target })
      }
    }

    enqueue(root, true)
    for (let head = 0; head < queue.length; head++) {
      const edge = queue[head]
      yield edge
      enqueue(edge.to, false)
    }
  }

  private assertState(state: State): void {
    if (this.last === undefined || !Number.isInteger(state) || state < 0 || state > this.last) {
      throw new AutomatonError('INVALID_STATE_REFERENCE', `State ${state} does not exist`, { state })
    }
  }
}
