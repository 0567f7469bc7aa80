/**
 * Failure-chain resolution and transition completion.
 * @packageDocumentation
 */

import type { State } from '../types'
import { ROOT } from '../types'
import type { Automaton } from './automaton'

/**
 * Fail-function value of a state.
 *
 * `failFunctions[state - 1]` holds the failure target of `state`; the root
 * has no entry and fails to itself.
 *
 * @public
 */
export function failureOf(failFunctions: readonly State[], state: State): State {
  return state === ROOT ? ROOT : failFunctions[state - 1]
}

/**
 * Follow the fail chain from `start` until some state has a transition on
 * `symbol`, returning that transition's target, or the root once the chain
 * reaches it without finding one.
 *
 * Any transition counts, so cached and precomputed failure edges shortcut
 * the walk.
 *
 * @public
 */
export function followFailures(
  automaton: Automaton,
  failFunctions: readonly State[],
  start: State,
  symbol: string,
): State {
  let candidate = start
  for (;;) {
    const target = automaton.transition(candidate, symbol)
    if (target !== undefined) {
      return target
    }
    if (candidate === ROOT) {
      return ROOT
    }
    candidate = failureOf(failFunctions, candidate)
  }
}

/**
 * Where a state moves on a symbol it has no transition for.
 *
 * @public
 */
export function resolveFailureTarget(
  automaton: Automaton,
  failFunctions: readonly State[],
  state: State,
  symbol: string,
): State {
  if (state === ROOT) {
    return ROOT
  }
  return followFailures(automaton, failFunctions, failureOf(failFunctions, state), symbol)
}

/**
 * Fill every missing (state, symbol) transition with a failure edge.
 *
 * States must be completed in an order where a state's failure target is
 * already complete (increasing state order for a prefix chain, breadth-first
 * for a trie). The chain walk then stops at the first step.
 *
 * @public
 */
export function completeTransitions(automaton: Automaton, failFunctions: readonly State[], state: State): void {
  for (const symbol of automaton.alphabet) {
    if (automaton.hasTransition(state, symbol)) continue
    automaton.addTransition(state, symbol, resolveFailureTarget(automaton, failFunctions, state, symbol), 'failure')
  }
}
