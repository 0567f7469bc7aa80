/**
 * Walking text through an automaton.
 * @packageDocumentation
 */

import type { State } from '../types'
import { AutomatonError, ROOT } from '../types'
import { type Automaton, resolveFailureTarget } from '../automaton'
import { log } from '../log'

/**
 * An accepting state reached after reading `text[index]`.
 * @public
 */
export interface AcceptingStep {
  readonly index: number
  readonly state: State
}

/**
 * Walk `text` from the root, yielding every step that lands on an accepting
 * state.
 *
 * - Precomputed: every in-alphabet step must have a transition; a missing one
 *   throws `AUTOMATON_INVARIANT_VIOLATION`.
 * - On the fly: a missing transition is resolved through the fail chain and
 *   cached on the automaton as a failure edge, so each (state, symbol) pair is
 *   resolved at most once per automaton.
 *
 * Symbols outside the alphabet cannot occur in any pattern, so they send the
 * walk back to the root without caching anything. They are not rejected as
 * `INVALID_SYMBOL`: text is searched as given, and only automaton
 * construction holds symbols to the alphabet.
 *
 * The generator is lazy and single-pass; each call starts a fresh walk.
 *
 * @public
 */
export function* walkAccepting(
  automaton: Automaton,
  failFunctions: readonly State[],
  text: string,
  precompute: boolean,
): Generator<AcceptingStep, void, undefined> {
  let state: State = ROOT

  for (let index = 0; index < text.length; index++) {
    const symbol = text[index]

    if (!automaton.alphabet.has(symbol)) {
      state = ROOT
    } else if (precompute) {
      state = stepPrecomputed(automaton, state, symbol)
    } else {
      state = stepOnTheFly(automaton, failFunctions, state, symbol)
    }

    if (automaton.isAccepting(state)) {
      yield { index, state }
    }
  }
}

function stepPrecomputed(automaton: Automaton, state: State, symbol: string): State {
  const next = automaton.transition(state, symbol)
  if (next === undefined) {
    throw new AutomatonError(
      'AUTOMATON_INVARIANT_VIOLATION',
      `Precomputed automaton has no transition from ${state} on ${JSON.stringify(symbol)}`,
      { state, symbol },
    )
  }
  return next
}

function stepOnTheFly(automaton: Automaton, failFunctions: readonly State[], state: State, symbol: string): State {
  const next = automaton.transition(state, symbol)
  if (next !== undefined) {
    return next
  }

  const target = resolveFailureTarget(automaton, failFunctions, state, symbol)
  automaton.addTransition(state, symbol, target, 'failure')
  log.search.debug('cached failure edge %d --%s--> %d', state, symbol, target)
  return target
}
