/**
 * Single-pattern builder: the prefix-function (KMP) automaton.
 * @packageDocumentation
 */

import type { State, BuildOptions } from '../types'
import { ROOT } from '../types'
import { Automaton, completeTransitions } from '../automaton'
import { log } from '../log'
import { resolveBuildOptions, resolveAlphabet } from './options'
import { assertValidPatterns } from './validator'

/**
 * Result of building a single-pattern automaton.
 * @public
 */
export interface PrefixFunctionBuild {
  readonly automaton: Automaton
  /** `failFunctions[k - 1]` is the failure target of state k */
  readonly failFunctions: readonly State[]
  readonly pattern: string
  readonly precompute: boolean
}

/**
 * Build the prefix-function automaton of a pattern.
 *
 * State k stands for "the last k symbols read equal the first k symbols of
 * the pattern"; state n (the pattern length) is the only accepting state.
 * Success edges form the chain `k --pattern[k]--> k + 1`.
 *
 * With `precompute`, every missing transition is filled with a failure edge
 * so that search never consults the fail functions.
 *
 * @param pattern - Non-empty pattern
 * @param options - Build options
 * @throws AutomatonError `EMPTY_PATTERN`, or `INVALID_SYMBOL` when the pattern
 *   leaves an explicit alphabet
 *
 * @public
 */
export function buildPrefixFunctionAutomaton(pattern: string, options: BuildOptions = {}): PrefixFunctionBuild {
  const resolved = resolveBuildOptions(options)
  assertValidPatterns([pattern], resolved.alphabet)

  const automaton = new Automaton(resolveAlphabet(resolved.alphabet, [pattern]), {
    maxStates: resolved.maxStates,
  })
  automaton.addState({ initial: true })
  for (let k = 0; k < pattern.length; k++) {
    const next = automaton.addState({ accepting: k === pattern.length - 1 })
    automaton.addTransition(k, pattern[k], next, 'success')
  }

  const failFunctions = computePrefixFailures(automaton, pattern)

  if (resolved.precompute) {
    // Increasing order: a state's failure target is always a lower state
    for (let state = ROOT; state <= pattern.length; state++) {
      completeTransitions(automaton, failFunctions, state)
    }
  }

  log.build.info(
    'prefix-function automaton: %d states, %d symbols, precompute=%s',
    automaton.stateCount,
    automaton.alphabet.size,
    resolved.precompute,
  )

  return { automaton, failFunctions, pattern, precompute: resolved.precompute }
}

/**
 * Compute the prefix function of a pattern over its success chain.
 *
 * The failure target of state k + 1 is the longest proper border of
 * `pattern[0..k]`: starting from the failure target of state k, follow the
 * fail chain until some state has a success edge on `pattern[k]`.
 *
 * Only success edges are consulted, so the result is the same whether or not
 * the automaton has been completed.
 *
 * @returns One entry per non-root state
 * @public
 */
export function computePrefixFailures(automaton: Automaton, pattern: string): State[] {
  const failFunctions = new Array<State>(pattern.length).fill(ROOT)

  for (let k = 1; k < pattern.length; k++) {
    const symbol = pattern[k]
    let candidate = failFunctions[k - 1]
    while (candidate !== ROOT && automaton.successTarget(candidate, symbol) === undefined) {
      candidate = failFunctions[candidate - 1]
    }
    failFunctions[k] = automaton.successTarget(candidate, symbol) ?? ROOT
  }

  return failFunctions
}
