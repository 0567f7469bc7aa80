/**
 * Multi-pattern builder: a trie with failure links (Aho-Corasick).
 * @packageDocumentation
 */

import type { State, BuildOptions } from '../types'
import { ROOT } from '../types'
import { Automaton, completeTransitions, failureOf, followFailures } from '../automaton'
import { log } from '../log'
import { resolveBuildOptions, resolveAlphabet } from './options'
import { assertValidPatterns } from './validator'

/**
 * Result of building a multi-pattern automaton.
 * @public
 */
export interface TrieBuild {
  readonly automaton: Automaton
  /** `failFunctions[s - 1]` is the failure target of state s */
  readonly failFunctions: readonly State[]
  /**
   * The prefix each state spells. Accepting states map to the pattern
   * they complete; the root maps to the empty string.
   */
  readonly patternMap: ReadonlyMap<State, string>
  readonly patterns: readonly string[]
  readonly precompute: boolean
}

/**
 * Build the multi-pattern automaton of a pattern set.
 *
 * 1. Insert every pattern into a trie of success edges rooted at state 0.
 * 2. Compute failure links breadth-first over the trie edges.
 * 3. With `precompute`, complete every state's row as soon as its failure
 *    link is known; breadth-first order guarantees the failure target's row
 *    is already complete.
 *
 * @param patterns - Non-empty list of non-empty patterns
 * @param options - Build options
 * @throws AutomatonError `EMPTY_PATTERN_SET`, `EMPTY_PATTERN` or `INVALID_SYMBOL`
 *
 * @public
 */
export function buildTrieAutomaton(patterns: readonly string[], options: BuildOptions = {}): TrieBuild {
  const resolved = resolveBuildOptions(options)
  assertValidPatterns(patterns, resolved.alphabet)

  const automaton = new Automaton(resolveAlphabet(resolved.alphabet, patterns), {
    maxStates: resolved.maxStates,
  })
  automaton.addState({ initial: true })

  const patternMap = new Map<State, string>([[ROOT, '']])
  for (const pattern of patterns) {
    insertPattern(automaton, patternMap, pattern)
  }

  if (resolved.precompute) {
    // The root never fails anywhere but to itself
    completeTransitions(automaton, [], ROOT)
  }

  const failFunctions = new Array<State>(automaton.stateCount - 1).fill(ROOT)
  for (const { from, symbol, to } of automaton.breadthFirstEdges('success')) {
    if (from !== ROOT) {
      failFunctions[to - 1] = followFailures(automaton, failFunctions, failureOf(failFunctions, from), symbol)
    }
    if (resolved.precompute) {
      completeTransitions(automaton, failFunctions, to)
    }
  }

  log.build.info(
    'trie automaton: %d patterns, %d states, %d symbols, precompute=%s',
    patterns.length,
    automaton.stateCount,
    automaton.alphabet.size,
    resolved.precompute,
  )

  return { automaton, failFunctions, patternMap, patterns: [...patterns], precompute: resolved.precompute }
}

/**
 * Add one pattern to the trie.
 *
 * Existing success edges are followed as far as they go; new states are
 * allocated for the rest. The final state is marked accepting even when it
 * already existed (the pattern is a prefix of one inserted earlier).
 */
function insertPattern(automaton: Automaton, patternMap: Map<State, string>, pattern: string): void {
  let state = ROOT
  let depth = 0

  while (depth < pattern.length) {
    const next = automaton.successTarget(state, pattern[depth])
    if (next === undefined) break
    state = next
    depth++
  }

  for (; depth < pattern.length; depth++) {
    const added = automaton.addState()
    automaton.addTransition(state, pattern[depth], added, 'success')
    patternMap.set(added, pattern.slice(0, depth + 1))
    state = added
  }

  automaton.setAccepting(state, true)
}

/**
 * Compute failure links of an existing trie from its success edges alone.
 *
 * Used when a persisted multi-pattern record carries no fail functions.
 *
 * @public
 */
export function computeTrieFailures(automaton: Automaton): State[] {
  const failFunctions = new Array<State>(Math.max(automaton.stateCount - 1, 0)).fill(ROOT)
  for (const { from, symbol, to } of automaton.breadthFirstEdges('success')) {
    if (from === ROOT) continue
    let candidate = failureOf(failFunctions, from)
    let target = automaton.successTarget(candidate, symbol)
    while (target === undefined && candidate !== ROOT) {
      candidate = failureOf(failFunctions, candidate)
      target = automaton.successTarget(candidate, symbol)
    }
    failFunctions[to - 1] = target ?? ROOT
  }
  return failFunctions
}
