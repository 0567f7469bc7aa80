/**
 * Multi-pattern matching over a trie automaton with failure links.
 * @packageDocumentation
 */

import type { State, BuildOptions, PatternMatch, PatternSearcher } from '../types'
import { AutomatonError } from '../types'
import type { Automaton } from '../automaton'
import { buildTrieAutomaton, type TrieBuild } from '../build'
import { walkAccepting } from './walk'

/**
 * Finds occurrences of a set of patterns in one pass.
 *
 * Each step reports at most one pattern: the one recorded for the state the
 * walk lands on. A shorter pattern that is a proper suffix of it and ends at
 * the same index is not reported for that step.
 *
 * In on-the-fly mode each search caches failure edges on the owned
 * automaton; give concurrent searches their own matcher.
 *
 * @public
 */
export class MultiPatternMatcher implements PatternSearcher {
  readonly kind = 'multi-pattern'

  readonly automaton: Automaton
  readonly failFunctions: readonly State[]
  readonly patternMap: ReadonlyMap<State, string>
  readonly patterns: readonly string[]

  /** Search with precomputed transitions rather than on-the-fly caching */
  readonly precompute: boolean

  constructor(parts: TrieBuild) {
    this.automaton = parts.automaton
    this.failFunctions = parts.failFunctions
    this.patternMap = parts.patternMap
    this.patterns = parts.patterns
    this.precompute = parts.precompute
  }

  static build(patterns: readonly string[], options: BuildOptions = {}): MultiPatternMatcher {
    return new MultiPatternMatcher(buildTrieAutomaton(patterns, options))
  }

  *search(text: string): Generator<PatternMatch, void, undefined> {
    for (const { index, state } of walkAccepting(this.automaton, this.failFunctions, text, this.precompute)) {
      const pattern = this.patternMap.get(state)
      if (pattern === undefined) {
        throw new AutomatonError('AUTOMATON_INVARIANT_VIOLATION', `Accepting state ${state} has no pattern`, {
          state,
        })
      }
      yield { position: index - pattern.length + 1, pattern }
    }
  }

  findAll(text: string): PatternMatch[] {
    return [...this.search(text)]
  }
}
