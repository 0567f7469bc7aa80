/**
 * Single-pattern matching over a prefix-function automaton.
 * @packageDocumentation
 */

import type { State, BuildOptions, PatternMatch, PatternSearcher } from '../types'
import type { Automaton } from '../automaton'
import { buildPrefixFunctionAutomaton, type PrefixFunctionBuild } from '../build'
import { walkAccepting } from './walk'

/**
 * Finds every occurrence of one pattern, overlapping ones included.
 *
 * In on-the-fly mode each search caches failure edges on the owned
 * automaton; give concurrent searches their own matcher.
 *
 * @example
 * ```ts
 * const matcher = SinglePatternMatcher.build('AAAA')
 * matcher.findAll('AAAAAA') // positions 0, 1 and 2
 * ```
 *
 * @public
 */
export class SinglePatternMatcher implements PatternSearcher {
  readonly kind = 'single-pattern'

  readonly automaton: Automaton
  readonly failFunctions: readonly State[]
  readonly pattern: string

  /** Search with precomputed transitions rather than on-the-fly caching */
  readonly precompute: boolean

  constructor(parts: PrefixFunctionBuild) {
    this.automaton = parts.automaton
    this.failFunctions = parts.failFunctions
    this.pattern = parts.pattern
    this.precompute = parts.precompute
  }

  static build(pattern: string, options: BuildOptions = {}): SinglePatternMatcher {
    return new SinglePatternMatcher(buildPrefixFunctionAutomaton(pattern, options))
  }

  *search(text: string): Generator<PatternMatch, void, undefined> {
    const length = this.pattern.length
    for (const { index } of walkAccepting(this.automaton, this.failFunctions, text, this.precompute)) {
      yield { position: index - length + 1, pattern: this.pattern }
    }
  }

  findAll(text: string): PatternMatch[] {
    return [...this.search(text)]
  }
}
