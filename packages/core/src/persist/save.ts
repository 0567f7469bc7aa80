/**
 * Saving matchers to persisted records.
 * @packageDocumentation
 */

import type { MatcherRecord } from '../types'
import { toRecord } from '../automaton'
import type { Matcher } from '../match'

/**
 * Produce the persisted record of a matcher.
 *
 * The automaton goes under `dfa`, wrapped in the algorithm envelope. An
 * on-the-fly matcher that has already searched saves its cached failure
 * edges too.
 *
 * @public
 */
export function saveMatcher(matcher: Matcher): MatcherRecord {
  switch (matcher.kind) {
    case 'single-pattern':
      return {
        algorithm: 'kmp',
        pattern: matcher.pattern,
        dfa: toRecord(matcher.automaton),
        fail_functions: [...matcher.failFunctions],
      }
    case 'multi-pattern':
      return {
        algorithm: 'aho-corasick',
        patterns: [...matcher.patterns],
        dfa: toRecord(matcher.automaton),
        fail_functions: [...matcher.failFunctions],
        pattern_map: Object.fromEntries([...matcher.patternMap].map(([state, prefix]) => [String(state), prefix])),
      }
  }
}

/**
 * Serialize a matcher to JSON text.
 *
 * @public
 */
export function stringifyMatcher(matcher: Matcher): string {
  return JSON.stringify(saveMatcher(matcher), null, 2)
}
