/**
 * The closed set of matchers and helpers to build them.
 * @packageDocumentation
 */

import type { MatcherOptions, PatternMatch, AlgorithmName } from '../types'
import { AutomatonError } from '../types'
import { log } from '../log'
import { SinglePatternMatcher } from './single-pattern-matcher'
import { MultiPatternMatcher } from './multi-pattern-matcher'

/**
 * Either matcher. Discriminate on `kind`.
 * @public
 */
export type Matcher = SinglePatternMatcher | MultiPatternMatcher

/**
 * Algorithm used when none is requested.
 * @public
 */
export const DEFAULT_ALGORITHM: AlgorithmName = 'aho-corasick'

/**
 * Build a matcher for a pattern set.
 *
 * `'kmp'` handles a single pattern; given several it uses the first and
 * logs a warning. `'aho-corasick'` handles any non-empty set.
 *
 * @param patterns - Patterns to match
 * @param options - Algorithm and build options
 * @returns A matcher ready to search
 * @throws AutomatonError for an invalid pattern set
 *
 * @public
 */
export function createMatcher(patterns: readonly string[], options: MatcherOptions = {}): Matcher {
  const algorithm = options.algorithm ?? DEFAULT_ALGORITHM

  if (algorithm === 'kmp') {
    const [pattern] = patterns
    if (pattern === undefined) {
      throw new AutomatonError('EMPTY_PATTERN_SET', 'No patterns to match')
    }
    if (patterns.length > 1) {
      log.build.warn('kmp matches a single pattern; using %j and ignoring %d others', pattern, patterns.length - 1)
    }
    return SinglePatternMatcher.build(pattern, options)
  }
  return MultiPatternMatcher.build(patterns, options)
}

/**
 * Build a matcher and collect every match of `text` in one call.
 *
 * @public
 */
export function searchWithPatterns(
  text: string,
  patterns: readonly string[],
  options: MatcherOptions = {},
): PatternMatch[] {
  return createMatcher(patterns, options).findAll(text)
}

/**
 * Persisted algorithm tag of a matcher.
 * @public
 */
export function algorithmOf(matcher: Matcher): AlgorithmName {
  switch (matcher.kind) {
    case 'single-pattern':
      return 'kmp'
    case 'multi-pattern':
      return 'aho-corasick'
  }
}
