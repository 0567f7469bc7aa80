/**
 * Searching text with built automata.
 * @packageDocumentation
 */

export { SinglePatternMatcher } from './single-pattern-matcher'
export { MultiPatternMatcher } from './multi-pattern-matcher'
export { createMatcher, searchWithPatterns, algorithmOf, DEFAULT_ALGORITHM, type Matcher } from './matcher'
export { walkAccepting, type AcceptingStep } from './walk'
