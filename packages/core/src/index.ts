/**
 * String Automata
 *
 * Finite-automaton string matchers: a single-pattern matcher built on the
 * prefix function (KMP) and a multi-pattern matcher built on a trie with
 * failure links (Aho-Corasick). Both search lazily, with transitions either
 * precomputed or resolved and cached on the fly.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Automaton types
  State,
  TransitionKind,
  Edge,
  TransitionEntry,
  StateFlags,
  AutomatonOptions,
  // Record types
  AutomatonRecord,
  AlgorithmName,
  SinglePatternRecord,
  MultiPatternRecord,
  MatcherRecord,
  // Matcher types
  PatternMatch,
  PatternSearcher,
  BuildOptions,
  ResolvedBuildOptions,
  MatcherOptions,
  LoadOptions,
  // Error types
  AutomatonErrorCode,
  AutomatonErrorContext,
  PatternError,
} from './types'
export { ROOT, AutomatonError, AutomatonLimitError } from './types'

// =============================================================================
// Automaton
// =============================================================================

export { Automaton, DEFAULT_MAX_STATES } from './automaton'
export { failureOf, followFailures, resolveFailureTarget, completeTransitions } from './automaton'
export { stateDepths, statePrefixes, findFailureDepthViolation, findTransitionDepthViolation } from './automaton'
export { toRecord, fromRecord } from './automaton'

// =============================================================================
// Building
// =============================================================================

export {
  buildPrefixFunctionAutomaton,
  computePrefixFailures,
  buildTrieAutomaton,
  computeTrieFailures,
  type PrefixFunctionBuild,
  type TrieBuild,
} from './build'
export { DEFAULT_BUILD_OPTIONS, resolveBuildOptions, resolveAlphabet } from './build'
export { validatePatterns, isValidPatternSet } from './build'

// =============================================================================
// Matching
// =============================================================================

export { SinglePatternMatcher, MultiPatternMatcher, type Matcher } from './match'
export { createMatcher, searchWithPatterns, algorithmOf, DEFAULT_ALGORITHM } from './match'

// =============================================================================
// Persistence
// =============================================================================

export { saveMatcher, stringifyMatcher, loadMatcher, parseMatcher } from './persist'

// =============================================================================
// Diagnostics
// =============================================================================

export { namespaces as logNamespaces } from './log'
