/**
 * Type definitions for the automaton engine.
 * @packageDocumentation
 */

// Automaton types
export type { State, TransitionKind, Edge, TransitionEntry, StateFlags, AutomatonOptions } from './automaton'
export { ROOT } from './automaton'

// Record types
export type {
  AutomatonRecord,
  AlgorithmName,
  SinglePatternRecord,
  MultiPatternRecord,
  MatcherRecord,
} from './record'

// Matcher types
export type {
  PatternMatch,
  PatternSearcher,
  BuildOptions,
  ResolvedBuildOptions,
  MatcherOptions,
  LoadOptions,
} from './matcher'

// Error types
export type { AutomatonErrorCode, AutomatonErrorContext, PatternError } from './errors'
export { AutomatonError, AutomatonLimitError } from './errors'
