import type { State, TransitionKind } from './automaton'

// =============================================================================
// PERSISTED AUTOMATON
// =============================================================================

/**
 * Flat, JSON-compatible form of an automaton.
 *
 * Field names follow the persisted wire format, hence snake case.
 *
 * @public
 */
export interface AutomatonRecord {
  /** Highest allocated state (state count is this + 1), or null when empty */
  readonly states: State | null

  /** The alphabet, unordered */
  readonly alphabet: readonly string[]

  /** State (as a string key) to symbol to destination state */
  readonly transitions: Readonly<Record<string, Readonly<Record<string, State>>>>

  /** State (as a string key) to symbol to transition kind */
  readonly transition_kinds: Readonly<Record<string, Readonly<Record<string, TransitionKind>>>>

  readonly initial_state: State | null

  readonly accepting_states: readonly State[]
}

// =============================================================================
// MATCHER ENVELOPES
// =============================================================================

/**
 * Algorithm tags used in persisted matcher records.
 * @public
 */
export type AlgorithmName = 'kmp' | 'aho-corasick'

/**
 * Persisted single-pattern (prefix-function) matcher.
 * @public
 */
export interface SinglePatternRecord {
  readonly algorithm: 'kmp'
  readonly pattern: string
  readonly dfa: AutomatonRecord
  readonly fail_functions: readonly State[]
}

/**
 * Persisted multi-pattern (trie with failure links) matcher.
 * @public
 */
export interface MultiPatternRecord {
  readonly algorithm: 'aho-corasick'
  readonly patterns: readonly string[]
  readonly dfa: AutomatonRecord
  readonly fail_functions: readonly State[]
  /** State (as a string key) to the prefix that state spells */
  readonly pattern_map: Readonly<Record<string, string>>
}

/**
 * Any persisted matcher.
 * @public
 */
export type MatcherRecord = SinglePatternRecord | MultiPatternRecord
