import type { AlgorithmName } from './record'

/**
 * One match reported by a search.
 * @public
 */
export interface PatternMatch {
  /** Index in the text where the matched pattern starts */
  readonly position: number

  /** The matched pattern */
  readonly pattern: string
}

/**
 * The capability both matchers share.
 * @public
 */
export interface PatternSearcher {
  /**
   * Lazily walk `text`, yielding matches in order of their end position.
   * Each call starts a fresh walk; stop consuming to stop searching.
   */
  search(text: string): Generator<PatternMatch, void, undefined>

  /** Every match of `text`, collected eagerly. */
  findAll(text: string): PatternMatch[]
}

/**
 * Options for building an automaton from patterns.
 * @public
 */
export interface BuildOptions {
  /**
   * Fill in every (state, symbol) transition during construction.
   * When false, failure chains are resolved and cached while searching.
   * @defaultValue true
   */
  readonly precompute?: boolean

  /**
   * Symbols the automaton is defined over. Defaults to the symbols of the
   * patterns, in order of first appearance.
   */
  readonly alphabet?: string | Iterable<string>

  /**
   * Maximum number of automaton states.
   * @defaultValue 1000000
   */
  readonly maxStates?: number
}

/**
 * Build options with every default applied.
 * @public
 */
export interface ResolvedBuildOptions {
  readonly precompute: boolean
  readonly alphabet: ReadonlySet<string> | undefined
  readonly maxStates: number
}

/**
 * Options for choosing and building a matcher.
 * @public
 */
export interface MatcherOptions extends BuildOptions {
  /** @defaultValue 'aho-corasick' */
  readonly algorithm?: AlgorithmName
}

/**
 * Options for loading a persisted matcher.
 * @public
 */
export interface LoadOptions {
  /**
   * Search with precomputed transitions. Defaults to whether the loaded
   * automaton is complete.
   */
  readonly precompute?: boolean
}
