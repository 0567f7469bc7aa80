/**
 * Build configuration and alphabet resolution.
 * @packageDocumentation
 */

import type { BuildOptions, ResolvedBuildOptions } from '../types'
import { AutomatonError } from '../types'
import { DEFAULT_MAX_STATES } from '../automaton'

/**
 * Defaults applied to every build.
 *
 * @public
 */
export const DEFAULT_BUILD_OPTIONS: ResolvedBuildOptions = {
  precompute: true,
  alphabet: undefined,
  maxStates: DEFAULT_MAX_STATES,
}

/**
 * Merge user options with {@link DEFAULT_BUILD_OPTIONS}.
 *
 * A string alphabet contributes each of its UTF-16 code units; any other
 * iterable must yield single code units.
 *
 * @throws AutomatonError `INVALID_SYMBOL` for a multi-unit or empty symbol
 * @public
 */
export function resolveBuildOptions(options: BuildOptions = {}): ResolvedBuildOptions {
  return {
    precompute: options.precompute ?? DEFAULT_BUILD_OPTIONS.precompute,
    alphabet: options.alphabet === undefined ? DEFAULT_BUILD_OPTIONS.alphabet : toSymbolSet(options.alphabet),
    maxStates: options.maxStates ?? DEFAULT_BUILD_OPTIONS.maxStates,
  }
}

function toSymbolSet(alphabet: string | Iterable<string>): ReadonlySet<string> {
  if (typeof alphabet === 'string') {
    return new Set(alphabet.split(''))
  }
  const symbols = new Set<string>()
  for (const symbol of alphabet) {
    if (symbol.length !== 1) {
      throw new AutomatonError(
        'INVALID_SYMBOL',
        `Alphabet symbols must be single characters, got ${JSON.stringify(symbol)}`,
        { symbol },
      )
    }
    symbols.add(symbol)
  }
  return symbols
}

/**
 * The alphabet to build over: the explicit one if given, otherwise the
 * symbols of the patterns in order of first appearance.
 *
 * @public
 */
export function resolveAlphabet(explicit: ReadonlySet<string> | undefined, patterns: readonly string[]): Set<string> {
  if (explicit !== undefined) {
    return new Set(explicit)
  }
  const alphabet = new Set<string>()
  for (const pattern of patterns) {
    for (let i = 0; i < pattern.length; i++) {
      alphabet.add(pattern[i])
    }
  }
  return alphabet
}
