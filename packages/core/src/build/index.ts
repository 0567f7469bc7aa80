/**
 * Automaton construction from patterns.
 * @packageDocumentation
 */

export { buildPrefixFunctionAutomaton, computePrefixFailures, type PrefixFunctionBuild } from './prefix-function'
export { buildTrieAutomaton, computeTrieFailures, type TrieBuild } from './trie'
export { DEFAULT_BUILD_OPTIONS, resolveBuildOptions, resolveAlphabet } from './options'
export { validatePatterns, isValidPatternSet, assertValidPatterns } from './validator'
