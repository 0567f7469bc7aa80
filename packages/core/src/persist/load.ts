/**
 * Loading matchers from persisted records.
 * @packageDocumentation
 */

import type { z } from 'zod'
import type { State, LoadOptions } from '../types'
import { ROOT } from '../types'
import {
  type Automaton,
  fromRecord,
  statePrefixes,
  findFailureDepthViolation,
  findTransitionDepthViolation,
} from '../automaton'
import { malformedRecord, describeIssues, parseStateKey } from '../automaton/record'
import { computePrefixFailures, computeTrieFailures } from '../build'
import { SinglePatternMatcher, MultiPatternMatcher, type Matcher } from '../match'
import { log } from '../log'
import {
  algorithmTagSchema,
  singlePatternRecordSchema,
  multiPatternRecordSchema,
  legacySinglePatternSchema,
  legacyMultiPatternSchema,
  type SinglePatternInput,
  type MultiPatternInput,
} from './schema'

/**
 * Rebuild a matcher from a persisted record.
 *
 * The `algorithm` tag picks the matcher. Records without one fall back to
 * inferring it from the presence of `pattern_map`; that inference is kept
 * for older files only and logs a deprecation warning.
 *
 * The automaton, fail functions and pattern map are cross-checked so that a
 * loaded matcher cannot walk outside its table.
 *
 * @param data - Parsed JSON of a record
 * @param options - Search mode; defaults to precomputed iff the automaton is complete
 * @throws AutomatonError `MALFORMED_RECORD` on any inconsistency
 *
 * @public
 */
export function loadMatcher(data: unknown, options: LoadOptions = {}): Matcher {
  const tag = parseWith(algorithmTagSchema, data)

  switch (tag.algorithm) {
    case 'kmp':
      return loadSinglePattern(parseWith(singlePatternRecordSchema, data), options)
    case 'aho-corasick':
      return loadMultiPattern(parseWith(multiPatternRecordSchema, data), options)
    case undefined:
      break
  }

  // Deprecated: infer the algorithm from the shape of the record
  const multi = typeof data === 'object' && data !== null && 'pattern_map' in data
  log.persist.warn(
    'record has no algorithm tag; inferred %s from %s pattern_map (deprecated, save again to add the tag)',
    multi ? 'aho-corasick' : 'kmp',
    multi ? 'its' : 'a missing',
  )
  return multi
    ? loadMultiPattern(parseWith(legacyMultiPatternSchema, data), options)
    : loadSinglePattern(parseWith(legacySinglePatternSchema, data), options)
}

/**
 * Parse matcher JSON text.
 *
 * @throws AutomatonError `MALFORMED_RECORD` for invalid JSON or an invalid record
 * @public
 */
export function parseMatcher(json: string, options: LoadOptions = {}): Matcher {
  let data: unknown
  try {
    data = JSON.parse(json)
  } catch (error) {
    throw malformedRecord('not valid JSON', error)
  }
  return loadMatcher(data, options)
}

function parseWith<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    throw malformedRecord(describeIssues(parsed.error), parsed.error)
  }
  return parsed.data
}

function loadSinglePattern(record: SinglePatternInput, options: LoadOptions): SinglePatternMatcher {
  const automaton = loadRootedAutomaton(record.dfa)
  const pattern = record.pattern ?? successChain(automaton)
  checkPrefixChain(automaton, pattern)

  const failFunctions = record.fail_functions ?? computePrefixFailures(automaton, pattern)
  const checked = checkFailFunctions(automaton, failFunctions)
  const precompute = options.precompute ?? automaton.isComplete()

  log.persist.info('loaded kmp matcher: %d states, precompute=%s', automaton.stateCount, precompute)
  return new SinglePatternMatcher({ automaton, failFunctions: checked, pattern, precompute })
}

function loadMultiPattern(record: MultiPatternInput, options: LoadOptions): MultiPatternMatcher {
  const automaton = loadRootedAutomaton(record.dfa)
  const patternMap = checkPatternMap(automaton, record.pattern_map)
  const patterns =
    record.patterns ??
    [...automaton.acceptingStates].sort((a, b) => a - b).flatMap((state) => patternMap.get(state) ?? [])

  const failFunctions = record.fail_functions ?? computeTrieFailures(automaton)
  const checked = checkFailFunctions(automaton, failFunctions)
  const precompute = options.precompute ?? automaton.isComplete()

  log.persist.info(
    'loaded aho-corasick matcher: %d patterns, %d states, precompute=%s',
    patterns.length,
    automaton.stateCount,
    precompute,
  )
  return new MultiPatternMatcher({ automaton, failFunctions: checked, patternMap, patterns, precompute })
}

/**
 * Matchers walk from state 0, so it must exist and be initial. Every stored
 * transition must respect state depths, since match positions are derived
 * from them.
 */
function loadRootedAutomaton(dfa: unknown): Automaton {
  const automaton = fromRecord(dfa)
  if (automaton.stateCount === 0) {
    throw malformedRecord('dfa has no states')
  }
  if (automaton.initialState !== ROOT) {
    throw malformedRecord(`dfa initial_state must be ${ROOT}`)
  }
  const violation = findTransitionDepthViolation(automaton)
  if (violation !== undefined) {
    const { from, symbol, to } = violation
    throw malformedRecord(`dfa edge ${from} --${JSON.stringify(symbol)}--> ${to} breaks state depths`)
  }
  return automaton
}

/**
 * Recover the pattern of a prefix-function automaton by following the single
 * success edge out of each state.
 */
function successChain(automaton: Automaton): string {
  let pattern = ''
  let state: State = ROOT
  for (let step = 0; step < automaton.stateCount; step++) {
    const next = [...automaton.outgoing(state)].filter(([, entry]) => entry.kind === 'success')
    if (next.length === 0) break
    if (next.length > 1) {
      throw malformedRecord(`state ${state} has ${next.length} success edges in a single-pattern dfa`)
    }
    const [symbol, entry] = next[0]
    pattern += symbol
    state = entry.target
  }
  return pattern
}

/**
 * The automaton must be exactly the success chain of the pattern with only
 * its last state accepting.
 */
function checkPrefixChain(automaton: Automaton, pattern: string): void {
  if (pattern.length === 0) {
    throw malformedRecord('pattern is empty')
  }
  if (automaton.stateCount !== pattern.length + 1) {
    throw malformedRecord(`dfa has ${automaton.stateCount} states for a pattern of length ${pattern.length}`)
  }
  for (let k = 0; k < pattern.length; k++) {
    if (automaton.successTarget(k, pattern[k]) !== k + 1) {
      throw malformedRecord(`dfa has no success edge ${k} --${JSON.stringify(pattern[k])}--> ${k + 1}`)
    }
  }
  const accepting = [...automaton.acceptingStates]
  if (accepting.length !== 1 || accepting[0] !== pattern.length) {
    throw malformedRecord(`only state ${pattern.length} may be accepting`)
  }
}

/**
 * Every accepting state must map to the prefix it spells. Other entries are
 * bookkeeping: they are replaced by the spelled prefixes.
 */
function checkPatternMap(automaton: Automaton, raw: Readonly<Record<string, string>>): Map<State, string> {
  const prefixes = statePrefixes(automaton)

  for (const [key, entry] of Object.entries(raw)) {
    const state = parseStateKey(key, 'pattern_map')
    if (state >= automaton.stateCount) {
      throw malformedRecord(`pattern_map refers to unknown state ${state}`)
    }
    const prefix = prefixes.get(state)
    if (!automaton.acceptingStates.has(state) && entry !== prefix) {
      log.persist.debug('pattern_map entry for state %d is %j, using %j', state, entry, prefix)
    }
  }

  for (const state of automaton.acceptingStates) {
    const entry = raw[String(state)]
    const prefix = prefixes.get(state)
    if (entry === undefined) {
      throw malformedRecord(`accepting state ${state} has no pattern_map entry`)
    }
    if (prefix === undefined) {
      throw malformedRecord(`accepting state ${state} is unreachable`)
    }
    if (entry !== prefix) {
      throw malformedRecord(
        `pattern_map entry for accepting state ${state} is ${JSON.stringify(entry)}, ` +
          `but the state spells ${JSON.stringify(prefix)}`,
      )
    }
  }
  return prefixes
}

/**
 * Fail functions need one entry per non-root state, each strictly shallower
 * than its state. Longer arrays (one slot per state) are truncated.
 */
function checkFailFunctions(automaton: Automaton, failFunctions: readonly State[]): State[] {
  const expected = automaton.stateCount - 1
  if (failFunctions.length < expected) {
    throw malformedRecord(`fail_functions has ${failFunctions.length} entries, expected ${expected}`)
  }
  const checked = failFunctions.slice(0, expected)
  const violation = findFailureDepthViolation(automaton, checked)
  if (violation !== undefined) {
    throw malformedRecord(`fail_functions entry for state ${violation} is not shallower than the state`)
  }
  return checked
}
