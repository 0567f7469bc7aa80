/**
 * Conversion between automata and their flat persisted form.
 * @packageDocumentation
 */

import { z } from 'zod'
import type { State, TransitionKind, AutomatonOptions, AutomatonRecord } from '../types'
import { AutomatonError } from '../types'
import { Automaton } from './automaton'

const stateSchema = z.number().int().nonnegative()

/**
 * Schema of a persisted automaton.
 *
 * `states` may be omitted for an empty automaton.
 *
 * @public
 */
export const automatonRecordSchema = z.object({
  states: stateSchema.nullable().default(null),
  alphabet: z.array(z.string()),
  transitions: z.record(z.string(), z.record(z.string(), stateSchema)),
  transition_kinds: z.record(z.string(), z.record(z.string(), z.enum(['success', 'failure']))),
  initial_state: stateSchema.nullable(),
  accepting_states: z.array(stateSchema),
})

/**
 * Build an `AutomatonError` for a record that cannot be loaded.
 */
export function malformedRecord(message: string, cause?: unknown): AutomatonError {
  return new AutomatonError('MALFORMED_RECORD', `Malformed record: ${message}`, { cause })
}

/**
 * Describe the first zod issue as `path: message`.
 */
export function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0]
  if (issue === undefined) {
    return 'invalid value'
  }
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
  return `${path}: ${issue.message}`
}

/**
 * Serialize an automaton to a flat, JSON-compatible record.
 *
 * @public
 */
export function toRecord(automaton: Automaton): AutomatonRecord {
  const transitions: Record<string, Record<string, State>> = {}
  const kinds: Record<string, Record<string, TransitionKind>> = {}

  for (let state = 0; state < automaton.stateCount; state++) {
    const row = automaton.outgoing(state)
    if (row.size === 0) continue
    const targets: Record<string, State> = {}
    const rowKinds: Record<string, TransitionKind> = {}
    for (const [symbol, entry] of row) {
      targets[symbol] = entry.target
      rowKinds[symbol] = entry.kind
    }
    transitions[String(state)] = targets
    kinds[String(state)] = rowKinds
  }

  return {
    states: automaton.lastState ?? null,
    alphabet: [...automaton.alphabet],
    transitions,
    transition_kinds: kinds,
    initial_state: automaton.initialState ?? null,
    accepting_states: [...automaton.acceptingStates].sort((a, b) => a - b),
  }
}

/**
 * Rebuild an automaton from a persisted record.
 *
 * The record is validated structurally, then replayed through the regular
 * `addState` / `addTransition` API so every table invariant is checked.
 *
 * @throws AutomatonError `MALFORMED_RECORD` on any inconsistency
 * @public
 */
export function fromRecord(data: unknown, options: AutomatonOptions = {}): Automaton {
  const parsed = automatonRecordSchema.safeParse(data)
  if (!parsed.success) {
    throw malformedRecord(describeIssues(parsed.error), parsed.error)
  }
  const record = parsed.data
  const automaton = new Automaton(record.alphabet, options)
  const count = record.states === null ? 0 : record.states + 1

  if (record.initial_state !== null && record.initial_state >= count) {
    throw malformedRecord(`initial_state ${record.initial_state} is out of range`)
  }
  const accepting = new Set(record.accepting_states)
  for (const state of accepting) {
    if (state >= count) {
      throw malformedRecord(`accepting state ${state} is out of range`)
    }
  }

  try {
    for (let state = 0; state < count; state++) {
      automaton.addState({ initial: state === record.initial_state, accepting: accepting.has(state) })
    }

    for (const [key, row] of Object.entries(record.transitions)) {
      const from = parseStateKey(key, 'transitions')
      const rowKinds = record.transition_kinds[key]
      for (const [symbol, to] of Object.entries(row)) {
        const kind = rowKinds?.[symbol]
        if (kind === undefined) {
          throw malformedRecord(`transition_kinds has no entry for state ${key} on ${JSON.stringify(symbol)}`)
        }
        automaton.addTransition(from, symbol, to, kind)
      }
    }
  } catch (error) {
    if (error instanceof AutomatonError && error.code !== 'MALFORMED_RECORD') {
      throw malformedRecord(error.message, error)
    }
    throw error
  }

  for (const [key, rowKinds] of Object.entries(record.transition_kinds)) {
    for (const symbol of Object.keys(rowKinds)) {
      if (record.transitions[key]?.[symbol] === undefined) {
        throw malformedRecord(`transition_kinds entry for state ${key} on ${JSON.stringify(symbol)} has no transition`)
      }
    }
  }

  return automaton
}

/**
 * Parse a decimal state key of a persisted mapping.
 */
export function parseStateKey(key: string, field: string): State {
  if (!/^(0|[1-9]\d*)$/.test(key)) {
    throw malformedRecord(`${field} key ${JSON.stringify(key)} is not a state`)
  }
  return Number(key)
}
