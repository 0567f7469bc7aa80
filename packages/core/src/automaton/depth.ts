/**
 * Depth analysis along success edges.
 * @packageDocumentation
 */

import type { State, Edge } from '../types'
import type { Automaton } from './automaton'
import { failureOf } from './completion'

/**
 * Distance from the root of every state reachable through success edges.
 *
 * @public
 */
export function stateDepths(automaton: Automaton): Map<State, number> {
  const depths = new Map<State, number>()
  const root = automaton.initialState
  if (root === undefined) {
    return depths
  }

  depths.set(root, 0)
  for (const edge of automaton.breadthFirstEdges('success')) {
    if (depths.has(edge.to)) continue
    depths.set(edge.to, (depths.get(edge.from) ?? 0) + 1)
  }
  return depths
}

/**
 * The string each reachable state spells, read off the success edges from the
 * root. A state entered by several success edges keeps the first one found
 * breadth-first.
 *
 * @public
 */
export function statePrefixes(automaton: Automaton): Map<State, string> {
  const prefixes = new Map<State, string>()
  const root = automaton.initialState
  if (root === undefined) {
    return prefixes
  }

  prefixes.set(root, '')
  for (const edge of automaton.breadthFirstEdges('success')) {
    if (prefixes.has(edge.to)) continue
    prefixes.set(edge.to, (prefixes.get(edge.from) ?? '') + edge.symbol)
  }
  return prefixes
}

/**
 * First state whose failure target is not strictly shallower than itself,
 * or undefined when the fail functions satisfy the depth invariant.
 *
 * @public
 */
export function findFailureDepthViolation(automaton: Automaton, failFunctions: readonly State[]): State | undefined {
  const depths = stateDepths(automaton)

  for (let state = 1; state < automaton.stateCount; state++) {
    const depth = depths.get(state)
    const target = failureOf(failFunctions, state)
    const targetDepth = depths.get(target)
    if (depth === undefined || targetDepth === undefined || targetDepth >= depth) {
      return state
    }
  }
  return undefined
}

/**
 * First stored transition that breaks the depth invariant, or undefined when
 * every transition keeps it.
 *
 * A success edge must lead exactly one level deeper and be the only success
 * edge into its target. A failure edge may lead at most one level deeper.
 * Both ends of every edge must be reachable through success edges.
 *
 * @public
 */
export function findTransitionDepthViolation(automaton: Automaton): Edge | undefined {
  const depths = stateDepths(automaton)
  const entered = new Set<State>()

  for (let from = 0; from < automaton.stateCount; from++) {
    const fromDepth = depths.get(from)
    for (const [symbol, { target: to, kind }] of automaton.outgoing(from)) {
      const toDepth = depths.get(to)
      const broken =
        fromDepth === undefined ||
        toDepth === undefined ||
        (kind === 'success' ? toDepth !== fromDepth + 1 || entered.has(to) : toDepth > fromDepth + 1)
      if (broken) {
        return { from, symbol, to }
      }
      if (kind === 'success') entered.add(to)
    }
  }
  return undefined
}
