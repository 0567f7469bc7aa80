import { describe, it, expect } from 'vitest'
import { Automaton } from './automaton'
import { stateDepths, statePrefixes, findFailureDepthViolation, findTransitionDepthViolation } from './depth'

// Trie of ["AB", "C"]: 0 -A-> 1 -B-> 2, 0 -C-> 3
function trie(): Automaton {
  const automaton = new Automaton('ABC')
  automaton.addState({ initial: true })
  automaton.addState()
  automaton.addState({ accepting: true })
  automaton.addState({ accepting: true })
  automaton.addTransition(0, 'A', 1)
  automaton.addTransition(1, 'B', 2)
  automaton.addTransition(0, 'C', 3)
  return automaton
}

describe('stateDepths', () => {
  it('measures depth along success edges', () => {
    const depths = stateDepths(trie())

    expect([...depths.entries()].sort(([a], [b]) => a - b)).toEqual([
      [0, 0],
      [1, 1],
      [2, 2],
      [3, 1],
    ])
  })

  it('ignores failure edges', () => {
    const automaton = trie()
    automaton.addTransition(3, 'A', 2, 'failure')

    expect(stateDepths(automaton).get(2)).toBe(2)
  })

  it('is empty without an initial state', () => {
    const automaton = new Automaton('A')
    automaton.addState()

    expect(stateDepths(automaton).size).toBe(0)
  })
})

describe('statePrefixes', () => {
  it('spells each state along success edges', () => {
    const prefixes = statePrefixes(trie())

    expect([...prefixes.entries()].sort(([a], [b]) => a - b)).toEqual([
      [0, ''],
      [1, 'A'],
      [2, 'AB'],
      [3, 'C'],
    ])
  })

  it('ignores failure edges', () => {
    const automaton = trie()
    automaton.addTransition(3, 'B', 2, 'failure')

    expect(statePrefixes(automaton).get(2)).toBe('AB')
  })
})

describe('findFailureDepthViolation', () => {
  it('accepts failure targets that are shallower', () => {
    expect(findFailureDepthViolation(trie(), [0, 0, 0])).toBeUndefined()
    expect(findFailureDepthViolation(trie(), [0, 3, 0])).toBeUndefined()
  })

  it('reports a state failing to a state of equal depth', () => {
    expect(findFailureDepthViolation(trie(), [3, 0, 0])).toBe(1)
  })

  it('reports a state failing to itself', () => {
    expect(findFailureDepthViolation(trie(), [0, 2, 0])).toBe(2)
  })

  it('reports a state the root cannot reach', () => {
    const automaton = trie()
    automaton.addState()

    expect(findFailureDepthViolation(automaton, [0, 0, 0, 0])).toBe(4)
  })
})

describe('findTransitionDepthViolation', () => {
  it('accepts success edges one level down and failure edges no deeper', () => {
    const automaton = trie()
    automaton.addTransition(0, 'B', 0, 'failure')
    automaton.addTransition(3, 'A', 1, 'failure')
    automaton.addTransition(2, 'C', 3, 'failure')

    expect(findTransitionDepthViolation(automaton)).toBeUndefined()
  })

  it('reports a failure edge that skips a level', () => {
    const automaton = trie()
    automaton.addTransition(0, 'B', 2, 'failure')

    expect(findTransitionDepthViolation(automaton)).toEqual({ from: 0, symbol: 'B', to: 2 })
  })

  it('reports a success edge that does not lead one level down', () => {
    const automaton = trie()
    automaton.addTransition(2, 'C', 3)

    expect(findTransitionDepthViolation(automaton)).toEqual({ from: 2, symbol: 'C', to: 3 })
  })

  it('reports a second success edge into the same state', () => {
    const automaton = trie()
    automaton.addTransition(3, 'B', 2)

    expect(findTransitionDepthViolation(automaton)).toEqual({ from: 3, symbol: 'B', to: 2 })
  })

  it('reports an edge leaving a state the root cannot reach', () => {
    const automaton = trie()
    automaton.addState()
    automaton.addTransition(4, 'A', 0, 'failure')

    expect(findTransitionDepthViolation(automaton)).toEqual({ from: 4, symbol: 'A', to: 0 })
  })
})
