import { describe, it, expect } from 'vitest'
import { buildTrieAutomaton, computeTrieFailures } from './trie'
import { AutomatonLimitError } from '../types'

// ABBAB takes states 1-5, BABBA takes states 6-10
const OVERLAPPING = ['ABBAB', 'BABBA']
const OVERLAPPING_FAILURES = [0, 6, 6, 7, 8, 0, 1, 2, 3, 4]

describe('buildTrieAutomaton', () => {
  describe('trie', () => {
    it('allocates one state per distinct prefix', () => {
      const { automaton } = buildTrieAutomaton(['AB', 'AC', 'B'])

      expect(automaton.stateCount).toBe(5)
      expect(automaton.transition(0, 'A')).toBe(1)
      expect(automaton.transition(1, 'B')).toBe(2)
      expect(automaton.transition(1, 'C')).toBe(3)
      expect(automaton.transition(0, 'B')).toBe(4)
      expect([...automaton.acceptingStates]).toEqual([2, 3, 4])
    })

    it('maps every state to the prefix it spells', () => {
      const { patternMap } = buildTrieAutomaton(['AB', 'AC', 'B'])

      expect([...patternMap.entries()]).toEqual([
        [0, ''],
        [1, 'A'],
        [2, 'AB'],
        [3, 'AC'],
        [4, 'B'],
      ])
    })

    it('accepts a pattern that is a prefix of an earlier one', () => {
      const { automaton, patternMap } = buildTrieAutomaton(['ABC', 'AB'])

      expect(automaton.stateCount).toBe(4)
      expect([...automaton.acceptingStates].sort()).toEqual([2, 3])
      expect(patternMap.get(2)).toBe('AB')
      expect(patternMap.get(3)).toBe('ABC')
    })

    it('keeps duplicate patterns as one path', () => {
      const { automaton, patterns } = buildTrieAutomaton(['AB', 'AB'])

      expect(automaton.stateCount).toBe(3)
      expect(patterns).toEqual(['AB', 'AB'])
    })

    it('derives the alphabet from the patterns in order of appearance', () => {
      const { automaton } = buildTrieAutomaton(['CA', 'BA'])

      expect([...automaton.alphabet]).toEqual(['C', 'A', 'B'])
    })
  })

  describe('failure links', () => {
    it('links each state to its longest proper suffix in the trie', () => {
      expect(buildTrieAutomaton(OVERLAPPING).failFunctions).toEqual(OVERLAPPING_FAILURES)
    })

    it('gives on-the-fly builds the same links', () => {
      expect(buildTrieAutomaton(OVERLAPPING, { precompute: false }).failFunctions).toEqual(OVERLAPPING_FAILURES)
    })

    it('follows the chain past states with no matching edge', () => {
      // "ABC": "BC" is not a prefix, "C" is
      const { failFunctions } = buildTrieAutomaton(['ABC', 'C', 'BX'], { precompute: false })

      // States: A=1 AB=2 ABC=3 C=4 B=5 BX=6
      expect(failFunctions).toEqual([0, 5, 4, 0, 0, 0])
    })

    it('is recomputed from success edges alone', () => {
      const precomputed = buildTrieAutomaton(OVERLAPPING)
      const onTheFly = buildTrieAutomaton(OVERLAPPING, { precompute: false })

      expect(computeTrieFailures(precomputed.automaton)).toEqual(OVERLAPPING_FAILURES)
      expect(computeTrieFailures(onTheFly.automaton)).toEqual(OVERLAPPING_FAILURES)
    })
  })

  describe('precompute', () => {
    it('completes every state', () => {
      const { automaton } = buildTrieAutomaton(OVERLAPPING)

      expect(automaton.isComplete()).toBe(true)
      expect(automaton.transition(0, 'A')).toBe(1)
      expect(automaton.transition(0, 'B')).toBe(6)
      expect(automaton.transition(2, 'A')).toBe(7)
      expect(automaton.transition(5, 'A')).toBe(7)
      expect(automaton.transition(5, 'B')).toBe(9)
      expect(automaton.transition(10, 'B')).toBe(5)
      expect(automaton.transition(10, 'A')).toBe(1)
    })

    it('completes depth-one states through the root row', () => {
      const { automaton } = buildTrieAutomaton(['AB', 'C'])

      expect(automaton.transition(1, 'C')).toBe(3)
      expect(automaton.transition(1, 'A')).toBe(1)
      expect(automaton.transition(3, 'B')).toBe(0)
    })

    it('sends root misses back to the root', () => {
      const { automaton } = buildTrieAutomaton(['A'], { alphabet: 'ACTG' })

      expect(automaton.transition(0, 'C')).toBe(0)
      expect(automaton.transitionKind(0, 'C')).toBe('failure')
    })

    it('leaves only success edges when disabled', () => {
      const { automaton } = buildTrieAutomaton(OVERLAPPING, { precompute: false })

      expect(automaton.isComplete()).toBe(false)
      expect(automaton.transition(0, 'C')).toBeUndefined()
      expect(automaton.transition(5, 'A')).toBeUndefined()
    })
  })

  describe('errors', () => {
    it('rejects an empty pattern list', () => {
      expect(() => buildTrieAutomaton([])).toThrow(expect.objectContaining({ code: 'EMPTY_PATTERN_SET' }))
    })

    it('rejects an empty pattern', () => {
      expect(() => buildTrieAutomaton(['A', ''])).toThrow(expect.objectContaining({ code: 'EMPTY_PATTERN' }))
    })

    it('rejects symbols outside an explicit alphabet', () => {
      expect(() => buildTrieAutomaton(['AB', 'AZ'], { alphabet: 'AB' })).toThrow(
        expect.objectContaining({ code: 'INVALID_SYMBOL', symbol: 'Z' }),
      )
    })

    it('raises the limit error for oversized pattern sets', () => {
      expect(() => buildTrieAutomaton(['AB', 'CD'], { maxStates: 4 })).toThrow(AutomatonLimitError)
      expect(() => buildTrieAutomaton(['AB', 'CD'], { maxStates: 5 })).not.toThrow()
    })
  })
})
