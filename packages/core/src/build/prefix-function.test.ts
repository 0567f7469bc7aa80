import { describe, it, expect } from 'vitest'
import { buildPrefixFunctionAutomaton, computePrefixFailures } from './prefix-function'
import { AutomatonError, AutomatonLimitError } from '../types'

describe('buildPrefixFunctionAutomaton', () => {
  describe('structure', () => {
    it('builds the success chain of the pattern', () => {
      const { automaton, pattern } = buildPrefixFunctionAutomaton('ABC', { precompute: false })

      expect(pattern).toBe('ABC')
      expect(automaton.stateCount).toBe(4)
      expect(automaton.initialState).toBe(0)
      expect([...automaton.acceptingStates]).toEqual([3])
      expect(automaton.transition(0, 'A')).toBe(1)
      expect(automaton.transition(1, 'B')).toBe(2)
      expect(automaton.transition(2, 'C')).toBe(3)
    })

    it('derives the alphabet from the pattern in order of appearance', () => {
      const { automaton } = buildPrefixFunctionAutomaton('CABBA')

      expect([...automaton.alphabet]).toEqual(['C', 'A', 'B'])
    })

    it('uses an explicit alphabet', () => {
      const { automaton } = buildPrefixFunctionAutomaton('A', { alphabet: 'ACTG' })

      expect([...automaton.alphabet]).toEqual(['A', 'C', 'T', 'G'])
      expect(automaton.transition(0, 'T')).toBe(0)
      expect(automaton.transition(1, 'A')).toBe(1)
      expect(automaton.transition(1, 'G')).toBe(0)
    })
  })

  describe('prefix function', () => {
    it.each([
      ['ABCDE', [0, 0, 0, 0, 0]],
      ['AAAA', [0, 1, 2, 3]],
      ['ABAB', [0, 0, 1, 2]],
      ['AABAACAABAA', [0, 1, 0, 1, 2, 0, 1, 2, 3, 4, 5]],
      ['AAACAAAAAC', [0, 1, 2, 0, 1, 2, 3, 3, 3, 4]],
      ['AAABAAA', [0, 1, 2, 0, 1, 2, 3]],
    ])('computes the borders of %s', (pattern, expected) => {
      expect(buildPrefixFunctionAutomaton(pattern, { precompute: true }).failFunctions).toEqual(expected)
      expect(buildPrefixFunctionAutomaton(pattern, { precompute: false }).failFunctions).toEqual(expected)
    })

    it('is recomputed from the success chain alone', () => {
      const { automaton, failFunctions } = buildPrefixFunctionAutomaton('AABAACAABAA')

      expect(computePrefixFailures(automaton, 'AABAACAABAA')).toEqual(failFunctions)
    })
  })

  describe('precompute', () => {
    it('completes every state', () => {
      const { automaton, precompute } = buildPrefixFunctionAutomaton('ABAB')

      expect(precompute).toBe(true)
      expect(automaton.isComplete()).toBe(true)
      expect(automaton.transition(4, 'A')).toBe(3)
      expect(automaton.transition(4, 'B')).toBe(0)
      expect(automaton.transitionKind(4, 'A')).toBe('failure')
    })

    it('loops the last state of a run back on itself', () => {
      const { automaton } = buildPrefixFunctionAutomaton('AAAA')

      expect(automaton.transition(4, 'A')).toBe(4)
    })

    it('leaves only success edges when disabled', () => {
      const { automaton, precompute } = buildPrefixFunctionAutomaton('ABAB', { precompute: false })

      expect(precompute).toBe(false)
      expect(automaton.isComplete()).toBe(false)
      for (let state = 0; state < automaton.stateCount; state++) {
        for (const entry of automaton.outgoing(state).values()) {
          expect(entry.kind).toBe('success')
        }
      }
    })
  })

  describe('errors', () => {
    it('rejects the empty pattern', () => {
      expect(() => buildPrefixFunctionAutomaton('')).toThrow(expect.objectContaining({ code: 'EMPTY_PATTERN' }))
    })

    it('rejects symbols outside an explicit alphabet', () => {
      expect(() => buildPrefixFunctionAutomaton('AX', { alphabet: 'AB' })).toThrow(
        expect.objectContaining({ code: 'INVALID_SYMBOL', symbol: 'X' }),
      )
    })

    it('raises the limit error for oversized patterns', () => {
      expect(() => buildPrefixFunctionAutomaton('ABC', { maxStates: 3 })).toThrow(AutomatonLimitError)
      expect(() => buildPrefixFunctionAutomaton('ABC', { maxStates: 4 })).not.toThrow()
    })

    it('throws AutomatonError instances', () => {
      expect(() => buildPrefixFunctionAutomaton('')).toThrow(AutomatonError)
    })
  })
})
