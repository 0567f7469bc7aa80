import { describe, it, expect } from 'vitest'
import { DEFAULT_BUILD_OPTIONS, resolveBuildOptions, resolveAlphabet } from './options'
import { DEFAULT_MAX_STATES } from '../automaton'

describe('resolveBuildOptions', () => {
  it('applies defaults', () => {
    expect(resolveBuildOptions()).toEqual(DEFAULT_BUILD_OPTIONS)
    expect(DEFAULT_BUILD_OPTIONS).toEqual({ precompute: true, alphabet: undefined, maxStates: DEFAULT_MAX_STATES })
  })

  it('keeps explicit values', () => {
    expect(resolveBuildOptions({ precompute: false, maxStates: 10 })).toEqual({
      precompute: false,
      alphabet: undefined,
      maxStates: 10,
    })
  })

  it('splits a string alphabet into symbols', () => {
    expect(resolveBuildOptions({ alphabet: 'ACTGA' }).alphabet).toEqual(new Set(['A', 'C', 'T', 'G']))
  })

  it('takes any iterable of single symbols', () => {
    expect(resolveBuildOptions({ alphabet: new Set(['x', 'y']) }).alphabet).toEqual(new Set(['x', 'y']))
    expect(resolveBuildOptions({ alphabet: ['a', 'b', 'a'] }).alphabet).toEqual(new Set(['a', 'b']))
  })

  it('rejects symbols that are not single characters', () => {
    expect(() => resolveBuildOptions({ alphabet: ['a', 'bc'] })).toThrow(
      expect.objectContaining({ code: 'INVALID_SYMBOL', symbol: 'bc' }),
    )
    expect(() => resolveBuildOptions({ alphabet: [''] })).toThrow(
      expect.objectContaining({ code: 'INVALID_SYMBOL', symbol: '' }),
    )
  })
})

describe('resolveAlphabet', () => {
  it('prefers the explicit alphabet', () => {
    expect(resolveAlphabet(new Set('XYZ'), ['AB'])).toEqual(new Set(['X', 'Y', 'Z']))
  })

  it('collects pattern symbols in order of first appearance', () => {
    expect([...resolveAlphabet(undefined, ['BAN', 'NAB', 'CAB'])]).toEqual(['B', 'A', 'N', 'C'])
  })

  it('returns a copy of the explicit alphabet', () => {
    const explicit = new Set('AB')
    const resolved = resolveAlphabet(explicit, [])
    resolved.add('C')

    expect(explicit.has('C')).toBe(false)
  })
})
