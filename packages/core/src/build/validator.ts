/**
 * Pattern validation - checks a pattern set before any automaton is built.
 * @packageDocumentation
 */

import type { PatternError } from '../types'
import { AutomatonError } from '../types'

/**
 * Validate a pattern set against an optional explicit alphabet.
 *
 * Returns errors for:
 * - An empty pattern list
 * - Empty patterns
 * - Pattern symbols outside the explicit alphabet (first one per pattern)
 *
 * @param patterns - Patterns to check
 * @param alphabet - Explicit alphabet, if any
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePatterns(
  patterns: readonly string[],
  alphabet?: ReadonlySet<string>,
): readonly PatternError[] {
  const errors: PatternError[] = []

  if (patterns.length === 0) {
    errors.push({ code: 'EMPTY_PATTERN_SET', message: 'No patterns to match' })
    return errors
  }

  patterns.forEach((pattern, index) => {
    if (pattern.length === 0) {
      errors.push({ code: 'EMPTY_PATTERN', message: `Pattern ${index} is empty`, index })
      return
    }
    if (alphabet === undefined) return

    for (let position = 0; position < pattern.length; position++) {
      const symbol = pattern[position]
      if (!alphabet.has(symbol)) {
        errors.push({
          code: 'INVALID_SYMBOL',
          message: `Pattern ${index} uses ${JSON.stringify(symbol)}, which is not in the alphabet`,
          index,
          position,
        })
        break
      }
    }
  })

  return errors
}

/**
 * Check if a pattern set is valid (has no errors).
 *
 * @public
 */
export function isValidPatternSet(patterns: readonly string[], alphabet?: ReadonlySet<string>): boolean {
  return validatePatterns(patterns, alphabet).length === 0
}

/**
 * Throw the first validation error of a pattern set as an `AutomatonError`.
 *
 * @public
 */
export function assertValidPatterns(patterns: readonly string[], alphabet?: ReadonlySet<string>): void {
  const [first] = validatePatterns(patterns, alphabet)
  if (first === undefined) return

  const symbol =
    first.index !== undefined && first.position !== undefined ? patterns[first.index][first.position] : undefined
  throw new AutomatonError(first.code, first.message, { symbol })
}
