/**
 * Schemas of persisted matcher records.
 * @packageDocumentation
 */

import { z } from 'zod'
import { automatonRecordSchema } from '../automaton'

const failFunctionsSchema = z.array(z.number().int().nonnegative())

/**
 * Reads only the algorithm tag, leaving the rest for the specific schema.
 */
export const algorithmTagSchema = z.object({
  algorithm: z.enum(['kmp', 'aho-corasick']).optional(),
})

/**
 * Single-pattern record as older writers produced it: no algorithm tag, and
 * pattern and fail functions possibly missing.
 */
export const legacySinglePatternSchema = z.object({
  pattern: z.string().optional(),
  dfa: automatonRecordSchema,
  fail_functions: failFunctionsSchema.optional(),
})

/**
 * Tagged single-pattern record.
 * @public
 */
export const singlePatternRecordSchema = legacySinglePatternSchema.extend({
  algorithm: z.literal('kmp'),
  pattern: z.string(),
  fail_functions: failFunctionsSchema,
})

/**
 * Multi-pattern record without an algorithm tag. The pattern map is what
 * identifies it.
 */
export const legacyMultiPatternSchema = z.object({
  patterns: z.array(z.string()).optional(),
  dfa: automatonRecordSchema,
  fail_functions: failFunctionsSchema.optional(),
  pattern_map: z.record(z.string(), z.string()),
})

/**
 * Tagged multi-pattern record.
 * @public
 */
export const multiPatternRecordSchema = legacyMultiPatternSchema.extend({
  algorithm: z.literal('aho-corasick'),
  patterns: z.array(z.string()),
  fail_functions: failFunctionsSchema,
})

export type SinglePatternInput = z.infer<typeof legacySinglePatternSchema>
export type MultiPatternInput = z.infer<typeof legacyMultiPatternSchema>
