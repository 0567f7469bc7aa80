/**
 * Persisted matcher records.
 * @packageDocumentation
 */

export { saveMatcher, stringifyMatcher } from './save'
export { loadMatcher, parseMatcher } from './load'
export { singlePatternRecordSchema, multiPatternRecordSchema } from './schema'
