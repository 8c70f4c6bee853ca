/**
 * Option validation and defaults.
 * @packageDocumentation
 */

export { matchOptionsSchema, DEFAULT_MATCH_OPTIONS, resolveMatchOptions, formatIssues } from './match-options'
