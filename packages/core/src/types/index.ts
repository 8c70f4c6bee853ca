/**
 * Type definitions for the pattern language.
 * @packageDocumentation
 */

// Pattern types
export type {
  Pattern,
  Token,
  LiteralToken,
  AnyCharToken,
  AnySequenceToken,
  AnyRecursiveSequenceToken,
  AnyWithinToken,
  AnyExceptToken,
  StartCaptureToken,
  EndCaptureToken,
  CharSpecifier,
} from './pattern'

// Option types
export type { MatchOptions, MatchOptionsInput } from './options'

// Error types
export type { PatternErrorCode, PatternError, SubstitutionErrorKind } from './errors'
export { PatternSyntaxError, SubstitutionError, GlobError, InvalidOptionsError } from './errors'
