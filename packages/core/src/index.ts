/**
 * Glob patterns with capture groups.
 *
 * Compile shell-style patterns extended with `(...)` groups, match them
 * against strings, substitute values back into them, and walk the filesystem
 * for matching paths along with what each group captured.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Pattern types
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
  // Option types
  MatchOptions,
  MatchOptionsInput,
  // Error types
  PatternErrorCode,
  PatternError,
  SubstitutionErrorKind,
} from './types'
export { PatternSyntaxError, SubstitutionError, GlobError, InvalidOptionsError } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { tokenizePattern, type TokenizeOptions, type TokenizeResult } from './parse'
export { validatePattern, isValidPattern } from './parse'
export { escapePattern } from './parse'

// =============================================================================
// Compilation
// =============================================================================

export { compilePattern, patternToString } from './compile'
export { patternsEqual, comparePatterns } from './compile'

// =============================================================================
// Options
// =============================================================================

export { matchOptionsSchema, DEFAULT_MATCH_OPTIONS, resolveMatchOptions } from './options'

// =============================================================================
// Matching
// =============================================================================

export { matchPattern, capturePattern, type MatchOutcome } from './match'
export { Entry, type CaptureSpan } from './match'

// =============================================================================
// Substitution
// =============================================================================

export { substitutePattern } from './substitute'

// =============================================================================
// Filesystem
// =============================================================================

export { glob, Entries, type GlobResult, type GlobOptions } from './walk'
export { NodeFileSystem, MemoryFileSystem, type FileSystem, type DirectoryChild, type MemoryTree } from './walk'

// =============================================================================
// Observability
// =============================================================================

export { createDebugObserver, formatDebugEvent, type DebugEvent, type DebugObserverFn } from './observability'
