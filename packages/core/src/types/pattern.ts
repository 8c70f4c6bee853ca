// =============================================================================
// COMPILED PATTERN
// =============================================================================

/**
 * A compiled glob pattern.
 *
 * Patterns are immutable values: two patterns compiled from the same source
 * with the same capture setting are structurally equal.
 *
 * @example
 * "images/(*).jpg" compiles to:
 *   tokens: [Literal('i'), ..., Literal('/'), StartCapture(0), AnySequence, EndCapture(0), Literal('.'), ...]
 *
 * @public
 */
export interface Pattern {
  /** Original pattern text, exactly as passed to the compiler */
  readonly source: string

  /** Token program executed by the matcher */
  readonly tokens: readonly Token[]

  /** Whether any `**` token occurs in the program */
  readonly isRecursive: boolean
}

// =============================================================================
// TOKENS
// =============================================================================

/**
 * One instruction of a pattern's token program.
 * @public
 */
export type Token =
  | LiteralToken
  | AnyCharToken
  | AnySequenceToken
  | AnyRecursiveSequenceToken
  | AnyWithinToken
  | AnyExceptToken
  | StartCaptureToken
  | EndCaptureToken

/**
 * Matches exactly one character (one code point).
 * @public
 */
export interface LiteralToken {
  readonly type: 'literal'
  readonly char: string
}

/**
 * `?` - any single character.
 * @public
 */
export interface AnyCharToken {
  readonly type: 'any-char'
}

/**
 * `*` - zero or more characters.
 * @public
 */
export interface AnySequenceToken {
  readonly type: 'any-sequence'
}

/**
 * `**` - zero or more whole path components.
 * @public
 */
export interface AnyRecursiveSequenceToken {
  readonly type: 'any-recursive-sequence'
}

/**
 * `[...]` - one character inside the class.
 * @public
 */
export interface AnyWithinToken {
  readonly type: 'any-within'
  readonly specifiers: readonly CharSpecifier[]
}

/**
 * `[!...]` - one character outside the class.
 * @public
 */
export interface AnyExceptToken {
  readonly type: 'any-except'
  readonly specifiers: readonly CharSpecifier[]
}

/**
 * `(` - opens capture group `group` (0-based).
 * @public
 */
export interface StartCaptureToken {
  readonly type: 'start-capture'
  readonly group: number
  /** Set when the group wraps a `**`, whose trailing separator is trimmed from the capture */
  readonly isDoubleStar: boolean
}

/**
 * `)` - closes capture group `group` (0-based).
 * @public
 */
export interface EndCaptureToken {
  readonly type: 'end-capture'
  readonly group: number
  readonly isDoubleStar: boolean
}

/**
 * One member of a bracket expression.
 *
 * Ranges keep their endpoints in the order written: `[2-1]` matches nothing.
 *
 * @public
 */
export type CharSpecifier =
  | { readonly type: 'single'; readonly char: string }
  | { readonly type: 'range'; readonly start: string; readonly end: string }
