/**
 * Flags that change how a pattern matches a string.
 * @public
 */
export interface MatchOptions {
  /**
   * Whether matching is case-sensitive. Case folding only considers ASCII
   * letters.
   */
  readonly caseSensitive: boolean

  /**
   * Whether a path separator must be matched by a literal separator in the
   * pattern, rather than by `*`, `?` or `[...]`.
   */
  readonly requireLiteralSeparator: boolean

  /**
   * Whether a `.` at the start of a path component must be matched by a
   * literal `.`; `*`, `?`, `**` and `[...]` will not match it. Mirrors the
   * hidden-file convention of Unix shells.
   */
  readonly requireLiteralLeadingDot: boolean
}

/**
 * Options accepted by the public matching functions. Omitted flags take their
 * default values.
 * @public
 */
export type MatchOptionsInput = Partial<MatchOptions>
