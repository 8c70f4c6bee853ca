/**
 * Pattern compiler - turns pattern strings into immutable patterns.
 * @packageDocumentation
 */

import type { Pattern } from '../types'
import { PatternSyntaxError } from '../types'
import { tokenizePattern, type TokenizeOptions } from '../parse'

/**
 * Compile a pattern string.
 *
 * - `?` matches any single character.
 * - `*` matches any (possibly empty) sequence of characters.
 * - `**` matches the current directory and arbitrary subdirectories. It must
 *   form a whole path component, so `**a` and `b**` are errors, as is a run of
 *   three or more `*`.
 * - `[...]` matches any character inside the brackets, `[!...]` any character
 *   outside them. `x-y` is an inclusive range; a `]` directly after `[` or `[!`
 *   is a member, and `-` is literal at either end.
 * - `(...)` captures whatever its contents match.
 *
 * @param source - Pattern string
 * @param options - Pass `{ captures: false }` to drop capture groups
 * @returns Compiled pattern
 * @throws PatternSyntaxError for the first syntax error in the pattern
 *
 * @example
 * ```typescript
 * const pattern = compilePattern('images/(*).jpg')
 * matchPattern('images/cat.jpg', pattern) // => true
 * ```
 *
 * @public
 */
export function compilePattern(source: string, options?: TokenizeOptions): Pattern {
  const result = tokenizePattern(source, options)
  if (result.errors !== undefined && result.errors.length > 0) {
    throw new PatternSyntaxError(source, result.errors[0])
  }

  return Object.freeze({
    source,
    tokens: Object.freeze(result.tokens),
    isRecursive: result.isRecursive,
  })
}

/**
 * The original text of a pattern.
 * @public
 */
export function patternToString(pattern: Pattern): string {
  return pattern.source
}
