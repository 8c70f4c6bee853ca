/**
 * String matching - runs a pattern's token program against a string.
 * @packageDocumentation
 */

import type {
  Pattern,
  Token,
  LiteralToken,
  AnyCharToken,
  AnyWithinToken,
  AnyExceptToken,
  MatchOptions,
  MatchOptionsInput,
} from '../types'
import { resolveMatchOptions } from '../options'
import { inCharSpecifiers, charsEqual } from './char-specifier'
import { Entry, type CaptureSpan } from './entry'
import { isSeparator } from './path-utils'

/**
 * Outcome of matching the rest of a token program.
 *
 * - `full-match`: every token matched and no input is left
 * - `branch-failed`: this branch failed; the nearest `*` or `**` may try a longer consumption
 * - `input-exhausted`: the input ran out before the tokens did; longer consumptions upstream cannot help
 *
 * @public
 */
export type MatchOutcome = 'full-match' | 'branch-failed' | 'input-exhausted'

/**
 * Tokens that consume exactly one character.
 */
type SingleCharToken = LiteralToken | AnyCharToken | AnyWithinToken | AnyExceptToken

/**
 * Shared state for one match attempt.
 */
interface MatchContext {
  readonly tokens: readonly Token[]
  /** Input split into code points */
  readonly chars: readonly string[]
  /** String index of each code point, plus `input.length` at the end */
  readonly offsets: readonly number[]
  readonly options: MatchOptions
  /** Capture buffer, indexed by 0-based group; absent for a plain test */
  readonly spans?: Array<[number, number]>
}

/**
 * Test if a string matches a pattern.
 *
 * The whole string must match; there are no prefix matches.
 *
 * @param input - The string to test
 * @param pattern - Compiled pattern
 * @param options - Match options (defaults when omitted)
 * @returns true if the string matches
 *
 * @public
 */
export function matchPattern(input: string, pattern: Pattern, options?: MatchOptionsInput): boolean {
  const context = createContext(pattern.tokens, input, resolveMatchOptions(options), false)
  return matchFrom(context, true, 0, 0) === 'full-match'
}

/**
 * Match a string against a pattern, recording capture groups.
 *
 * Where a pattern is ambiguous, each `*` and `**` takes the shortest
 * consumption that lets the rest of the pattern match.
 *
 * @param input - The string to match
 * @param pattern - Compiled pattern
 * @param options - Match options (defaults when omitted)
 * @returns An entry for the string with its groups, or `undefined` if it doesn't match
 *
 * @example
 * capturePattern('some/one/two/needle.txt', compilePattern('some/(**)/needle.txt'))?.group(1)
 * // => 'one/two'
 *
 * @public
 */
export function capturePattern(input: string, pattern: Pattern, options?: MatchOptionsInput): Entry | undefined {
  const context = createContext(pattern.tokens, input, resolveMatchOptions(options), true)
  if (matchFrom(context, true, 0, 0) !== 'full-match') {
    return undefined
  }
  const spans: CaptureSpan[] = context.spans ?? []
  return new Entry(input, spans)
}

function createContext(tokens: readonly Token[], input: string, options: MatchOptions, capture: boolean): MatchContext {
  const chars: string[] = []
  const offsets: number[] = []
  let offset = 0

  for (const char of input) {
    chars.push(char)
    offsets.push(offset)
    offset += char.length
  }
  offsets.push(offset)

  if (!capture) {
    return { tokens, chars, offsets, options }
  }

  const groupCount = tokens.filter((token) => token.type === 'start-capture').length
  const spans = Array.from({ length: groupCount }, (): [number, number] => [0, 0])
  return { tokens, chars, offsets, options, spans }
}

/**
 * Match `tokens[tokenIndex..]` against `chars[position..]`.
 *
 * Recursion happens only at `*` and `**`, so its depth is bounded by the
 * number of wildcards in the pattern.
 */
function matchFrom(context: MatchContext, followsSeparator: boolean, position: number, tokenIndex: number): MatchOutcome {
  const { tokens, chars, options } = context
  let afterSeparator = followsSeparator
  let cursor = position

  for (let ti = tokenIndex; ti < tokens.length; ti++) {
    const token = tokens[ti]

    switch (token.type) {
      case 'any-sequence':
      case 'any-recursive-sequence': {
        // Empty match first
        const empty = matchFrom(context, afterSeparator, cursor, ti + 1)
        if (empty !== 'branch-failed') {
          return empty
        }

        while (cursor < chars.length) {
          const char = chars[cursor++]
          if (afterSeparator && options.requireLiteralLeadingDot && char === '.') {
            return 'branch-failed'
          }
          afterSeparator = isSeparator(char)

          if (token.type === 'any-recursive-sequence') {
            // ** resumes only at component boundaries
            if (!afterSeparator) continue
          } else if (options.requireLiteralSeparator && afterSeparator) {
            return 'branch-failed'
          }

          const outcome = matchFrom(context, afterSeparator, cursor, ti + 1)
          if (outcome !== 'branch-failed') {
            return outcome
          }
        }
        // Consumed everything: the remaining tokens must match the empty rest
        break
      }

      case 'start-capture':
        if (context.spans) {
          const offset = captureOffset(context, cursor, token.isDoubleStar)
          context.spans[token.group] = [offset, offset]
        }
        break

      case 'end-capture':
        if (context.spans) {
          const span = context.spans[token.group]
          // "a/(**)/b" against "a/b": the trimmed end would precede the start
          span[1] = Math.max(captureOffset(context, cursor, token.isDoubleStar), span[0])
        }
        break

      default: {
        if (cursor >= chars.length) {
          return 'input-exhausted'
        }
        const char = chars[cursor++]
        const separator = isSeparator(char)
        if (!matchSingle(token, char, separator, afterSeparator, options)) {
          return 'branch-failed'
        }
        afterSeparator = separator
      }
    }
  }

  return cursor === chars.length ? 'full-match' : 'branch-failed'
}

/**
 * String offset of a capture boundary. Boundaries next to a `**` exclude the
 * separator the wildcard absorbed.
 */
function captureOffset(context: MatchContext, cursor: number, isDoubleStar: boolean): number {
  if (isDoubleStar && cursor > 0 && isSeparator(context.chars[cursor - 1])) {
    return context.offsets[cursor - 1]
  }
  return context.offsets[cursor]
}

/**
 * Check a single-character token against one input character.
 */
function matchSingle(
  token: SingleCharToken,
  char: string,
  separator: boolean,
  followsSeparator: boolean,
  options: MatchOptions,
): boolean {
  if (token.type === 'literal') {
    return charsEqual(char, token.char, options.caseSensitive)
  }

  if (options.requireLiteralSeparator && separator) {
    return false
  }
  if (options.requireLiteralLeadingDot && followsSeparator && char === '.') {
    return false
  }

  switch (token.type) {
    case 'any-char':
      return true

    case 'any-within':
      return inCharSpecifiers(token.specifiers, char, options.caseSensitive)

    case 'any-except':
      return !inCharSpecifiers(token.specifiers, char, options.caseSensitive)
  }
}
