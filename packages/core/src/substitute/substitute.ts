/**
 * Substitution - renders a pattern with values in place of its groups.
 * @packageDocumentation
 */

import type { Pattern, Token } from '../types'
import { SubstitutionError } from '../types'
import { isSeparator } from '../match/path-utils'

/**
 * Render a string from a pattern, replacing each capture group with a value.
 *
 * Literal characters are copied; a group is replaced wholesale by its value,
 * whatever it contains. Every wildcard must sit inside a group. The result is
 * not checked against the pattern, so `images/(*.jpg)` with `cat.png` gives
 * `images/cat.png`.
 *
 * A group around `**` absorbs the separator after it, so for a non-empty value
 * that separator is written back: `some/(**)/needle.txt` with `one/two` gives
 * `some/one/two/needle.txt`, and with `''` gives `some/needle.txt`.
 *
 * @param pattern - Compiled pattern
 * @param values - Group values; `values[0]` is group 1
 * @returns The rendered string
 * @throws SubstitutionError if a group has no value or a wildcard is outside every group
 *
 * @example
 * substitutePattern(compilePattern('images/(*).jpg'), ['cat']) // => 'images/cat.jpg'
 *
 * @public
 */
export function substitutePattern(pattern: Pattern, values: readonly string[]): string {
  const { tokens } = pattern
  let result = ''

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]

    switch (token.type) {
      case 'literal':
        result += token.char
        break

      case 'start-capture': {
        const value = values[token.group]
        if (value === undefined) {
          throw SubstitutionError.missingGroup(token.group + 1)
        }
        result += value

        const end = findEndCapture(tokens, i + 1, token.group)
        if (needsSeparator(tokens, end, value)) {
          result += '/'
        }
        i = end
        break
      }

      case 'end-capture':
        break

      default:
        throw SubstitutionError.unexpectedWildcard()
    }
  }

  return result
}

/**
 * Index of the token closing `group`, searching from `from`.
 */
function findEndCapture(tokens: readonly Token[], from: number, group: number): number {
  for (let i = from; i < tokens.length; i++) {
    const token = tokens[i]
    if (token.type === 'end-capture' && token.group === group) {
      return i
    }
  }
  return tokens.length
}

/**
 * Whether the separator a `**` group folded away must be restored after its
 * value: only when something other than closing parens follows.
 */
function needsSeparator(tokens: readonly Token[], end: number, value: string): boolean {
  const closing = tokens[end]
  if (closing === undefined || closing.type !== 'end-capture' || !closing.isDoubleStar) {
    return false
  }
  if (value === '' || isSeparator(value[value.length - 1])) {
    return false
  }
  return tokens.slice(end + 1).some((token) => token.type !== 'end-capture')
}
