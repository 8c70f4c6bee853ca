/**
 * Character-level comparisons: bracket classes and literal equality.
 * @packageDocumentation
 */

import type { CharSpecifier } from '../types'
import { isSeparator } from './path-utils'

/**
 * Check if a character belongs to a bracket class.
 *
 * Without case sensitivity, a range folds ASCII case only when both of its
 * endpoints are letters, so `[a-z]` admits `Q` but `[0-z]` is compared as
 * written.
 *
 * @param specifiers - Members of the class
 * @param char - A single code point
 * @param caseSensitive - Whether ASCII case matters
 *
 * @public
 */
export function inCharSpecifiers(specifiers: readonly CharSpecifier[], char: string, caseSensitive: boolean): boolean {
  const code = codePoint(char)

  for (const specifier of specifiers) {
    if (specifier.type === 'single') {
      if (charsEqual(char, specifier.char, caseSensitive)) {
        return true
      }
      continue
    }

    const start = codePoint(specifier.start)
    const end = codePoint(specifier.end)

    if (!caseSensitive && isAscii(code) && isAscii(start) && isAscii(end)) {
      const lowerStart = toAsciiLower(start)
      const lowerEnd = toAsciiLower(end)
      if (isAsciiLetter(lowerStart) && isAsciiLetter(lowerEnd)) {
        const lowerChar = toAsciiLower(code)
        if (lowerChar >= lowerStart && lowerChar <= lowerEnd) {
          return true
        }
      }
    }

    if (code >= start && code <= end) {
      return true
    }
  }

  return false
}

/**
 * Compare two characters for a literal token.
 *
 * Separators are interchangeable on platforms with more than one. Case
 * folding applies to ASCII only.
 *
 * @public
 */
export function charsEqual(a: string, b: string, caseSensitive: boolean): boolean {
  if (a === b || (isSeparator(a) && isSeparator(b))) {
    return true
  }
  if (!caseSensitive) {
    const codeA = codePoint(a)
    const codeB = codePoint(b)
    return isAscii(codeA) && isAscii(codeB) && toAsciiLower(codeA) === toAsciiLower(codeB)
  }
  return false
}

function codePoint(char: string): number {
  return char.codePointAt(0) ?? 0
}

function isAscii(code: number): boolean {
  return code < 0x80
}

function isAsciiLetter(code: number): boolean {
  return code >= 0x61 && code <= 0x7a
}

function toAsciiLower(code: number): number {
  return code >= 0x41 && code <= 0x5a ? code + 0x20 : code
}
