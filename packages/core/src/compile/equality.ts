/**
 * Structural equality and ordering of compiled patterns.
 * @packageDocumentation
 */

import type { Pattern, Token, CharSpecifier } from '../types'

const TOKEN_ORDER: Record<Token['type'], number> = {
  literal: 0,
  'any-char': 1,
  'any-sequence': 2,
  'any-recursive-sequence': 3,
  'any-within': 4,
  'any-except': 5,
  'start-capture': 6,
  'end-capture': 7,
}

/**
 * Check if two patterns are structurally equal.
 * @public
 */
export function patternsEqual(a: Pattern, b: Pattern): boolean {
  return comparePatterns(a, b) === 0
}

/**
 * Total order over patterns: by source text, then token program, then the
 * recursive flag. Suitable for `Array.prototype.sort`.
 *
 * @returns A negative number, zero or a positive number
 *
 * @public
 */
export function comparePatterns(a: Pattern, b: Pattern): number {
  return (
    compareStrings(a.source, b.source) ||
    compareSequences(a.tokens, b.tokens, compareTokens) ||
    Number(a.isRecursive) - Number(b.isRecursive)
  )
}

function compareTokens(a: Token, b: Token): number {
  const byType = TOKEN_ORDER[a.type] - TOKEN_ORDER[b.type]
  if (byType !== 0) {
    return byType
  }

  switch (a.type) {
    case 'literal':
      return b.type === 'literal' ? compareStrings(a.char, b.char) : 0

    case 'any-within':
    case 'any-except':
      return b.type === a.type ? compareSequences(a.specifiers, b.specifiers, compareSpecifiers) : 0

    case 'start-capture':
    case 'end-capture':
      return b.type === a.type ? a.group - b.group || Number(a.isDoubleStar) - Number(b.isDoubleStar) : 0

    default:
      return 0
  }
}

function compareSpecifiers(a: CharSpecifier, b: CharSpecifier): number {
  if (a.type === 'single') {
    return b.type === 'single' ? compareStrings(a.char, b.char) : -1
  }
  if (b.type === 'single') {
    return 1
  }
  return compareStrings(a.start, b.start) || compareStrings(a.end, b.end)
}

function compareSequences<T>(a: readonly T[], b: readonly T[], compare: (x: T, y: T) => number): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const result = compare(a[i], b[i])
    if (result !== 0) {
      return result
    }
  }
  return a.length - b.length
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}
