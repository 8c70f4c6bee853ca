/**
 * Pattern tokenizer - converts glob pattern strings to token programs.
 * @packageDocumentation
 */

import type { Token, CharSpecifier, PatternError, PatternErrorCode } from '../types'
import { isSeparator } from '../match/path-utils'

export const ERROR_WILDCARDS = 'wildcards are either regular `*` or recursive `**`'
export const ERROR_RECURSIVE_WILDCARDS = 'recursive wildcards must form a single path component'
export const ERROR_INVALID_RANGE = 'invalid range pattern'
export const ERROR_UNMATCHED_CLOSING_PAREN = 'unmatched closing paren'
export const ERROR_UNMATCHED_OPENING_PAREN = 'unmatched opening paren'

/**
 * Options for {@link tokenizePattern}.
 * @public
 */
export interface TokenizeOptions {
  /**
   * Whether `(` and `)` emit capture tokens. Component patterns used by the
   * filesystem walker turn this off; parentheses are then dropped entirely.
   * Defaults to `true`.
   */
  readonly captures?: boolean
}

/**
 * Result of tokenizing a pattern. `errors` is present only on failure.
 * @public
 */
export interface TokenizeResult {
  readonly source: string
  readonly tokens: readonly Token[]
  readonly isRecursive: boolean
  readonly errors?: readonly PatternError[]
}

/**
 * Tokenizer state for a single left-to-right scan.
 */
interface TokenizerState {
  readonly chars: readonly string[]
  readonly emitCaptures: boolean
  readonly tokens: Token[]
  /** Groups opened but not yet closed, innermost last */
  readonly openGroups: Array<{ readonly group: number; readonly position: number }>
  nextGroup: number
  isRecursive: boolean
  position: number
}

/**
 * Tokenize a pattern string.
 *
 * Scanning stops at the first syntax error. Unclosed groups are only known at
 * the end of the pattern, so each of them is reported.
 *
 * @param source - The pattern string
 * @param options - Tokenizer options
 * @returns The token program, or the errors that prevented it
 *
 * @public
 */
export function tokenizePattern(source: string, options: TokenizeOptions = {}): TokenizeResult {
  const state: TokenizerState = {
    chars: Array.from(source),
    emitCaptures: options.captures ?? true,
    tokens: [],
    openGroups: [],
    nextGroup: 0,
    isRecursive: false,
    position: 0,
  }

  while (state.position < state.chars.length) {
    const error = readToken(state)
    if (error) {
      return { source, tokens: [], isRecursive: false, errors: [error] }
    }
  }

  if (state.openGroups.length > 0) {
    const errors = state.openGroups.map((open) =>
      patternError('UNMATCHED_OPENING_PAREN', ERROR_UNMATCHED_OPENING_PAREN, open.position),
    )
    return { source, tokens: [], isRecursive: false, errors }
  }

  return { source, tokens: state.tokens, isRecursive: state.isRecursive }
}

/**
 * Read the token(s) starting at the current position.
 */
function readToken(state: TokenizerState): PatternError | undefined {
  const char = state.chars[state.position]

  switch (char) {
    case '?':
      state.tokens.push({ type: 'any-char' })
      state.position++
      return undefined

    case '*':
      return readStars(state)

    case '[':
      return readBracket(state)

    case '(':
      openGroup(state, false)
      state.position++
      return undefined

    case ')': {
      const error = closeGroup(state, false)
      state.position++
      return error
    }

    default:
      state.tokens.push({ type: 'literal', char })
      state.position++
      return undefined
  }
}

/**
 * Read a run of `*`.
 *
 * `**` must form a whole path component: it may only be preceded by a
 * separator (or the pattern start) and followed by a separator (or the
 * pattern end), parentheses aside. The following separator is folded into
 * the token.
 */
function readStars(state: TokenizerState): PatternError | undefined {
  const { chars, tokens } = state
  const start = state.position

  while (state.position < chars.length && chars[state.position] === '*') {
    state.position++
  }

  const count = state.position - start

  if (count > 2) {
    return patternError('INVALID_WILDCARDS', ERROR_WILDCARDS, start + 2)
  }

  if (count === 1) {
    tokens.push({ type: 'any-sequence' })
    return undefined
  }

  // Collapse consecutive ** into one token
  const previous = tokens[tokens.length - 1]
  if (previous === undefined || previous.type !== 'any-recursive-sequence') {
    state.isRecursive = true
    tokens.push({ type: 'any-recursive-sequence' })
  }

  if (!followsSeparator(chars, start)) {
    return patternError('INVALID_GLOBSTAR', ERROR_RECURSIVE_WILDCARDS, start - 1)
  }

  while (state.position < chars.length && (chars[state.position] === '(' || chars[state.position] === ')')) {
    if (chars[state.position] === '(') {
      openGroup(state, true)
    } else {
      const error = closeGroup(state, true)
      if (error) {
        return error
      }
    }
    state.position++
  }

  if (state.position < chars.length) {
    if (!isSeparator(chars[state.position])) {
      return patternError('INVALID_GLOBSTAR', ERROR_RECURSIVE_WILDCARDS, state.position)
    }
    state.position++
  }

  return undefined
}

/**
 * Read a bracket expression `[...]` or `[!...]`.
 *
 * A `]` right after `[` or `[!` is a member of the class, not its end.
 */
function readBracket(state: TokenizerState): PatternError | undefined {
  const { chars } = state
  const start = state.position

  if (start + 4 <= chars.length && chars[start + 1] === '!') {
    const close = chars.indexOf(']', start + 3)
    if (close !== -1) {
      state.tokens.push({ type: 'any-except', specifiers: parseCharSpecifiers(chars.slice(start + 2, close)) })
      state.position = close + 1
      return undefined
    }
  } else if (start + 3 <= chars.length && chars[start + 1] !== '!') {
    const close = chars.indexOf(']', start + 2)
    if (close !== -1) {
      state.tokens.push({ type: 'any-within', specifiers: parseCharSpecifiers(chars.slice(start + 1, close)) })
      state.position = close + 1
      return undefined
    }
  }

  return patternError('INVALID_RANGE', ERROR_INVALID_RANGE, start)
}

/**
 * Parse bracket contents. Exactly `x-y` becomes a range; anything else is a
 * single character, so `-` is literal at either end.
 */
function parseCharSpecifiers(chars: readonly string[]): CharSpecifier[] {
  const specifiers: CharSpecifier[] = []
  let i = 0

  while (i < chars.length) {
    if (i + 3 <= chars.length && chars[i + 1] === '-') {
      specifiers.push({ type: 'range', start: chars[i], end: chars[i + 2] })
      i += 3
    } else {
      specifiers.push({ type: 'single', char: chars[i] })
      i++
    }
  }

  return specifiers
}

function openGroup(state: TokenizerState, isDoubleStar: boolean): void {
  if (!state.emitCaptures) {
    return
  }
  const group = state.nextGroup++
  state.openGroups.push({ group, position: state.position })
  state.tokens.push({ type: 'start-capture', group, isDoubleStar })
}

function closeGroup(state: TokenizerState, isDoubleStar: boolean): PatternError | undefined {
  if (!state.emitCaptures) {
    return undefined
  }
  const open = state.openGroups.pop()
  if (open === undefined) {
    return patternError('UNMATCHED_CLOSING_PAREN', ERROR_UNMATCHED_CLOSING_PAREN, state.position)
  }
  state.tokens.push({ type: 'end-capture', group: open.group, isDoubleStar })
  return undefined
}

/**
 * Whether everything before `end`, ignoring parentheses, ends in a separator
 * or is empty.
 */
function followsSeparator(chars: readonly string[], end: number): boolean {
  for (let i = end - 1; i >= 0; i--) {
    const char = chars[i]
    if (char === '(' || char === ')') continue
    return isSeparator(char)
  }
  return true
}

function patternError(code: PatternErrorCode, message: string, position: number): PatternError {
  return { code, message, position }
}
