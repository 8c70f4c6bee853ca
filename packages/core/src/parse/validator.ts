/**
 * Pattern validation without throwing.
 * @packageDocumentation
 */

import type { PatternError } from '../types'
import { tokenizePattern, type TokenizeOptions } from './tokenizer'

/**
 * Validate a pattern string.
 *
 * Returns errors for:
 * - Runs of three or more `*`
 * - `**` that is not a whole path component
 * - Unterminated bracket expressions
 * - Unmatched parentheses (every unclosed `(` is reported)
 *
 * @param source - The pattern string
 * @param options - Tokenizer options
 * @returns Array of errors (empty if valid)
 *
 * @public
 */
export function validatePattern(source: string, options?: TokenizeOptions): readonly PatternError[] {
  return tokenizePattern(source, options).errors ?? []
}

/**
 * Check if a pattern string compiles.
 *
 * @public
 */
export function isValidPattern(source: string, options?: TokenizeOptions): boolean {
  return validatePattern(source, options).length === 0
}
