/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { tokenizePattern, type TokenizeOptions, type TokenizeResult } from './tokenizer'
export { validatePattern, isValidPattern } from './validator'
export { escapePattern } from './escape'
