/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compilePattern, patternToString } from './compiler'
export { patternsEqual, comparePatterns } from './equality'
