/**
 * String matching and capture.
 * @packageDocumentation
 */

export { isSeparator, joinPath, fileName, splitRoot, splitComponents } from './path-utils'

export { matchPattern, capturePattern, type MatchOutcome } from './matcher'

export { Entry, type CaptureSpan } from './entry'

export { inCharSpecifiers, charsEqual } from './char-specifier'
