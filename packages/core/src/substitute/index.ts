/**
 * Reverse substitution of capture groups.
 * @packageDocumentation
 */

export { substitutePattern } from './substitute'
