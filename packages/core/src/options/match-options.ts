/**
 * Option schemas and defaults.
 * @packageDocumentation
 */

import { z } from 'zod'

import type { MatchOptions, MatchOptionsInput } from '../types'
import { InvalidOptionsError } from '../types'

/**
 * Schema for {@link MatchOptions}. Omitted flags take their defaults; unknown
 * keys are rejected.
 * @public
 */
export const matchOptionsSchema = z
  .object({
    caseSensitive: z.boolean().default(true),
    requireLiteralSeparator: z.boolean().default(false),
    requireLiteralLeadingDot: z.boolean().default(false),
  })
  .strict()

// Objects produced here skip validation when passed back in
const resolved = new WeakSet<object>()

/**
 * Default options: case-sensitive, wildcards may cross separators and match
 * leading dots.
 * @public
 */
export const DEFAULT_MATCH_OPTIONS: MatchOptions = markResolved({
  caseSensitive: true,
  requireLiteralSeparator: false,
  requireLiteralLeadingDot: false,
})

/**
 * Validate match options and fill in defaults.
 *
 * @param input - Partial options (or `undefined` for the defaults)
 * @returns Complete, frozen options
 * @throws InvalidOptionsError if a flag is not a boolean or a key is unknown
 *
 * @public
 */
export function resolveMatchOptions(input?: MatchOptionsInput): MatchOptions {
  if (input === undefined) {
    return DEFAULT_MATCH_OPTIONS
  }
  if (isResolved(input)) {
    return input
  }

  const result = matchOptionsSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidOptionsError(formatIssues(result.error.issues))
  }
  return markResolved(result.data)
}

/**
 * Render zod issues as `field: message` lines.
 */
export function formatIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

function isResolved(input: MatchOptionsInput): input is MatchOptions {
  return resolved.has(input)
}

function markResolved(options: MatchOptions): MatchOptions {
  const frozen = Object.freeze({ ...options })
  resolved.add(frozen)
  return frozen
}
