/**
 * Error codes for pattern compilation failures.
 * @public
 */
export type PatternErrorCode =
  | 'INVALID_WILDCARDS' // *** and longer runs
  | 'INVALID_GLOBSTAR' // ** not as complete component
  | 'INVALID_RANGE' // [abc without ]
  | 'UNMATCHED_CLOSING_PAREN' // ) without (
  | 'UNMATCHED_OPENING_PAREN' // ( without )

/**
 * A pattern compilation error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Static description of the problem */
  readonly message: string

  /** Character position in the pattern where the error was detected */
  readonly position: number
}

/**
 * Thrown when a pattern cannot be compiled.
 *
 * Carries the first {@link PatternError} the tokenizer encountered.
 *
 * @public
 */
export class PatternSyntaxError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Character position in the pattern */
  readonly position: number

  /** The pattern that failed to compile */
  readonly pattern: string

  constructor(pattern: string, error: PatternError) {
    super(`Pattern syntax error near position ${error.position}: ${error.message}`)
    this.name = 'PatternSyntaxError'
    this.code = error.code
    this.position = error.position
    this.pattern = pattern
  }
}

/**
 * Kinds of substitution failure.
 * @public
 */
export type SubstitutionErrorKind = 'missing-group' | 'unexpected-wildcard'

/**
 * Thrown when values cannot be substituted into a pattern.
 * @public
 */
export class SubstitutionError extends Error {
  readonly kind: SubstitutionErrorKind

  /** 1-based group number that had no value (only for `missing-group`) */
  readonly group?: number

  constructor(kind: SubstitutionErrorKind, message: string, group?: number) {
    super(message)
    this.name = 'SubstitutionError'
    this.kind = kind
    this.group = group
  }

  static missingGroup(group: number): SubstitutionError {
    return new SubstitutionError('missing-group', `substitution error: missing group ${group}`, group)
  }

  static unexpectedWildcard(): SubstitutionError {
    return new SubstitutionError('unexpected-wildcard', 'unexpected wildcard')
  }
}

/**
 * A directory that matched (part of) a glob could not be listed.
 *
 * Yielded inline by the traversal; iteration continues past it.
 *
 * @public
 */
export class GlobError extends Error {
  /** The path whose contents could not be read */
  readonly path: string

  constructor(path: string, cause: unknown) {
    super(`attempting to read \`${path}\` resulted in an error: ${describeCause(cause)}`, { cause })
    this.name = 'GlobError'
    this.path = path
  }

  /** The underlying I/O failure */
  get error(): unknown {
    return this.cause
  }
}

/**
 * Thrown when an options object fails validation.
 * @public
 */
export class InvalidOptionsError extends Error {
  /** One line per rejected field */
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Invalid options: ${issues.join('; ')}`)
    this.name = 'InvalidOptionsError'
    this.issues = issues
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
