/**
 * Match results with capture groups.
 * @packageDocumentation
 */

/**
 * Start and end offset of a captured substring.
 * @public
 */
export type CaptureSpan = readonly [start: number, end: number]

/**
 * A matched path together with the spans of its capture groups.
 *
 * Group 0 is the whole path; groups 1..n are the pattern's parenthesized
 * sub-patterns in order of their opening paren. Offsets are string indices
 * into {@link Entry.path} and always fall on code point boundaries.
 *
 * @example
 * ```typescript
 * const entry = capturePattern('images/cat.jpg', compilePattern('images/(*).jpg'))
 * entry?.group(1) // => 'cat'
 * ```
 *
 * @public
 */
export class Entry {
  /** The matched path */
  readonly path: string

  private readonly spans: readonly CaptureSpan[]

  /**
   * @param path - The matched path
   * @param spans - Spans of groups 1..n (group 0 is implied)
   */
  constructor(path: string, spans: readonly CaptureSpan[] = []) {
    this.path = path
    this.spans = spans
  }

  /** Number of capture groups, not counting group 0 */
  get groupCount(): number {
    return this.spans.length
  }

  /**
   * Get the span of group `n`.
   */
  span(n: number): CaptureSpan | undefined {
    if (n === 0) {
      return [0, this.path.length]
    }
    return Number.isInteger(n) && n > 0 ? this.spans[n - 1] : undefined
  }

  /**
   * Get the text captured by group `n`.
   *
   * @returns The captured text, or `undefined` if the pattern has no such group
   */
  group(n: number): string | undefined {
    const span = this.span(n)
    return span === undefined ? undefined : this.path.slice(span[0], span[1])
  }

  /**
   * Get the text of every capture group, starting with group 1.
   */
  groups(): string[] {
    return this.spans.map(([start, end]) => this.path.slice(start, end))
  }

  toString(): string {
    return this.path
  }
}
