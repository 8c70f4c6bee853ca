/**
 * Debug observer for filesystem traversal.
 *
 * The walker reports what it touches as typed events. Nothing is emitted
 * unless an observer is passed in `GlobOptions.debug`.
 *
 * @example
 * ```typescript
 * // Pretty console.debug output
 * glob('src/(**)/*.ts', { debug: createDebugObserver() })
 *
 * // Custom handler
 * glob('src/(**)/*.ts', { debug: (event) => events.push(event) })
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Event Types
// =============================================================================

/**
 * A directory was listed.
 * @public
 */
export interface ReadDirectoryEvent {
  readonly type: 'read-directory'
  readonly path: string
  /** Number of children returned */
  readonly entries: number
  readonly timestamp: number
}

/**
 * A literal component was resolved by an existence check instead of a listing.
 * @public
 */
export interface StatEvent {
  readonly type: 'stat'
  readonly path: string
  readonly exists: boolean
  readonly timestamp: number
}

/**
 * A directory could not be listed. The matching `GlobError` is yielded next.
 * @public
 */
export interface ReadErrorEvent {
  readonly type: 'read-error'
  readonly path: string
  readonly error: string
  readonly timestamp: number
}

/**
 * A child was skipped because its name is not valid UTF-8.
 * @public
 */
export interface SkipEvent {
  readonly type: 'skip'
  /** Directory containing the skipped child */
  readonly path: string
  readonly reason: 'invalid-utf8'
  readonly timestamp: number
}

/**
 * A path was yielded as a match.
 * @public
 */
export interface MatchEvent {
  readonly type: 'match'
  readonly path: string
  /** Number of capture groups on the entry */
  readonly groups: number
  readonly timestamp: number
}

/**
 * Union of all debug event types.
 * @public
 */
export type DebugEvent = ReadDirectoryEvent | StatEvent | ReadErrorEvent | SkipEvent | MatchEvent

/**
 * Observer function that receives debug events.
 * @public
 */
export type DebugObserverFn = (event: DebugEvent) => void

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a debug observer.
 *
 * With no handler, events are printed through `console.debug`:
 *
 * ```
 * [glob-capture] read-directory src (3 entries)
 * [glob-capture] stat           src/index.ts ✓
 * [glob-capture] match          src/index.ts (1 groups)
 * ```
 *
 * @param handler - Optional custom event handler
 * @returns An observer to pass as `GlobOptions.debug`
 *
 * @public
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
  if (handler) {
    return handler
  }
  return (event) => {
    console.debug(formatDebugEvent(event))
  }
}

/**
 * Format an event as a single log line.
 * @public
 */
export function formatDebugEvent(event: DebugEvent): string {
  const label = `[glob-capture] ${event.type.padEnd(14)} ${event.path}`

  switch (event.type) {
    case 'read-directory':
      return `${label} (${event.entries} entries)`

    case 'stat':
      return `${label} ${event.exists ? '✓' : '✗'}`

    case 'read-error':
      return `${label} ✗ ${event.error}`

    case 'skip':
      return `${label} (${event.reason})`

    case 'match':
      return `${label} (${event.groups} groups)`
  }
}
