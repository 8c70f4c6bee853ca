/**
 * Observability for the filesystem walker.
 * @packageDocumentation
 */

export {
  createDebugObserver,
  formatDebugEvent,
  type DebugEvent,
  type DebugObserverFn,
  type ReadDirectoryEvent,
  type StatEvent,
  type ReadErrorEvent,
  type SkipEvent,
  type MatchEvent,
} from './debug-observer'
