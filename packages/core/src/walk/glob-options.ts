/**
 * Options accepted by `glob`.
 * @packageDocumentation
 */

import { z } from 'zod'

import type { MatchOptions, MatchOptionsInput } from '../types'
import { InvalidOptionsError } from '../types'
import { matchOptionsSchema, resolveMatchOptions, formatIssues } from '../options'
import type { DebugObserverFn } from '../observability'
import { NodeFileSystem, type FileSystem } from './file-system'

/**
 * Options for a filesystem walk: the match options applied to every path,
 * plus where to read from and who to tell about it.
 * @public
 */
export interface GlobOptions extends MatchOptionsInput {
  /** Filesystem to walk (default: a {@link NodeFileSystem} at `process.cwd()`) */
  readonly fileSystem?: FileSystem
  /** Receives an event for every read, stat, skip and match */
  readonly debug?: DebugObserverFn
}

/**
 * Options after validation.
 */
export interface ResolvedGlobOptions {
  readonly matchOptions: MatchOptions
  readonly fileSystem: FileSystem
  readonly debug?: DebugObserverFn
}

function isFileSystem(value: unknown): value is FileSystem {
  return (
    typeof value === 'object' &&
    value !== null &&
    'isDirectory' in value &&
    typeof value.isDirectory === 'function' &&
    'exists' in value &&
    typeof value.exists === 'function' &&
    'readDirectory' in value &&
    typeof value.readDirectory === 'function'
  )
}

function isDebugObserver(value: unknown): value is DebugObserverFn {
  return typeof value === 'function'
}

/**
 * Schema for {@link GlobOptions}.
 * @public
 */
export const globOptionsSchema = matchOptionsSchema.extend({
  fileSystem: z.custom<FileSystem>(isFileSystem, { message: 'Expected a FileSystem' }).optional(),
  debug: z.custom<DebugObserverFn>(isDebugObserver, { message: 'Expected a function' }).optional(),
})

/**
 * Validate glob options and fill in defaults.
 *
 * @throws InvalidOptionsError if any option has the wrong type or is unknown
 */
export function resolveGlobOptions(input: GlobOptions = {}): ResolvedGlobOptions {
  const result = globOptionsSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidOptionsError(formatIssues(result.error.issues))
  }

  const { fileSystem, debug, ...matchOptions } = result.data
  return {
    matchOptions: resolveMatchOptions(matchOptions),
    fileSystem: fileSystem ?? new NodeFileSystem(),
    debug,
  }
}
