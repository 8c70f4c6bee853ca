/**
 * Lazy filesystem walking.
 * @packageDocumentation
 */

export { glob, Entries, type GlobResult } from './entries'
export { globOptionsSchema, resolveGlobOptions, type GlobOptions, type ResolvedGlobOptions } from './glob-options'
export { NodeFileSystem, type FileSystem, type DirectoryChild } from './file-system'
export { MemoryFileSystem, type MemoryTree, type MemoryFileSystemOptions } from './memory-file-system'
