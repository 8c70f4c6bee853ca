/**
 * MemoryFileSystem - in-memory {@link FileSystem} for tests and fixtures.
 *
 * Supports:
 * - Files and directories from a nested object literal
 * - Directories that fail to list (EACCES)
 * - Child names that are not valid UTF-8
 *
 * @module memory-file-system
 */

import { posix } from 'node:path'

import type { DirectoryChild, FileSystem } from './file-system'

/**
 * A directory described as an object: string values are files, object values
 * are subdirectories. File content is not kept; only the names matter.
 *
 * @example
 * ```typescript
 * const tree: MemoryTree = {
 *   src: { 'index.ts': '', lib: { 'util.ts': '' } },
 *   'README.md': '# hello',
 * }
 * ```
 *
 * @public
 */
export interface MemoryTree {
  readonly [name: string]: string | MemoryTree
}

/**
 * Options for {@link MemoryFileSystem}.
 * @public
 */
export interface MemoryFileSystemOptions {
  /** Working directory for relative paths (default `/`) */
  readonly cwd?: string
  /** Directories whose listing fails with EACCES, relative to `cwd` or absolute */
  readonly unreadable?: readonly string[]
}

// =============================================================================
// Node Types
// =============================================================================

interface FileNode {
  readonly kind: 'file'
}

interface DirectoryNode {
  readonly kind: 'directory'
  readonly children: Map<string, MemoryNode>
  /** Names that only exist as bytes */
  readonly rawNames: Uint8Array[]
}

type MemoryNode = FileNode | DirectoryNode

function buildDirectory(tree: MemoryTree): DirectoryNode {
  const children = new Map<string, MemoryNode>()
  for (const [name, value] of Object.entries(tree)) {
    children.set(name, typeof value === 'string' ? { kind: 'file' } : buildDirectory(value))
  }
  return { kind: 'directory', children, rawNames: [] }
}

// =============================================================================
// MemoryFileSystem
// =============================================================================

/**
 * In-memory filesystem rooted at `/`.
 *
 * `readDirectory` lists children in insertion order, raw names last.
 *
 * @public
 */
export class MemoryFileSystem implements FileSystem {
  private readonly root: DirectoryNode
  private readonly cwd: string
  private readonly unreadable: ReadonlySet<string>

  constructor(tree: MemoryTree = {}, options: MemoryFileSystemOptions = {}) {
    this.root = buildDirectory(tree)
    this.cwd = posix.resolve('/', options.cwd ?? '/')
    this.unreadable = new Set((options.unreadable ?? []).map((path) => this.resolve(path)))
  }

  isDirectory(path: string): boolean {
    return this.lookup(path)?.kind === 'directory'
  }

  exists(path: string): boolean {
    return this.lookup(path) !== undefined
  }

  readDirectory(path: string): readonly DirectoryChild[] {
    const node = this.lookup(path)
    if (node === undefined) {
      throw new Error(`ENOENT: no such file or directory: ${path}`)
    }
    if (node.kind !== 'directory') {
      throw new Error(`ENOTDIR: not a directory: ${path}`)
    }
    if (this.unreadable.has(this.resolve(path))) {
      throw new Error(`EACCES: permission denied: ${path}`)
    }
    return [...node.children.keys(), ...node.rawNames]
  }

  /**
   * Add a child whose name is the given bytes, typically invalid UTF-8.
   *
   * @throws Error if `directory` does not exist or is a file
   */
  addRawEntry(directory: string, name: Uint8Array): void {
    const node = this.lookup(directory)
    if (node === undefined || node.kind !== 'directory') {
      throw new Error(`ENOTDIR: not a directory: ${directory}`)
    }
    node.rawNames.push(name)
  }

  private lookup(path: string): MemoryNode | undefined {
    if (path === '') {
      return undefined
    }

    let node: MemoryNode = this.root
    for (const name of this.resolve(path).split('/')) {
      if (name === '') continue
      if (node.kind !== 'directory') {
        return undefined
      }
      const child = node.children.get(name)
      if (child === undefined) {
        return undefined
      }
      node = child
    }
    return node
  }

  private resolve(path: string): string {
    return posix.resolve(this.cwd, path)
  }
}
