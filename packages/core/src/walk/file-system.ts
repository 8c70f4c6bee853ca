/**
 * Filesystem access used by the walker.
 * @packageDocumentation
 */

import { readdirSync, statSync, type Stats } from 'node:fs'
import { resolve } from 'node:path'
import { TextDecoder } from 'node:util'

/**
 * A child name as listed by {@link FileSystem.readDirectory}: text, or the raw
 * bytes when the name is not valid UTF-8.
 * @public
 */
export type DirectoryChild = string | Uint8Array

/**
 * The synchronous filesystem operations the walker needs.
 *
 * Paths are passed exactly as the walker builds them, relative paths
 * included; implementations resolve them against their own working directory.
 *
 * @public
 */
export interface FileSystem {
  /**
   * Whether `path` names a directory. A missing path is not one; never throws.
   */
  isDirectory(path: string): boolean

  /**
   * Whether anything exists at `path`. Never throws.
   */
  exists(path: string): boolean

  /**
   * List the names of the children of `path`, in no particular order.
   *
   * @throws The underlying I/O error when the directory cannot be read
   */
  readDirectory(path: string): readonly DirectoryChild[]
}

/**
 * {@link FileSystem} backed by `node:fs`.
 *
 * @example
 * ```typescript
 * glob('*.json', { fileSystem: new NodeFileSystem('/srv/app') })
 * ```
 *
 * @public
 */
export class NodeFileSystem implements FileSystem {
  private readonly cwd: string
  private readonly decoder = new TextDecoder('utf-8', { fatal: true })

  /**
   * @param cwd - Directory relative paths are resolved against (default `process.cwd()`)
   */
  constructor(cwd: string = process.cwd()) {
    this.cwd = cwd
  }

  isDirectory(path: string): boolean {
    return this.stat(path)?.isDirectory() ?? false
  }

  exists(path: string): boolean {
    return this.stat(path) !== undefined
  }

  readDirectory(path: string): readonly DirectoryChild[] {
    return readdirSync(this.resolve(path), { encoding: 'buffer' }).map((name) => this.decode(name))
  }

  private stat(path: string): Stats | undefined {
    if (path === '') {
      return undefined
    }
    try {
      return statSync(this.resolve(path), { throwIfNoEntry: false })
    } catch {
      // EACCES, ENOTDIR, ELOOP...: metadata that cannot be read counts as absent
      return undefined
    }
  }

  private decode(name: Uint8Array): DirectoryChild {
    try {
      return this.decoder.decode(name)
    } catch {
      return name
    }
  }

  private resolve(path: string): string {
    return resolve(this.cwd, path)
  }
}
