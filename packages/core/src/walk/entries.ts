/**
 * Filesystem walker - lazily lists the paths matching a pattern.
 *
 * The pattern is split into one sub-pattern per path component. The walk
 * keeps an explicit stack of `(path, component index)` work items, so deep
 * trees cost heap rather than call stack, and touches the filesystem only
 * while a caller is pulling the next result.
 *
 * @packageDocumentation
 */

import type { MatchOptions, Pattern } from '../types'
import { GlobError } from '../types'
import { compilePattern } from '../compile'
import { matchPattern, capturePattern, Entry, isSeparator, fileName, joinPath, splitRoot, splitComponents } from '../match'
import type { DebugEvent, DebugObserverFn } from '../observability'
import type { DirectoryChild, FileSystem } from './file-system'
import { resolveGlobOptions, type GlobOptions } from './glob-options'

/**
 * One item produced by a walk: a matching entry, or a directory that could
 * not be read.
 * @public
 */
export type GlobResult = { readonly ok: true; readonly entry: Entry } | { readonly ok: false; readonly error: GlobError }

/**
 * Component index for paths already proven to match every component.
 */
const VERIFIED = -1

interface PendingPath {
  readonly path: string
  readonly index: number
}

type WorkItem = PendingPath | GlobError

/**
 * The pattern matched by a root-only pattern such as `/`.
 */
const EMPTY_COMPONENT: Pattern = Object.freeze({ source: '', tokens: Object.freeze([]), isRecursive: false })

/**
 * Everything a walk needs, decided once from the pattern.
 */
interface GlobPlan {
  /** Pattern for the whole path, with captures */
  readonly wholePattern: Pattern
  /** One pattern per component, without captures */
  readonly components: readonly Pattern[]
  /** Directory the walk starts from */
  readonly scope: string
  /** Pattern ended in a separator: only directories match */
  readonly requireDir: boolean
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Find the paths matching a pattern.
 *
 * Nothing is read until the first result is pulled. Within a directory,
 * entries come out in ascending name order, and a directory's matches come
 * out before those of the next sibling.
 *
 * - A trailing separator (`src/*\/`) only matches directories.
 * - A leading `./` is dropped from yielded paths.
 * - Directories that cannot be read are yielded as `{ ok: false, error }`;
 *   the walk carries on with everything else.
 *
 * @param pattern - Pattern to match; relative patterns start at the filesystem's working directory
 * @param options - Match options plus the filesystem to walk
 * @returns A lazy iterator of results
 * @throws PatternSyntaxError if the pattern is invalid
 * @throws InvalidOptionsError if the options are invalid
 *
 * @example
 * ```typescript
 * for (const result of glob('images/(*).jpg')) {
 *   if (result.ok) console.log(result.entry.group(1))
 * }
 * ```
 *
 * @public
 */
export function glob(pattern: string, options?: GlobOptions): Entries {
  const { matchOptions, fileSystem, debug } = resolveGlobOptions(options)
  return new Entries(planGlob(pattern), matchOptions, fileSystem, debug)
}

function planGlob(pattern: string): GlobPlan {
  const requireDir = pattern.length > 0 && isSeparator(pattern[pattern.length - 1])
  const wholePattern = compilePattern(wholePatternText(requireDir ? pattern.slice(0, -1) : pattern))

  // Components come from the pattern as written: a leading `.` stays a
  // component and resolves to the current directory. Empty components
  // (`a//b`) name no entry and are dropped.
  const { root, rest } = splitRoot(pattern)
  const components = splitComponents(rest)
    .filter((component) => component !== '')
    .map((component) => compilePattern(component, { captures: false }))
  if (components.length === 0) {
    components.push(EMPTY_COMPONENT)
  }

  return { wholePattern, components, scope: root === '' ? '.' : root, requireDir }
}

/**
 * Spell the whole pattern the way the walker spells the paths it builds:
 * separator runs after the root collapse, trailing separators go, and
 * leading `./` components are dropped from relative patterns.
 */
function wholePatternText(text: string): string {
  const { root, rest } = splitRoot(text)

  let body = ''
  for (const char of rest) {
    if (isSeparator(char) && body.length > 0 && isSeparator(body[body.length - 1])) continue
    body += char
  }
  while (body.length > 1 && isSeparator(body[body.length - 1])) {
    body = body.slice(0, -1)
  }
  if (root === '') {
    while (body.length > 1 && body[0] === '.' && isSeparator(body[1])) {
      body = body.slice(2)
    }
  }

  return root + body
}

// =============================================================================
// Entries
// =============================================================================

/**
 * Lazy iterator over the results of {@link glob}.
 *
 * Single-pass: once exhausted it stays exhausted. Call `glob` again to walk
 * again.
 *
 * @public
 */
export class Entries implements IterableIterator<GlobResult> {
  private readonly todo: WorkItem[] = []
  private readonly lastIndex: number
  private scope: string | undefined

  constructor(
    private readonly plan: GlobPlan,
    private readonly options: MatchOptions,
    private readonly fileSystem: FileSystem,
    private readonly debug?: DebugObserverFn,
  ) {
    this.scope = plan.scope
    this.lastIndex = plan.components.length - 1
  }

  [Symbol.iterator](): Entries {
    return this
  }

  next(): IteratorResult<GlobResult, undefined> {
    const value = this.pull()
    return value === undefined ? { done: true, value: undefined } : { done: false, value }
  }

  private pull(): GlobResult | undefined {
    const { components } = this.plan

    if (this.scope !== undefined) {
      const scope = this.scope
      this.scope = undefined
      this.fill(0, scope)
    }

    for (;;) {
      const item = this.todo.pop()
      if (item === undefined) {
        return undefined
      }
      if (item instanceof GlobError) {
        return { ok: false, error: item }
      }

      const { path } = item
      let index = item.index

      if (index === VERIFIED) {
        if (this.plan.requireDir && !this.fileSystem.isDirectory(path)) continue
        return this.emitMatch(path, false)
      }

      if (components[index].isRecursive) {
        let next = index
        while (next < this.lastIndex && components[next + 1].isRecursive) {
          next++
        }

        if (this.isHidden(path)) {
          // ** never consumes a dot-name under requireLiteralLeadingDot
          if (next === this.lastIndex) continue
        } else if (this.fileSystem.isDirectory(path)) {
          this.fill(next, path)
          if (next === this.lastIndex) {
            return this.emitMatch(path, false)
          }
        } else if (next === this.lastIndex) {
          continue
        }
        index = next + 1
      }

      const name = fileName(path)
      if (name === undefined || !matchPattern(name, components[index], this.options)) continue

      if (index < this.lastIndex) {
        this.fill(index + 1, path)
      } else if (!this.plan.requireDir || this.fileSystem.isDirectory(path)) {
        return this.emitMatch(path, true)
      }
    }
  }

  /**
   * Push the candidates under `path` for component `index`.
   *
   * A literal component needs no listing: the one candidate is checked
   * directly, and the following components are filled in right away.
   */
  private fill(index: number, path: string): void {
    const pattern = this.plan.components[index]
    const atCurrentDir = path === '.'
    const childPath = (name: string): string => (atCurrentDir ? name : joinPath(path, name))

    const literal = literalText(pattern)
    if (literal !== undefined) {
      const candidate = childPath(literal)
      const found = literal === '.' || literal === '..' ? this.fileSystem.isDirectory(path) : this.exists(candidate)
      if (found) {
        this.advance(index, candidate)
      }
      return
    }

    if (!this.fileSystem.isDirectory(path)) {
      return
    }

    let children: readonly DirectoryChild[]
    try {
      children = this.fileSystem.readDirectory(path)
    } catch (error) {
      const globError = new GlobError(path, error)
      this.emit({ type: 'read-error', path, error: globError.message, timestamp: Date.now() })
      this.todo.push(globError)
      return
    }
    this.emit({ type: 'read-directory', path, entries: children.length, timestamp: Date.now() })

    const names: string[] = []
    for (const child of children) {
      if (typeof child === 'string') {
        names.push(child)
      } else {
        this.emit({ type: 'skip', path, reason: 'invalid-utf8', timestamp: Date.now() })
      }
    }

    // Listings never include . and ..; a component starting with a literal dot may name them
    const specials = startsWithDot(pattern)
      ? ['.', '..'].filter((special) => matchPattern(special, pattern, this.options))
      : []

    // Reverse order so pops come out ascending
    for (const name of [...names, ...specials].sort(descending)) {
      if (specials.includes(name)) {
        this.advance(index, childPath(name))
      } else {
        this.todo.push({ path: childPath(name), index })
      }
    }
  }

  /**
   * `path` matched component `index`: continue with the next component, or
   * mark it verified if there is none.
   */
  private advance(index: number, path: string): void {
    if (index === this.lastIndex) {
      this.todo.push({ path, index: VERIFIED })
    } else {
      this.fill(index + 1, path)
    }
  }

  private exists(path: string): boolean {
    const exists = this.fileSystem.exists(path)
    this.emit({ type: 'stat', path, exists, timestamp: Date.now() })
    return exists
  }

  private isHidden(path: string): boolean {
    return this.options.requireLiteralLeadingDot && (fileName(path)?.startsWith('.') ?? false)
  }

  /**
   * Build the result for a matched path, with its capture groups.
   *
   * Paths reached through component matching always match the whole
   * pattern. Verified literal paths and directories matched by a final `**`
   * may not (`/` against the empty pattern); they get group 0 only.
   */
  private emitMatch(path: string, componentMatched: boolean): GlobResult {
    let entry = capturePattern(path, this.plan.wholePattern, this.options)
    if (entry === undefined) {
      if (componentMatched) {
        const { source } = this.plan.wholePattern
        throw new Error(`Path \`${path}\` matched every component of \`${source}\` but not the whole pattern`)
      }
      entry = new Entry(path)
    }
    this.emit({ type: 'match', path, groups: entry.groupCount, timestamp: Date.now() })
    return { ok: true, entry }
  }

  private emit(event: DebugEvent): void {
    this.debug?.(event)
  }
}

function startsWithDot(pattern: Pattern): boolean {
  const first = pattern.tokens[0]
  return first !== undefined && first.type === 'literal' && first.char === '.'
}

function descending(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? 1 : -1
}

/**
 * The text a pattern matches if it has no wildcards.
 */
function literalText(pattern: Pattern): string | undefined {
  let text = ''
  for (const token of pattern.tokens) {
    if (token.type !== 'literal') {
      return undefined
    }
    text += token.char
  }
  return text
}
