/**
 * Path helpers shared by the tokenizer, the matcher and the walker.
 * @packageDocumentation
 */

import { parse, sep } from 'node:path'

const WINDOWS_SEPARATORS = sep === '\\'

/**
 * Check if a character is a path separator on this platform.
 *
 * `/` always is; `\` only on Windows.
 *
 * @public
 */
export function isSeparator(char: string): boolean {
  return char === '/' || (WINDOWS_SEPARATORS && char === '\\')
}

/**
 * Append a child name to a directory path.
 *
 * Unlike `path.join`, nothing is normalized: `.` and `..` stay as written, so
 * yielded paths mirror the pattern that produced them.
 *
 * @example
 * joinPath('src', 'index.ts') // => 'src/index.ts'
 * joinPath('/', 'etc') // => '/etc'
 * joinPath('src', '') // => 'src'
 *
 * @public
 */
export function joinPath(parent: string, name: string): string {
  if (name === '') {
    return parent
  }
  if (parent === '') {
    return name
  }
  return isSeparator(parent[parent.length - 1]) ? parent + name : parent + sep + name
}

/**
 * Get the final component of a path.
 *
 * @returns The last component, or `undefined` when the path ends in a root,
 *   `.` or `..` (which name no entry of their parent)
 *
 * @public
 */
export function fileName(path: string): string | undefined {
  let end = path.length
  while (end > 0 && isSeparator(path[end - 1])) {
    end--
  }

  let start = end
  while (start > 0 && !isSeparator(path[start - 1])) {
    start--
  }

  const name = path.slice(start, end)
  if (name === '' || name === '.' || name === '..') {
    return undefined
  }
  return name
}

/**
 * Split the root portion (`/`, `C:\`, `\\server\share\`) off a pattern.
 *
 * Separators directly after the root belong to it, so `//a` splits into
 * `/` and `a`.
 *
 * @public
 */
export function splitRoot(pattern: string): { readonly root: string; readonly rest: string } {
  const { root } = parse(pattern)
  if (root === '') {
    return { root: '', rest: pattern }
  }

  let index = root.length
  while (index < pattern.length && isSeparator(pattern[index])) {
    index++
  }
  return { root, rest: pattern.slice(index) }
}

/**
 * Split a relative pattern or path into components.
 *
 * A trailing separator does not produce an empty final component.
 *
 * @example
 * splitComponents('src/(*)/*.ts') // => ['src', '(*)', '*.ts']
 * splitComponents('src/') // => ['src']
 *
 * @public
 */
export function splitComponents(text: string): string[] {
  if (text === '') {
    return []
  }

  const components: string[] = []
  let current = ''

  for (const char of text) {
    if (isSeparator(char)) {
      components.push(current)
      current = ''
    } else {
      current += char
    }
  }

  if (current !== '') {
    components.push(current)
  }

  return components
}
