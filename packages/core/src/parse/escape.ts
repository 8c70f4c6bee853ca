/**
 * Escaping literal text for use inside a pattern.
 * @packageDocumentation
 */

const META_CHARS = new Set(['?', '*', '[', ']', '(', ')'])

/**
 * Escape text so it compiles to a pattern matching exactly that text.
 *
 * Each metacharacter (`?`, `*`, `[`, `]`, `(`, `)`) is wrapped in brackets.
 * `!` needs no escaping since it is only special inside brackets.
 *
 * @example
 * escapePattern('_[_]_?_*_!_') // => '_[[]_[]]_[?]_[*]_!_'
 *
 * @public
 */
export function escapePattern(text: string): string {
  let escaped = ''
  for (const char of text) {
    escaped += META_CHARS.has(char) ? `[${char}]` : char
  }
  return escaped
}
