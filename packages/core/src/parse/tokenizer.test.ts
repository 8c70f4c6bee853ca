import { describe, it, expect } from 'vitest'

import {
  tokenizePattern,
  ERROR_WILDCARDS,
  ERROR_RECURSIVE_WILDCARDS,
  ERROR_INVALID_RANGE,
  ERROR_UNMATCHED_CLOSING_PAREN,
  ERROR_UNMATCHED_OPENING_PAREN,
} from './tokenizer'

describe('tokenizePattern', () => {
  describe('literals and wildcards', () => {
    it('tokenizes literals and ?', () => {
      const result = tokenizePattern('a?')

      expect(result.errors).toBeUndefined()
      expect(result.tokens).toEqual([{ type: 'literal', char: 'a' }, { type: 'any-char' }])
      expect(result.isRecursive).toBe(false)
    })

    it('tokenizes * as any-sequence', () => {
      expect(tokenizePattern('*.ts').tokens).toEqual([
        { type: 'any-sequence' },
        { type: 'literal', char: '.' },
        { type: 'literal', char: 't' },
        { type: 'literal', char: 's' },
      ])
    })

    it('treats astral characters as one literal', () => {
      expect(tokenizePattern('😀?').tokens).toEqual([{ type: 'literal', char: '😀' }, { type: 'any-char' }])
    })

    it('keeps the source text', () => {
      expect(tokenizePattern('src/*.ts').source).toBe('src/*.ts')
    })
  })

  describe('recursive wildcards', () => {
    it('tokenizes a lone **', () => {
      const result = tokenizePattern('**')

      expect(result.tokens).toEqual([{ type: 'any-recursive-sequence' }])
      expect(result.isRecursive).toBe(true)
    })

    it('folds the separator after ** into the token', () => {
      expect(tokenizePattern('a/**/b').tokens).toEqual([
        { type: 'literal', char: 'a' },
        { type: 'literal', char: '/' },
        { type: 'any-recursive-sequence' },
        { type: 'literal', char: 'b' },
      ])
    })

    it('collapses consecutive **', () => {
      expect(tokenizePattern('**/**/x').tokens).toEqual([{ type: 'any-recursive-sequence' }, { type: 'literal', char: 'x' }])
    })

    it('allows parentheses around **', () => {
      const result = tokenizePattern('a/(**)/x')

      expect(result.errors).toBeUndefined()
      expect(result.tokens).toEqual([
        { type: 'literal', char: 'a' },
        { type: 'literal', char: '/' },
        { type: 'start-capture', group: 0, isDoubleStar: false },
        { type: 'any-recursive-sequence' },
        { type: 'end-capture', group: 0, isDoubleStar: true },
        { type: 'literal', char: 'x' },
      ])
    })
  })

  describe('bracket expressions', () => {
    it('tokenizes a range', () => {
      expect(tokenizePattern('[a-c]').tokens).toEqual([
        { type: 'any-within', specifiers: [{ type: 'range', start: 'a', end: 'c' }] },
      ])
    })

    it('tokenizes a negated class', () => {
      expect(tokenizePattern('[!xy]').tokens).toEqual([
        {
          type: 'any-except',
          specifiers: [
            { type: 'single', char: 'x' },
            { type: 'single', char: 'y' },
          ],
        },
      ])
    })

    it('treats ] right after [ as a member', () => {
      expect(tokenizePattern('[]]').tokens).toEqual([{ type: 'any-within', specifiers: [{ type: 'single', char: ']' }] }])
    })

    it('treats ] right after [! as a member', () => {
      expect(tokenizePattern('[!]a]').tokens).toEqual([
        {
          type: 'any-except',
          specifiers: [
            { type: 'single', char: ']' },
            { type: 'single', char: 'a' },
          ],
        },
      ])
    })

    it('treats - at either end as literal', () => {
      expect(tokenizePattern('[a-]').tokens).toEqual([
        {
          type: 'any-within',
          specifiers: [
            { type: 'single', char: 'a' },
            { type: 'single', char: '-' },
          ],
        },
      ])
      expect(tokenizePattern('[-a]').tokens).toEqual([
        {
          type: 'any-within',
          specifiers: [
            { type: 'single', char: '-' },
            { type: 'single', char: 'a' },
          ],
        },
      ])
    })
  })

  describe('capture groups', () => {
    it('numbers groups by opening paren', () => {
      expect(tokenizePattern('(a(b))').tokens).toEqual([
        { type: 'start-capture', group: 0, isDoubleStar: false },
        { type: 'literal', char: 'a' },
        { type: 'start-capture', group: 1, isDoubleStar: false },
        { type: 'literal', char: 'b' },
        { type: 'end-capture', group: 1, isDoubleStar: false },
        { type: 'end-capture', group: 0, isDoubleStar: false },
      ])
    })

    it('drops parentheses when captures are disabled', () => {
      expect(tokenizePattern('(a)', { captures: false }).tokens).toEqual([{ type: 'literal', char: 'a' }])
    })

    it('ignores unbalanced parentheses when captures are disabled', () => {
      const result = tokenizePattern(')a(', { captures: false })

      expect(result.errors).toBeUndefined()
      expect(result.tokens).toEqual([{ type: 'literal', char: 'a' }])
    })
  })

  describe('errors', () => {
    it.each([
      ['a/**b', 4],
      ['a/bc**', 3],
      ['a/b**c**d', 2],
      ['a**b', 0],
    ])('reports misplaced ** in %s at %i', (source, position) => {
      expect(tokenizePattern(source).errors).toEqual([
        { code: 'INVALID_GLOBSTAR', message: ERROR_RECURSIVE_WILDCARDS, position },
      ])
    })

    it('reports runs of three or more *', () => {
      expect(tokenizePattern('a/*****').errors).toEqual([{ code: 'INVALID_WILDCARDS', message: ERROR_WILDCARDS, position: 4 }])
      expect(tokenizePattern('***').errors).toEqual([{ code: 'INVALID_WILDCARDS', message: ERROR_WILDCARDS, position: 2 }])
    })

    it.each(['abc[def', 'abc[!def', 'abc[', 'abc[!', 'abc[d', 'abc[!d', 'abc[]', 'abc[!]'])(
      'reports an invalid range in %s',
      (source) => {
        expect(tokenizePattern(source).errors).toEqual([{ code: 'INVALID_RANGE', message: ERROR_INVALID_RANGE, position: 3 }])
      },
    )

    it('reports an unmatched closing paren', () => {
      expect(tokenizePattern('a)b').errors).toEqual([
        { code: 'UNMATCHED_CLOSING_PAREN', message: ERROR_UNMATCHED_CLOSING_PAREN, position: 1 },
      ])
    })

    it('reports every unmatched opening paren', () => {
      expect(tokenizePattern('(a(b').errors).toEqual([
        { code: 'UNMATCHED_OPENING_PAREN', message: ERROR_UNMATCHED_OPENING_PAREN, position: 0 },
        { code: 'UNMATCHED_OPENING_PAREN', message: ERROR_UNMATCHED_OPENING_PAREN, position: 2 },
      ])
    })

    it('returns no tokens on failure', () => {
      const result = tokenizePattern('a/**b')

      expect(result.tokens).toEqual([])
      expect(result.isRecursive).toBe(false)
    })
  })
})
