import { describe, it, expect } from 'vitest'

import { PatternSyntaxError } from '../types'
import { compilePattern, patternToString } from './compiler'
import { patternsEqual, comparePatterns } from './equality'

describe('compilePattern', () => {
  it('compiles a pattern with captures', () => {
    const pattern = compilePattern('(*).md')

    expect(pattern.source).toBe('(*).md')
    expect(pattern.isRecursive).toBe(false)
    expect(pattern.tokens[0]).toEqual({ type: 'start-capture', group: 0, isDoubleStar: false })
  })

  it('marks recursive patterns', () => {
    expect(compilePattern('src/**').isRecursive).toBe(true)
    expect(compilePattern('src/*').isRecursive).toBe(false)
  })

  it('returns an immutable value', () => {
    const pattern = compilePattern('a*')

    expect(Object.isFrozen(pattern)).toBe(true)
    expect(Object.isFrozen(pattern.tokens)).toBe(true)
  })

  it('throws PatternSyntaxError with the first error', () => {
    try {
      compilePattern('a/**b')
      expect.fail('expected compilePattern to throw')
    } catch (error) {
      expect(error).toBeInstanceOf(PatternSyntaxError)
      if (error instanceof PatternSyntaxError) {
        expect(error.code).toBe('INVALID_GLOBSTAR')
        expect(error.position).toBe(4)
        expect(error.pattern).toBe('a/**b')
        expect(error.message).toBe(
          'Pattern syntax error near position 4: recursive wildcards must form a single path component',
        )
      }
    }
  })

  it('reports the first unclosed group', () => {
    expect(() => compilePattern('a(b(c')).toThrow('Pattern syntax error near position 1: unmatched opening paren')
  })
})

describe('patternToString', () => {
  it('returns the original text', () => {
    expect(patternToString(compilePattern('images/(*).jpg'))).toBe('images/(*).jpg')
    expect(patternToString(compilePattern('a/**/**/b'))).toBe('a/**/**/b')
  })
})

describe('patternsEqual', () => {
  it('equates patterns compiled from the same text', () => {
    expect(patternsEqual(compilePattern('src/(*).ts'), compilePattern('src/(*).ts'))).toBe(true)
  })

  it('distinguishes different text', () => {
    expect(patternsEqual(compilePattern('a*'), compilePattern('a?'))).toBe(false)
  })

  it('distinguishes capture settings', () => {
    expect(patternsEqual(compilePattern('(a)'), compilePattern('(a)', { captures: false }))).toBe(false)
  })
})

describe('comparePatterns', () => {
  it('orders by source text', () => {
    const sorted = ['b', 'a*', 'a'].map((source) => compilePattern(source)).sort(comparePatterns)

    expect(sorted.map(patternToString)).toEqual(['a', 'a*', 'b'])
  })

  it('orders by tokens when the text is equal', () => {
    const withCaptures = compilePattern('(a)')
    const without = compilePattern('(a)', { captures: false })

    expect(comparePatterns(without, withCaptures)).toBeLessThan(0)
    expect(comparePatterns(withCaptures, without)).toBeGreaterThan(0)
    expect(comparePatterns(withCaptures, compilePattern('(a)'))).toBe(0)
  })
})
