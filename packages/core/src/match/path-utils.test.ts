import { describe, it, expect } from 'vitest'

import { isSeparator, joinPath, fileName, splitRoot, splitComponents } from './path-utils'

// These run on POSIX hosts, where `/` is the only separator

describe('isSeparator', () => {
  it('recognizes /', () => {
    expect(isSeparator('/')).toBe(true)
    expect(isSeparator('a')).toBe(false)
  })
})

describe('joinPath', () => {
  it('joins with a separator', () => {
    expect(joinPath('src', 'index.ts')).toBe('src/index.ts')
    expect(joinPath('src/', 'index.ts')).toBe('src/index.ts')
    expect(joinPath('/', 'etc')).toBe('/etc')
  })

  it('keeps . and .. as written', () => {
    expect(joinPath('a', '..')).toBe('a/..')
    expect(joinPath('a/.', 'b')).toBe('a/./b')
  })

  it('handles empty parts', () => {
    expect(joinPath('src', '')).toBe('src')
    expect(joinPath('', 'a')).toBe('a')
  })
})

describe('fileName', () => {
  it('returns the last component', () => {
    expect(fileName('a/b.txt')).toBe('b.txt')
    expect(fileName('b.txt')).toBe('b.txt')
    expect(fileName('a/b/')).toBe('b')
  })

  it('returns undefined for roots and dot components', () => {
    expect(fileName('/')).toBeUndefined()
    expect(fileName('.')).toBeUndefined()
    expect(fileName('a/..')).toBeUndefined()
    expect(fileName('')).toBeUndefined()
  })
})

describe('splitRoot', () => {
  it('splits off the root of absolute patterns', () => {
    expect(splitRoot('/a/b')).toEqual({ root: '/', rest: 'a/b' })
    expect(splitRoot('/')).toEqual({ root: '/', rest: '' })
  })

  it('folds repeated leading separators into the root', () => {
    expect(splitRoot('//a')).toEqual({ root: '/', rest: 'a' })
  })

  it('leaves relative patterns whole', () => {
    expect(splitRoot('a/b')).toEqual({ root: '', rest: 'a/b' })
    expect(splitRoot('./a')).toEqual({ root: '', rest: './a' })
  })
})

describe('splitComponents', () => {
  it('splits on separators', () => {
    expect(splitComponents('src/(*)/*.ts')).toEqual(['src', '(*)', '*.ts'])
  })

  it('drops a trailing empty component only', () => {
    expect(splitComponents('src/')).toEqual(['src'])
    expect(splitComponents('a//b')).toEqual(['a', '', 'b'])
    expect(splitComponents('')).toEqual([])
  })
})
