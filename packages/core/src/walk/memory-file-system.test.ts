import { describe, it, expect } from 'vitest'

import { MemoryFileSystem } from './memory-file-system'

describe('MemoryFileSystem', () => {
  const fs = new MemoryFileSystem(
    {
      src: { 'index.ts': 'export {}', lib: {} },
      'README.md': '# readme',
    },
    { unreadable: ['/src/lib'] },
  )

  it('answers isDirectory', () => {
    expect(fs.isDirectory('.')).toBe(true)
    expect(fs.isDirectory('/')).toBe(true)
    expect(fs.isDirectory('src')).toBe(true)
    expect(fs.isDirectory('src/index.ts')).toBe(false)
    expect(fs.isDirectory('missing')).toBe(false)
  })

  it('answers exists', () => {
    expect(fs.exists('README.md')).toBe(true)
    expect(fs.exists('src/../README.md')).toBe(true)
    expect(fs.exists('README.md/x')).toBe(false)
    expect(fs.exists('')).toBe(false)
  })

  it('lists children in insertion order', () => {
    expect(fs.readDirectory('.')).toEqual(['src', 'README.md'])
  })

  it('fails to list missing paths, files and unreadable directories', () => {
    expect(() => fs.readDirectory('missing')).toThrow('ENOENT: no such file or directory: missing')
    expect(() => fs.readDirectory('README.md')).toThrow('ENOTDIR: not a directory: README.md')
    expect(() => fs.readDirectory('src/lib')).toThrow('EACCES: permission denied: src/lib')
  })

  it('adds raw names after the others', () => {
    const raw = new MemoryFileSystem({ a: {} })
    const name = new Uint8Array([0xc3, 0x28])
    raw.addRawEntry('/', name)

    expect(raw.readDirectory('/')).toEqual(['a', name])
    expect(() => raw.addRawEntry('missing', name)).toThrow('ENOTDIR')
  })
})
