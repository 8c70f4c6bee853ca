import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { NodeFileSystem } from './file-system'
import { glob, type GlobResult } from './entries'

function pathOf(result: GlobResult): string {
  return result.ok ? result.entry.path : `error: ${result.error.path}`
}

describe('NodeFileSystem', () => {
  let root = ''
  let fs: NodeFileSystem

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), 'glob-capture-'))
    writeFileSync(join(root, 'a.txt'), 'a')
    writeFileSync(join(root, 'b.txt'), 'b')
    mkdirSync(join(root, 'sub'))
    writeFileSync(join(root, 'sub', 'c.txt'), 'c')
    fs = new NodeFileSystem(root)
  })

  afterAll(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('answers isDirectory relative to its cwd', () => {
    expect(fs.isDirectory('sub')).toBe(true)
    expect(fs.isDirectory('.')).toBe(true)
    expect(fs.isDirectory('a.txt')).toBe(false)
    expect(fs.isDirectory('missing')).toBe(false)
  })

  it('answers exists', () => {
    expect(fs.exists('a.txt')).toBe(true)
    expect(fs.exists('sub/c.txt')).toBe(true)
    expect(fs.exists('missing')).toBe(false)
    expect(fs.exists('a.txt/x')).toBe(false)
    expect(fs.exists('')).toBe(false)
  })

  it('lists a directory', () => {
    expect([...fs.readDirectory('.')].sort()).toEqual(['a.txt', 'b.txt', 'sub'])
  })

  it('throws when a directory cannot be listed', () => {
    expect(() => fs.readDirectory('missing')).toThrow(/ENOENT/)
  })

  it('walks a real directory tree', () => {
    expect([...glob('**/*.txt', { fileSystem: fs })].map(pathOf)).toEqual(['a.txt', 'b.txt', 'sub/c.txt'])
  })

  it('walks absolute patterns', () => {
    const results = [...glob(join(root, '(*).txt'), { fileSystem: fs })]

    expect(results.map(pathOf)).toEqual([join(root, 'a.txt'), join(root, 'b.txt')])
    expect(results.map((result) => (result.ok ? result.entry.group(1) : undefined))).toEqual(['a', 'b'])
  })

  it.skipIf(process.platform !== 'linux')('returns names that are not valid UTF-8 as bytes', () => {
    const dir = join(root, 'raw')
    mkdirSync(dir)
    writeFileSync(Buffer.concat([Buffer.from(`${dir}/`), Buffer.from([0x66, 0xff])]), '')

    const children = fs.readDirectory('raw')
    const [child] = children

    expect(children).toHaveLength(1)
    expect(child).toBeInstanceOf(Uint8Array)
    if (child instanceof Uint8Array) {
      expect(Array.from(child)).toEqual([0x66, 0xff])
    }
  })
})
