import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fsp from 'fs/promises'
import * as path from 'path'
import { looksLikeText, previewTextOrBinary, readTextExcerpt } from '../../../src/preview/text-preview.js'
import { makeTempDir, numberedLines, removeTempDir } from '../../helpers/fixtures.js'

describe('text-preview', () => {
  let root: string

  beforeEach(async () => {
    root = await makeTempDir()
  })

  afterEach(async () => {
    await removeTempDir(root)
  })

  const write = async (name: string, content: string | Uint8Array): Promise<string> => {
    const file = path.join(root, name)
    await fsp.writeFile(file, content)
    return file
  }

  describe('looksLikeText', () => {
    it('accepts UTF-8 text', () => {
      expect(looksLikeText(new TextEncoder().encode('héllo wörld'))).toBe(true)
    })

    it('rejects NUL bytes', () => {
      expect(looksLikeText(new Uint8Array([0x41, 0x00, 0x42]))).toBe(false)
    })

    it('rejects invalid UTF-8', () => {
      expect(looksLikeText(new Uint8Array([0xff, 0xfe, 0x41]))).toBe(false)
    })

    it('accepts a multi-byte character cut at the end', () => {
      expect(looksLikeText(new Uint8Array([0x61, 0xc3]))).toBe(true)
    })
  })

  describe('readTextExcerpt', () => {
    it('returns exactly the line limit from a long file without reading all of it', async () => {
      const file = await write('long.txt', numberedLines(10_000))
      const excerpt = await readTextExcerpt(file, { lineLimit: 100 })

      expect(excerpt).not.toBeNull()
      expect(excerpt?.lines).toHaveLength(100)
      expect(excerpt?.lines[0]).toEqual({ number: 1, text: 'line 1' })
      expect(excerpt?.lines[99]).toEqual({ number: 100, text: 'line 100' })
      expect(excerpt?.truncated).toBe(true)
      expect(excerpt?.bytesRead).toBeLessThan(excerpt?.size ?? 0)
    })

    it('reads a short file completely', async () => {
      const file = await write('short.txt', 'alpha\nbeta')
      const excerpt = await readTextExcerpt(file, { lineLimit: 100 })
      expect(excerpt).toEqual({
        lines: [
          { number: 1, text: 'alpha' },
          { number: 2, text: 'beta' }
        ],
        truncated: false,
        bytesRead: 10,
        size: 10
      })
    })

    it('does not count a trailing newline as an extra line', async () => {
      const file = await write('trailing.txt', 'a\nb\n')
      const excerpt = await readTextExcerpt(file, { lineLimit: 2 })
      expect(excerpt?.lines.map((l) => l.text)).toEqual(['a', 'b'])
      expect(excerpt?.truncated).toBe(false)
    })

    it('marks truncation when lines remain past the limit', async () => {
      const file = await write('three.txt', 'a\nb\nc\n')
      const excerpt = await readTextExcerpt(file, { lineLimit: 2 })
      expect(excerpt?.lines.map((l) => l.text)).toEqual(['a', 'b'])
      expect(excerpt?.truncated).toBe(true)
    })

    it('strips CR and escape sequences from lines', async () => {
      const file = await write('crlf.txt', 'one\r\n\x1b[31mtwo\x1b[0m\r\n')
      const excerpt = await readTextExcerpt(file, { lineLimit: 10 })
      expect(excerpt?.lines.map((l) => l.text)).toEqual(['one', 'two'])
    })

    it('stops at the scan ceiling for a single huge line', async () => {
      const file = await write('wide.txt', 'x'.repeat(50_000))
      const excerpt = await readTextExcerpt(file, { lineLimit: 100, sniffBytes: 8192, scanBytes: 20_000 })
      expect(excerpt?.bytesRead).toBe(20_000)
      expect(excerpt?.truncated).toBe(true)
      expect(excerpt?.lines).toHaveLength(1)
      expect(excerpt?.lines[0].text).toHaveLength(512)
    })

    it('decodes a character split across chunks', async () => {
      const file = await write('split.txt', 'aaaé\n')
      const excerpt = await readTextExcerpt(file, { lineLimit: 10, sniffBytes: 4, chunkSize: 1 })
      expect(excerpt?.lines).toEqual([{ number: 1, text: 'aaaé' }])
    })

    it('returns an empty excerpt for an empty file', async () => {
      const file = await write('empty.txt', '')
      const excerpt = await readTextExcerpt(file, { lineLimit: 10 })
      expect(excerpt?.lines).toEqual([])
      expect(excerpt?.truncated).toBe(false)
    })

    it('returns null for binary content', async () => {
      const file = await write('blob.bin', new Uint8Array([0x7f, 0x45, 0x4c, 0x46, 0x00, 0x01]))
      expect(await readTextExcerpt(file, { lineLimit: 10 })).toBeNull()
    })

    it('stops reading once aborted', async () => {
      const file = await write('big.txt', 'y'.repeat(20_000))
      const controller = new AbortController()
      controller.abort()
      await expect(
        readTextExcerpt(file, { lineLimit: 10, sniffBytes: 1024, signal: controller.signal })
      ).rejects.toMatchObject({ name: 'AbortError' })
    })
  })

  describe('previewTextOrBinary', () => {
    it('returns a text payload', async () => {
      const file = await write('hello.txt', 'hello\n')
      expect(await previewTextOrBinary(file, { lineLimit: 5 })).toEqual({
        kind: 'text',
        lines: [{ number: 1, text: 'hello' }],
        truncated: false
      })
    })

    it('returns the size for binary content', async () => {
      const file = await write('data.bin', new Uint8Array([1, 0, 2, 0, 3]))
      expect(await previewTextOrBinary(file, { lineLimit: 5 })).toEqual({ kind: 'binary', size: 5 })
    })
  })
})
