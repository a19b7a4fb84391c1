/**
 * Test Fixtures
 *
 * Real temporary directory trees and sample entries
 */

import * as fsp from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { deflateSync } from 'zlib'

import type { Entry } from '../../src/types.js'

/**
 * Tree description: a string is a file's content, an object is a directory
 */
export interface TreeSpec {
  [name: string]: string | TreeSpec
}

/**
 * Create a fresh directory under the OS temp dir (symlinks resolved)
 */
export async function makeTempDir(prefix: string = 'quickhop-test-'): Promise<string> {
  const dir = await fsp.mkdtemp(path.join(os.tmpdir(), prefix))
  return fsp.realpath(dir)
}

export async function removeTempDir(dir: string): Promise<void> {
  await fsp.rm(dir, { recursive: true, force: true })
}

export async function writeTree(root: string, tree: TreeSpec): Promise<void> {
  for (const [name, value] of Object.entries(tree)) {
    const target = path.join(root, name)
    if (typeof value === 'string') {
      await fsp.writeFile(target, value)
    } else {
      await fsp.mkdir(target, { recursive: true })
      await writeTree(target, value)
    }
  }
}

/**
 * `count` numbered lines: "line 1\nline 2\n..."
 */
export function numberedLines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i + 1}`).join('\n') + '\n'
}

export function createEntry(overrides?: Partial<Entry>): Entry {
  return {
    name: 'notes.txt',
    path: '/test/project/notes.txt',
    kind: 'file',
    size: 42,
    modifiedAt: new Date('2024-01-01T00:00:00.000Z'),
    ...overrides
  }
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n
  for (let k = 0; k < 8; k++) c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
  return c >>> 0
})

function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff
  for (const byte of bytes) crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8)
  return (crc ^ 0xffffffff) >>> 0
}

function pngChunk(type: string, data: Uint8Array): Buffer {
  const body = Buffer.concat([Buffer.from(type, 'latin1'), data])
  const length = Buffer.alloc(4)
  length.writeUInt32BE(data.length)
  const crc = Buffer.alloc(4)
  crc.writeUInt32BE(crc32(body))
  return Buffer.concat([length, body, crc])
}

export interface RawPngSpec {
  width: number
  height: number
  depth: 1 | 2 | 4 | 8
  /** 0 grayscale, 3 indexed */
  colorType: 0 | 3
  /** Already-packed bytes of each scanline, without the filter byte */
  rows: number[][]
  palette?: [number, number, number][]
}

/**
 * Minimal PNG writer for bit depths and colour types fast-png cannot encode
 */
export function buildPng(spec: RawPngSpec): Uint8Array {
  const header = Buffer.alloc(13)
  header.writeUInt32BE(spec.width, 0)
  header.writeUInt32BE(spec.height, 4)
  header[8] = spec.depth
  header[9] = spec.colorType

  const scanlines = Buffer.from(spec.rows.flatMap((row) => [0, ...row]))
  const chunks = [pngChunk('IHDR', header)]
  if (spec.palette) chunks.push(pngChunk('PLTE', Buffer.from(spec.palette.flat())))
  chunks.push(pngChunk('IDAT', deflateSync(scanlines)), pngChunk('IEND', new Uint8Array(0)))

  return new Uint8Array(Buffer.concat([Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]), ...chunks]))
}

/**
 * Single-page PDF showing one text line per entry, with a valid xref table
 */
export function buildPdf(lines: string[]): Uint8Array {
  const text = lines.map((line, i) => `${i === 0 ? '' : '0 -20 Td '}(${line}) Tj`).join('\n')
  const content = `BT /F1 12 Tf 72 720 Td\n${text}\nET`
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>',
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`
  ]

  let pdf = '%PDF-1.4\n'
  const offsets: number[] = []
  objects.forEach((body, i) => {
    offsets.push(pdf.length)
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`
  })
  const xref = pdf.length
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`
  for (const offset of offsets) pdf += `${String(offset).padStart(10, '0')} 00000 n \n`
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xref}\n%%EOF\n`

  return new TextEncoder().encode(pdf)
}

/**
 * Deterministic PRNG (mulberry32) so generated cases repeat between runs
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)]
}
