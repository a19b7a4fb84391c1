import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fsp from 'fs/promises'
import * as path from 'path'
import { Writable } from 'stream'
import { handoffContent, writeHandoff } from '../../src/output-handoff.js'
import { makeTempDir, removeTempDir } from '../helpers/fixtures.js'

function capture() {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf-8'))
      callback()
    }
  })
  return { stream, text: () => chunks.join('') }
}

describe('handoffContent', () => {
  it('is the path when confirmed and empty when cancelled', () => {
    expect(handoffContent({ kind: 'confirmed', path: '/srv/app' })).toBe('/srv/app')
    expect(handoffContent({ kind: 'cancelled' })).toBe('')
  })
})

describe('writeHandoff', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTempDir()
  })

  afterEach(async () => {
    await removeTempDir(dir)
  })

  it('writes the confirmed path to the output file without a newline', async () => {
    const file = path.join(dir, 'out')
    await writeHandoff({ kind: 'confirmed', path: '/srv/app' }, { outputFile: file })
    expect(await fsp.readFile(file, 'utf-8')).toBe('/srv/app')
  })

  it('truncates the output file when cancelled', async () => {
    const file = path.join(dir, 'out')
    await fsp.writeFile(file, '/stale/path')
    await writeHandoff({ kind: 'cancelled' }, { outputFile: file })
    expect(await fsp.readFile(file, 'utf-8')).toBe('')
  })

  it.skipIf(process.platform === 'win32')('creates the output file owner-only', async () => {
    const file = path.join(dir, 'out')
    await writeHandoff({ kind: 'confirmed', path: '/srv/app' }, { outputFile: file })
    expect((await fsp.stat(file)).mode & 0o777).toBe(0o600)
  })

  it('fails with IoFailure when the file cannot be written', async () => {
    const file = path.join(dir, 'missing', 'out')
    await expect(writeHandoff({ kind: 'confirmed', path: '/srv/app' }, { outputFile: file })).rejects.toMatchObject({
      code: 'IoFailure',
      message: `Could not write ${file}`,
      path: file
    })
  })

  it('prints the confirmed path to stdout when no file is given', async () => {
    const out = capture()
    await writeHandoff({ kind: 'confirmed', path: '/srv/app' }, { stdout: out.stream })
    expect(out.text()).toBe('/srv/app\n')
  })

  it('prints nothing when cancelled', async () => {
    const out = capture()
    await writeHandoff({ kind: 'cancelled' }, { stdout: out.stream })
    expect(out.text()).toBe('')
  })
})
