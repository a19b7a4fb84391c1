import { describe, it, expect } from 'vitest'
import { CliUsageError, USAGE, parseCliArgs } from '../../src/cli-args.js'

describe('parseCliArgs', () => {
  it('runs in the current directory by default', () => {
    expect(parseCliArgs([])).toEqual({
      kind: 'run',
      directory: undefined,
      outputFile: undefined,
      history: false,
      debug: false
    })
  })

  it('takes a start directory and options in any order', () => {
    expect(parseCliArgs(['--history', 'src', '-o', '/tmp/out', '--debug'])).toEqual({
      kind: 'run',
      directory: 'src',
      outputFile: '/tmp/out',
      history: true,
      debug: true
    })
  })

  it('accepts --output-file=value', () => {
    expect(parseCliArgs(['--output-file=/tmp/a=b'])).toMatchObject({ kind: 'run', outputFile: '/tmp/a=b' })
  })

  it('treats everything after -- as positional', () => {
    expect(parseCliArgs(['--', '--history'])).toMatchObject({ kind: 'run', directory: '--history', history: false })
  })

  it('returns help and version commands', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' })
    expect(parseCliArgs(['dir', '--help'])).toEqual({ kind: 'help' })
    expect(parseCliArgs(['-V'])).toEqual({ kind: 'version' })
    expect(parseCliArgs(['--version'])).toEqual({ kind: 'version' })
  })

  it('parses --init with a supported shell', () => {
    expect(parseCliArgs(['--init', 'zsh'])).toEqual({ kind: 'init', shell: 'zsh' })
    expect(parseCliArgs(['--init=fish'])).toEqual({ kind: 'init', shell: 'fish' })
  })

  it('rejects an unsupported shell', () => {
    expect(() => parseCliArgs(['--init', 'tcsh'])).toThrow(
      new CliUsageError('Unsupported shell: tcsh (expected bash, zsh, fish, powershell)')
    )
  })

  it('rejects a missing option value', () => {
    expect(() => parseCliArgs(['--output-file'])).toThrow('Missing value for --output-file')
    expect(() => parseCliArgs(['-o', '--history'])).toThrow('Missing value for -o')
  })

  it('rejects unknown options and extra arguments', () => {
    expect(() => parseCliArgs(['--colour'])).toThrow('Unknown option: --colour')
    expect(() => parseCliArgs(['a', 'b'])).toThrow('Unexpected argument: b')
  })

  it('throws CliUsageError instances', () => {
    expect(() => parseCliArgs(['-x'])).toThrow(CliUsageError)
  })
})

describe('USAGE', () => {
  it('lists every option', () => {
    for (const flag of ['--output-file', '--history', '--debug', '--init', '--help', '--version']) {
      expect(USAGE).toContain(flag)
    }
  })
})
