import { describe, it, expect } from 'vitest'
import type { Key } from 'ink'
import { keysFor, toNavigatorKeys } from '../../src/key-bindings.js'

function inkKey(overrides: Partial<Key> = {}): Key {
  return {
    upArrow: false,
    downArrow: false,
    leftArrow: false,
    rightArrow: false,
    pageDown: false,
    pageUp: false,
    return: false,
    escape: false,
    ctrl: false,
    shift: false,
    tab: false,
    backspace: false,
    delete: false,
    meta: false,
    ...overrides
  }
}

describe('toNavigatorKeys', () => {
  it('maps arrows, paging, enter and escape', () => {
    expect(toNavigatorKeys('', inkKey({ upArrow: true }))).toEqual([{ kind: 'up' }])
    expect(toNavigatorKeys('', inkKey({ downArrow: true }))).toEqual([{ kind: 'down' }])
    expect(toNavigatorKeys('', inkKey({ leftArrow: true }))).toEqual([{ kind: 'left' }])
    expect(toNavigatorKeys('', inkKey({ rightArrow: true }))).toEqual([{ kind: 'right' }])
    expect(toNavigatorKeys('', inkKey({ pageUp: true }))).toEqual([{ kind: 'pageUp' }])
    expect(toNavigatorKeys('', inkKey({ pageDown: true }))).toEqual([{ kind: 'pageDown' }])
    expect(toNavigatorKeys('\r', inkKey({ return: true }))).toEqual([{ kind: 'enter' }])
    expect(toNavigatorKeys('', inkKey({ escape: true }))).toEqual([{ kind: 'escape' }])
  })

  it('treats Tab as confirm but ignores Shift+Tab', () => {
    expect(toNavigatorKeys('\t', inkKey({ tab: true }))).toEqual([{ kind: 'confirm' }])
    expect(toNavigatorKeys('', inkKey({ tab: true, shift: true }))).toEqual([])
  })

  it('maps Ctrl+C to interrupt', () => {
    expect(toNavigatorKeys('c', inkKey({ ctrl: true }))).toEqual([{ kind: 'interrupt' }])
    expect(toNavigatorKeys('\x03', inkKey())).toEqual([{ kind: 'interrupt' }])
  })

  it('maps backspace and delete to backspace', () => {
    expect(toNavigatorKeys('', inkKey({ backspace: true }))).toEqual([{ kind: 'backspace' }])
    expect(toNavigatorKeys('', inkKey({ delete: true }))).toEqual([{ kind: 'backspace' }])
  })

  it('ignores other control and meta chords', () => {
    expect(toNavigatorKeys('x', inkKey({ ctrl: true }))).toEqual([])
    expect(toNavigatorKeys('x', inkKey({ meta: true }))).toEqual([])
  })

  it('passes printable text through as characters', () => {
    expect(toNavigatorKeys('j', inkKey())).toEqual([{ kind: 'char', char: 'j' }])
    expect(toNavigatorKeys('é', inkKey())).toEqual([{ kind: 'char', char: 'é' }])
  })

  it('splits pasted text into characters', () => {
    expect(toNavigatorKeys('ab', inkKey())).toEqual([
      { kind: 'char', char: 'a' },
      { kind: 'char', char: 'b' }
    ])
  })

  it('drops input containing control characters', () => {
    expect(toNavigatorKeys('a\x1bb', inkKey())).toEqual([])
    expect(toNavigatorKeys('', inkKey())).toEqual([])
  })
})

describe('keysFor', () => {
  it('splits by code point', () => {
    expect(keysFor('/📁')).toEqual([
      { kind: 'char', char: '/' },
      { kind: 'char', char: '📁' }
    ])
  })
})
