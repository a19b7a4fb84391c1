import { describe, it, expect } from 'vitest'
import { filterEntries, highlightMatches } from '../../src/filter-engine.js'
import { pick, seededRandom } from '../helpers/fixtures.js'

const named = (...names: string[]) => names.map((name) => ({ name }))

describe('filterEntries', () => {
  it('returns the identity view for an empty query', () => {
    expect(filterEntries(named('b', 'a', 'c'), '')).toEqual([0, 1, 2])
  })

  it('matches case-insensitive substrings anywhere in the name', () => {
    const entries = named('README.md', 'src', 'readme-old.txt', 'docs')
    expect(filterEntries(entries, 'readme')).toEqual([0, 2])
    expect(filterEntries(entries, 'ME')).toEqual([0, 2])
    expect(filterEntries(entries, 'oc')).toEqual([3])
  })

  it('keeps entry set order', () => {
    // Directories sort first, so banana/ leads the listing
    const entries = named('banana', 'apple.txt', 'avocado.md')
    const view = filterEntries(entries, 'a')
    expect(view).toEqual([0, 1, 2])
    expect(filterEntries(entries, 'ap').map((i) => entries[i].name)).toEqual(['apple.txt'])
  })

  it('returns an empty view when nothing matches', () => {
    expect(filterEntries(named('one', 'two'), 'zzz')).toEqual([])
  })

  it('is idempotent', () => {
    const entries = named('alpha', 'beta', 'gamma', 'delta')
    const once = filterEntries(entries, 'ta')
    const twice = filterEntries(once.map((i) => entries[i]), 'ta').map((i) => once[i])
    expect(twice).toEqual(once)
  })

  it('treats regex metacharacters literally', () => {
    expect(filterEntries(named('a.b', 'axb'), '.')).toEqual([0])
  })
})

describe('highlightMatches', () => {
  it('returns one plain segment without a query', () => {
    expect(highlightMatches('notes.txt', '')).toEqual([{ text: 'notes.txt', match: false }])
  })

  it('marks every occurrence, preserving original case', () => {
    expect(highlightMatches('Banana', 'an')).toEqual([
      { text: 'B', match: false },
      { text: 'an', match: true },
      { text: 'an', match: true },
      { text: 'a', match: false }
    ])
  })

  it('handles a match at the start and end', () => {
    expect(highlightMatches('abcab', 'ab')).toEqual([
      { text: 'ab', match: true },
      { text: 'c', match: false },
      { text: 'ab', match: true }
    ])
  })
})

describe('filterEntries over generated names', () => {
  const alphabet = ['a', 'b', 'A', 'B', 'n', '.', '-', 'é']

  function randomText(random: () => number, maxLength: number): string {
    const length = Math.floor(random() * (maxLength + 1))
    return Array.from({ length }, () => pick(random, alphabet)).join('')
  }

  function isSubsequence(inner: number[], outer: number[]): boolean {
    let cursor = 0
    for (const value of inner) {
      while (cursor < outer.length && outer[cursor] !== value) cursor++
      if (cursor === outer.length) return false
      cursor++
    }
    return true
  }

  for (let seed = 1; seed <= 25; seed++) {
    it(`narrows monotonically as the query grows (seed ${seed})`, () => {
      const random = seededRandom(seed)
      const entries = named(...Array.from({ length: 30 }, () => randomText(random, 8)))

      let query = ''
      let previous = filterEntries(entries, query)
      expect(previous).toEqual(entries.map((_, i) => i))

      for (let step = 0; step < 6; step++) {
        query += pick(random, alphabet)
        const next = filterEntries(entries, query)
        expect(isSubsequence(next, previous)).toBe(true)
        previous = next
      }
    })

    it(`keeps exactly the names containing the query, in order (seed ${seed})`, () => {
      const random = seededRandom(seed * 7919)
      const entries = named(...Array.from({ length: 30 }, () => randomText(random, 8)))
      const query = randomText(random, 2)

      const expected = entries.flatMap((entry, i) =>
        entry.name.toLowerCase().includes(query.toLowerCase()) ? [i] : []
      )
      expect(filterEntries(entries, query)).toEqual(expected)
    })
  }
})
