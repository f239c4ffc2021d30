// tests/php-completion/ranker.test.ts

import { describe, it, expect } from 'vitest'
import {
  computeMatchType,
  isMatch,
  rankCandidates,
  deduplicateCandidates,
  limitCandidates,
  compareText,
} from '../../src/lib/php/completion/ranker'
import type { Candidate, MatchType } from '../../src/lib/php/completion/types'

// ============================================================================
// TEST CASE TYPES
// ============================================================================

interface MatchTypeTestCase {
  name: string
  value: string
  partial: string | null
  expected: MatchType
}

interface RankingTestCase {
  name: string
  candidates: string[]
  partial: string | null
  expectedOrder: string[]
}

// ============================================================================
// TEST DATA
// ============================================================================

const matchTypeTests: MatchTypeTestCase[] = [
  { name: 'exact match', value: 'foo', partial: 'foo', expected: 'exact' },
  { name: 'exact match ignores case', value: 'Foo', partial: 'fOO', expected: 'exact' },
  { name: 'prefix match', value: 'foobar', partial: 'foo', expected: 'prefix' },
  { name: 'contains match', value: 'str_replace', partial: 'repl', expected: 'contains' },
  { name: 'no match', value: 'count', partial: 'xyz', expected: 'none' },
  { name: 'no partial', value: 'count', partial: null, expected: 'none' },
  { name: 'empty partial', value: 'count', partial: '', expected: 'none' },
  { name: 'ignores static property sigil', value: '$instance', partial: 'ins', expected: 'prefix' },
  { name: 'keeps sigil when typed', value: '$instance', partial: '$ins', expected: 'prefix' },
  { name: 'ignores leading namespace separator', value: '\\DateTime', partial: 'Date', expected: 'prefix' },
]

const rankingTests: RankingTestCase[] = [
  {
    name: 'exact before prefix before contains',
    candidates: ['unfoo', 'foobar', 'foo'],
    partial: 'foo',
    expectedOrder: ['foo', 'foobar', 'unfoo'],
  },
  {
    name: 'alphabetical within a tier, case-insensitive',
    candidates: ['foobar', 'FooAlpha', 'fooZ'],
    partial: 'foo',
    expectedOrder: ['FooAlpha', 'foobar', 'fooZ'],
  },
  {
    name: 'alphabetical without a partial',
    candidates: ['zeta', 'Alpha', 'beta'],
    partial: null,
    expectedOrder: ['Alpha', 'beta', 'zeta'],
  },
  {
    name: 'drops non-matching candidates',
    candidates: ['foo', 'bar'],
    partial: 'fo',
    expectedOrder: ['foo'],
  },
  {
    name: 'identical lowercase keeps production order',
    candidates: ['Foo', 'foo'],
    partial: 'f',
    expectedOrder: ['Foo', 'foo'],
  },
]

function candidate(text: string, kind: Candidate['kind'] = 'function'): Candidate {
  return { kind, text, displayLabel: text }
}

// ============================================================================
// TESTS
// ============================================================================

describe('ranker', () => {
  describe('computeMatchType', () => {
    for (const tc of matchTypeTests) {
      it(tc.name, () => {
        expect(computeMatchType(tc.value, tc.partial)).toBe(tc.expected)
      })
    }
  })

  describe('isMatch', () => {
    it('matches everything for an empty partial', () => {
      expect(isMatch('anything', '')).toBe(true)
      expect(isMatch('anything', null)).toBe(true)
    })

    it('rejects values without the partial', () => {
      expect(isMatch('count', 'xyz')).toBe(false)
    })
  })

  describe('rankCandidates', () => {
    for (const tc of rankingTests) {
      it(tc.name, () => {
        const ranked = rankCandidates(tc.candidates.map((text) => candidate(text)), tc.partial)
        expect(ranked.map((c) => c.text)).toEqual(tc.expectedOrder)
      })
    }

    it('attaches the match type', () => {
      const ranked = rankCandidates([candidate('foobar')], 'foo')
      expect(ranked).toEqual([{ kind: 'function', text: 'foobar', displayLabel: 'foobar', matchType: 'prefix' }])
    })

    it('is deterministic for the same input', () => {
      const input = ['b', 'a', 'ab', 'ba', 'A'].map((text) => candidate(text))
      const first = rankCandidates(input, 'a').map((c) => c.text)
      const second = rankCandidates([...input], 'a').map((c) => c.text)
      expect(first).toEqual(second)
      expect(first).toEqual(['a', 'A', 'ab', 'ba'])
    })
  })

  describe('deduplicateCandidates', () => {
    it('keeps the first candidate for each text', () => {
      const result = deduplicateCandidates([candidate('count', 'function'), candidate('count', 'keyword')])
      expect(result).toEqual([candidate('count', 'function')])
    })

    it('treats different case as different text', () => {
      expect(deduplicateCandidates([candidate('Foo'), candidate('foo')])).toHaveLength(2)
    })
  })

  describe('limitCandidates', () => {
    it('limits to 50 by default', () => {
      const many = Array.from({ length: 60 }, (_, i) => i)
      expect(limitCandidates(many)).toHaveLength(50)
    })

    it('respects an explicit limit', () => {
      expect(limitCandidates([1, 2, 3], 2)).toEqual([1, 2])
    })
  })

  it('compareText orders by lowercase codepoints', () => {
    expect(compareText('_a', 'a')).toBeLessThan(0)
    expect(compareText('B', 'a')).toBeGreaterThan(0)
    expect(compareText('ABC', 'abc')).toBe(0)
  })
})
