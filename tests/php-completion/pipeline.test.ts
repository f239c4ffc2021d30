// tests/php-completion/pipeline.test.ts

import { describe, it, expect, vi, afterEach } from 'vitest'
import { runCompletionPipeline, createPipeline, complete } from '../../src/lib/php/completion/pipeline'
import { createSnapshotResolver } from '../../src/lib/php/scope/resolver'
import type { Candidate, Matcher, MatcherClass } from '../../src/lib/php/completion/types'
import { objectVariable, snapshotOf, withCursor } from '../test-utils'

// ============================================================================
// FIXTURE
// ============================================================================

const scope = createSnapshotResolver(
  snapshotOf({
    variables: { myVar: objectVariable('stdClass', ['foo', 'bar']) },
    functions: ['foo', 'foobar'],
    registries: { 'symfony.services': ['doctrine', 'logger'] },
  })
)

function fixedMatcher(name: string, matcherClass: MatcherClass, words: string[]): Matcher {
  return {
    name,
    matcherClass,
    canMatch: () => true,
    getMatches: (): Candidate[] => words.map((text) => ({ kind: 'keyword', text, displayLabel: text })),
  }
}

// ============================================================================
// TEST CASE TYPES
// ============================================================================

interface PipelineTestCase {
  name: string
  /** Source with `|` marking the cursor (end of source when absent) */
  input: string
  expected: string[]
  replacedPrefix: string
  matchedBy: string[]
}

// ============================================================================
// TEST DATA
// ============================================================================

const pipelineTests: PipelineTestCase[] = [
  {
    name: 'dynamic properties after arrow',
    input: '$myVar->',
    expected: ['bar', 'foo'],
    replacedPrefix: '',
    matchedBy: ['object-members'],
  },
  {
    name: 'functions by prefix',
    input: 'fo',
    expected: ['foo', 'foobar'],
    replacedPrefix: 'fo',
    matchedBy: ['functions'],
  },
  {
    name: 'cursor in the middle of the line',
    input: '$myVar->fo| + 1',
    expected: ['foo'],
    replacedPrefix: 'fo',
    matchedBy: ['object-members'],
  },
  {
    name: 'service ids inside a string',
    input: "$container->get('lo",
    expected: ['logger'],
    replacedPrefix: 'lo',
    matchedBy: ['symfony-services'],
  },
  {
    name: 'nothing inside a plain string',
    input: "echo 'fo",
    expected: [],
    replacedPrefix: '',
    matchedBy: [],
  },
  {
    name: 'nothing inside an open comment',
    input: '/* fo',
    expected: [],
    replacedPrefix: '',
    matchedBy: [],
  },
]

// ============================================================================
// TESTS
// ============================================================================

describe('completion pipeline', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  for (const tc of pipelineTests) {
    it(tc.name, () => {
      const { source, cursor } = withCursor(tc.input)
      const result = runCompletionPipeline({ source, cursorOffset: cursor, scope })
      expect(result.candidates.map((c) => c.text)).toEqual(tc.expected)
      expect(result.replacedPrefix).toBe(tc.replacedPrefix)
      expect(result.matchedBy).toEqual(tc.matchedBy)
    })
  }

  it('offers statement keywords for empty input', () => {
    const result = complete('', 0, scope)
    expect(result.candidates.map((c) => c.text)).toContain('echo')
    expect(result.replacedPrefix).toBe('')
  })

  it('is deterministic', () => {
    const first = complete('fo', 2, scope)
    const second = complete('fo', 2, scope)
    expect(second.candidates).toEqual(first.candidates)
  })

  it('clamps the cursor to the source', () => {
    expect(complete('fo', 99, scope).candidates.map((c) => c.text)).toEqual(['foo', 'foobar'])
  })

  it('first class with results wins', () => {
    const result = runCompletionPipeline(
      { source: '', cursorOffset: 0, scope },
      {
        matchers: [
          fixedMatcher('empty-members', 'member', []),
          fixedMatcher('symbols-a', 'symbol', ['beta']),
          fixedMatcher('symbols-b', 'symbol', ['alpha']),
          fixedMatcher('keywords', 'keyword', ['gamma']),
        ],
      }
    )
    expect(result.candidates.map((c) => c.text)).toEqual(['alpha', 'beta'])
    expect(result.matchedBy).toEqual(['symbols-a', 'symbols-b'])
  })

  it('skips a failing matcher and warns', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const broken: Matcher = {
      name: 'broken',
      matcherClass: 'symbol',
      canMatch: () => {
        throw new Error('boom')
      },
      getMatches: () => [],
    }
    const result = runCompletionPipeline(
      { source: '', cursorOffset: 0, scope },
      { matchers: [broken, fixedMatcher('fallback', 'symbol', ['ok'])] }
    )
    expect(result.candidates.map((c) => c.text)).toEqual(['ok'])
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('only string-aware matchers run inside a string', () => {
    const stringAware: Matcher = { ...fixedMatcher('aware', 'keyword', ['inside']), acceptsStringContext: true }
    const result = runCompletionPipeline(
      { source: "echo '", cursorOffset: 6, scope },
      { matchers: [fixedMatcher('plain', 'symbol', ['outside']), stringAware] }
    )
    expect(result.candidates.map((c) => c.text)).toEqual(['inside'])
  })

  it('limits candidates', () => {
    const result = runCompletionPipeline({ source: 'fo', cursorOffset: 2, scope }, { maxCandidates: 1 })
    expect(result.candidates.map((c) => c.text)).toEqual(['foo'])
  })

  it('measures timing when asked', () => {
    expect(complete('fo', 2, scope).timing).toBeUndefined()
    const timed = runCompletionPipeline({ source: 'fo', cursorOffset: 2, scope }, { measureTiming: true })
    expect(timed.timing?.total).toBeGreaterThanOrEqual(0)
  })

  it('createPipeline applies its defaults', () => {
    const run = createPipeline({ maxCandidates: 1 })
    expect(run({ source: 'fo', cursorOffset: 2, scope }).candidates).toHaveLength(1)
    expect(run({ source: 'fo', cursorOffset: 2, scope }, { maxCandidates: 5 }).candidates).toHaveLength(2)
  })
})
