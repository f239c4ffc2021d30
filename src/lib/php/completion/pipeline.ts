/**
 * Completion Pipeline Orchestrator
 *
 * Coordinates all modules to produce completion candidates:
 * Source + Cursor → Tokenize → MatchContext → Matchers (first class wins) → Rank
 */

import type { ScopeResolver } from '../scope/resolver'
import type { Candidate, CompletionInput, CompletionOutput, MatchContext, Matcher, Scanner } from './types'
import { tokenize, isInsideComment } from './tokenizer'
import { buildMatchContext, DEFAULT_WINDOW_SIZE } from './context'
import { createDefaultMatchers } from './matchers'
import { rankCandidates, limitCandidates, DEFAULT_MAX_CANDIDATES } from './ranker'

export interface PipelineOptions {
  /** Ordered matcher list; defaults to createDefaultMatchers() */
  matchers?: Matcher[]
  /** Number of trailing significant tokens matchers see */
  windowSize?: number
  maxCandidates?: number
  /** Enable timing measurements */
  measureTiming?: boolean
  /** Custom scanner for testing (injectable dependency) */
  parser?: Scanner
}

const DEFAULT_OPTIONS: Omit<Required<PipelineOptions>, 'parser' | 'matchers'> = {
  windowSize: DEFAULT_WINDOW_SIZE,
  maxCandidates: DEFAULT_MAX_CANDIDATES,
  measureTiming: false,
}

let defaultMatchers: Matcher[] | null = null

function getDefaultMatchers(): Matcher[] {
  if (!defaultMatchers) {
    defaultMatchers = createDefaultMatchers()
  }
  return defaultMatchers
}

export interface MatcherRun {
  candidates: Candidate[]
  /** Names of the matchers that contributed */
  matchedBy: string[]
}

function safeMatch(matcher: Matcher, context: MatchContext): Candidate[] {
  try {
    if (!matcher.canMatch(context)) return []
    return matcher.getMatches(context)
  } catch (err) {
    console.warn(`Matcher ${matcher.name} failed:`, err)
    return []
  }
}

/**
 * Consult matchers in order. Consecutive matchers of the same class merge their
 * results; once a class produces anything, later classes are skipped.
 * Inside a string literal only matchers that accept string context run.
 */
export function runMatchers(matchers: readonly Matcher[], context: MatchContext): MatcherRun {
  const candidates: Candidate[] = []
  const matchedBy: string[] = []
  let currentClass: Matcher['matcherClass'] | null = null

  for (const matcher of matchers) {
    if (matcher.matcherClass !== currentClass) {
      if (candidates.length > 0) break
      currentClass = matcher.matcherClass
    }
    if (context.insideString && !matcher.acceptsStringContext) continue

    const matches = safeMatch(matcher, context)
    if (matches.length > 0) {
      candidates.push(...matches)
      matchedBy.push(matcher.name)
    }
  }

  return { candidates, matchedBy }
}

/**
 * Run the complete completion pipeline.
 */
export function runCompletionPipeline(input: CompletionInput, options?: PipelineOptions): CompletionOutput {
  const opts = {
    windowSize: options?.windowSize ?? DEFAULT_OPTIONS.windowSize,
    maxCandidates: options?.maxCandidates ?? DEFAULT_OPTIONS.maxCandidates,
    measureTiming: options?.measureTiming ?? DEFAULT_OPTIONS.measureTiming,
    parser: options?.parser,
  }
  const matchers = options?.matchers ?? getDefaultMatchers()
  const timing: CompletionOutput['timing'] = opts.measureTiming
    ? { tokenize: 0, match: 0, rank: 0, total: 0 }
    : undefined

  const totalStart = opts.measureTiming ? performance.now() : 0
  const cursor = Math.max(0, Math.min(input.cursorOffset, input.source.length))

  // 1. Tokenize only what precedes the cursor
  const tokenizeStart = opts.measureTiming ? performance.now() : 0
  const tokens = tokenize(input.source.slice(0, cursor), { parser: opts.parser })
  if (timing) timing.tokenize = performance.now() - tokenizeStart

  if (isInsideComment(tokens)) {
    if (timing) timing.total = performance.now() - totalStart
    return { candidates: [], replacedPrefix: '', matchedBy: [], timing }
  }

  // 2. Match
  const matchStart = opts.measureTiming ? performance.now() : 0
  const context = buildMatchContext(tokens, input.scope, opts.windowSize)
  const run = runMatchers(matchers, context)
  if (timing) timing.match = performance.now() - matchStart

  // 3. Rank
  const rankStart = opts.measureTiming ? performance.now() : 0
  const ranked = limitCandidates(rankCandidates(run.candidates, context.cursorPrefix), opts.maxCandidates)
  if (timing) timing.rank = performance.now() - rankStart

  if (timing) timing.total = performance.now() - totalStart

  return {
    candidates: ranked,
    replacedPrefix: context.insideString && ranked.length === 0 ? '' : context.cursorPrefix,
    matchedBy: run.matchedBy,
    timing,
  }
}

/**
 * Create a configured pipeline runner.
 */
export function createPipeline(defaultOptions?: PipelineOptions) {
  return (input: CompletionInput, overrideOptions?: PipelineOptions) => {
    return runCompletionPipeline(input, { ...defaultOptions, ...overrideOptions })
  }
}

/**
 * Convenience function for quick completion.
 */
export function complete(source: string, cursorOffset: number, scope: ScopeResolver): CompletionOutput {
  return runCompletionPipeline({ source, cursorOffset, scope })
}
