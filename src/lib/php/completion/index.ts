/**
 * PHP Completion Pipeline
 *
 * Context-aware completion for an interactive PHP shell:
 * - Error-tolerant tokenization (unterminated strings, heredocs, comments)
 * - Ordered matchers grouped by context class, first class with results wins
 * - Members resolved through live object types and class hierarchies
 * - Deterministic ranking by match tier and name
 *
 * @example
 * ```ts
 * import { complete } from './completion'
 *
 * const result = complete('$user->na', 9, resolver)
 *
 * console.log(result.candidates) // [{ text: 'name', kind: 'property', ... }]
 * console.log(result.replacedPrefix) // 'na'
 * ```
 */

// Pipeline
export { runCompletionPipeline, runMatchers, createPipeline, complete } from './pipeline'
export type { PipelineOptions, MatcherRun } from './pipeline'

// Types
export type {
  Token,
  TokenKind,
  MatchContext,
  MatcherClass,
  Matcher,
  CandidateKind,
  Candidate,
  MatchType,
  RankedCandidate,
  CompletionInput,
  CompletionOutput,
  Scanner,
} from './types'

// Individual modules (for advanced usage)
export { tokenize, findUnterminated, significantTokens, isInsideString, isInsideComment } from './tokenizer'
export { buildMatchContext, leadingTokens, DEFAULT_WINDOW_SIZE } from './context'
export {
  createDefaultMatchers,
  createObjectMemberMatcher,
  createStaticMemberMatcher,
  createVariableMatcher,
  createClassNameMatcher,
  createFunctionMatcher,
  createConstantMatcher,
  createCommandMatcher,
  createStatementStartMatcher,
  createKeywordMatcher,
} from './matchers'
export { createRegistryMatcher, createContainerMatchers } from './registry-matchers'
export { rankCandidates, computeMatchType, isMatch, deduplicateCandidates, limitCandidates } from './ranker'
