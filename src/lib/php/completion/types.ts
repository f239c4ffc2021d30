/**
 * Completion Engine Types
 *
 * This file defines all interfaces for the completion pipeline:
 * Source + Cursor → Tokenizer → MatchContext → Matchers (by class) → Ranker
 */

import type { PhpParser } from '../core'
import type { ScopeResolver } from '../scope/resolver'

// ============================================================================
// 1. TOKENIZER TYPES
// ============================================================================

export type TokenKind =
  | 'identifier'
  | 'variable'
  | 'keyword'
  | 'operator'
  | 'string'
  | 'number'
  | 'open-brace'
  | 'close-brace'
  | 'punctuation'
  | 'whitespace'
  | 'comment'
  | 'unknown'
  | 'eof'

export interface Token {
  kind: TokenKind
  text: string
  /** Offset of the first character */
  position: number
  /** Offset just past the last character */
  end: number
  /** String, heredoc or comment still open at end of input */
  unterminated?: boolean
  /** The scanner gave up and this token covers unscanned text */
  degraded?: boolean
}

// ============================================================================
// 2. MATCH CONTEXT TYPES
// ============================================================================

export interface MatchContext {
  /** Trailing significant tokens ending at the cursor (no whitespace, comments or eof) */
  tokens: readonly Token[]
  /** Identifier fragment right before the cursor, without a `$` sigil */
  cursorPrefix: string
  /** The token the prefix was taken from, null when the cursor follows a word break */
  prefixToken: Token | null
  /** Cursor sits inside an unterminated string literal */
  insideString: boolean
  /** Collaborator-supplied extras (container registries, ...) */
  auxInfo: ReadonlyMap<string, unknown>
  scope: ScopeResolver
}

// ============================================================================
// 3. MATCHER TYPES
// ============================================================================

/**
 * Class of context a matcher serves. Matchers of the same class merge their
 * results; the first class that yields anything wins.
 */
export type MatcherClass = 'registry' | 'member' | 'symbol' | 'keyword'

export interface Matcher {
  name: string
  matcherClass: MatcherClass
  /** Consulted even when the cursor is inside a string literal */
  acceptsStringContext?: boolean
  canMatch: (context: MatchContext) => boolean
  getMatches: (context: MatchContext) => Candidate[]
}

// ============================================================================
// 4. CANDIDATE TYPES
// ============================================================================

export type CandidateKind =
  | 'variable'
  | 'class'
  | 'interface'
  | 'trait'
  | 'function'
  | 'method'
  | 'property'
  | 'constant'
  | 'keyword'
  | 'command'
  | 'service'
  | 'parameter'

export interface Candidate {
  kind: CandidateKind
  /** Text that replaces the typed prefix */
  text: string
  /** Display text (may differ from text, e.g. `$name` or `name()`) */
  displayLabel: string
  /** Additional info (e.g. declaring class, value type) */
  detail?: string
}

// ============================================================================
// 5. RANKER TYPES
// ============================================================================

export type MatchType = 'exact' | 'prefix' | 'contains' | 'none'

export interface RankedCandidate extends Candidate {
  matchType: MatchType
}

// ============================================================================
// PIPELINE INPUT/OUTPUT
// ============================================================================

export interface CompletionInput {
  source: string
  cursorOffset: number
  scope: ScopeResolver
}

export interface CompletionOutput {
  candidates: RankedCandidate[]
  /** Text before the cursor the chosen candidate replaces */
  replacedPrefix: string
  /** Name of the matchers whose class won, empty when nothing matched */
  matchedBy: string[]
  timing?: {
    tokenize: number
    match: number
    rank: number
    total: number
  }
}

export type Scanner = Pick<PhpParser, 'scanSync'>
