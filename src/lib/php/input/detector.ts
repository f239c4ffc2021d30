/**
 * Incompleteness Detector
 *
 * Decides whether buffered input is a complete statement, a statement that
 * needs more lines, or a syntax error that more lines cannot fix.
 */

import { createPhpParser } from '../core'
import type { ErrorInfo, ParseResult, PhpParser } from '../core'
import type { Token } from '../completion/types'
import { tokenize, significantTokens, lastToken, findUnterminated } from '../completion/tokenizer'
import type { OpenConstruct } from '../completion/tokenizer'

export type InputStatus = 'COMPLETE' | 'INCOMPLETE' | 'SYNTAX_ERROR'

export interface DetectionResult {
  status: InputStatus
  /** Code to execute; carries the added semicolon when one was needed */
  code: string
  error: ErrorInfo | null
}

export interface DetectorOptions {
  /** Custom parser for testing (injectable dependency) */
  parser?: PhpParser
  /** When false, a statement missing only its final `;` is still complete */
  requireSemicolons?: boolean
}

const defaultParser: PhpParser = createPhpParser()

/**
 * Classify buffered input.
 */
export function detect(source: string, options?: DetectorOptions): DetectionResult {
  const parser = options?.parser ?? defaultParser

  if (source.trim() === '') {
    return { status: 'COMPLETE', code: '', error: null }
  }

  const result = parser.parseSync(source)
  // php-parser accepts some strings and comments that run to end of input
  const open = findUnterminated(source)

  if (open === null) {
    if (result.ok) {
      return { status: 'COMPLETE', code: source, error: null }
    }
    if (!options?.requireSemicolons) {
      const patched = `${source}\n;`
      if (parser.parseSync(patched).ok) {
        return { status: 'COMPLETE', code: patched, error: null }
      }
    }
  }

  const error = failureOf(result, open, source)
  return {
    status: classifyFailure(source, error, parser),
    code: source,
    error,
  }
}

function failureOf(result: ParseResult, open: OpenConstruct | null, source: string): ErrorInfo {
  if (!result.ok) {
    return result.error
  }
  return {
    message: `Unterminated ${open?.kind ?? 'input'}`,
    kind: 'unterminated',
    position: open?.position ?? source.length,
  }
}

function classifyFailure(source: string, error: ErrorInfo, parser: PhpParser): InputStatus {
  const tokens = tokenize(source, { parser })
  const significant = significantTokens(tokens)
  const brackets = scanBrackets(significant)

  // Nothing appended can balance a closer that has no opener
  if (brackets.strayCloser) {
    return 'SYNTAX_ERROR'
  }

  if (error.kind === 'unexpected-eof' || error.kind === 'unterminated') {
    return 'INCOMPLETE'
  }

  const tail = lastToken(tokens)
  if (tail && tail.unterminated && tail.position <= error.position) {
    return 'INCOMPLETE'
  }

  if (brackets.unclosed.length > 0 && brackets.unclosed[0].position <= error.position) {
    return 'INCOMPLETE'
  }

  const lastSignificant = significant.length > 0 ? significant[significant.length - 1] : null
  if (lastSignificant && error.position >= lastSignificant.end) {
    return 'INCOMPLETE'
  }

  return 'SYNTAX_ERROR'
}

// ============================================================================
// BRACKETS
// ============================================================================

export interface BracketScan {
  /** Openers still waiting for a closer, outermost first */
  unclosed: Token[]
  /** First closer that does not match the innermost opener */
  strayCloser: Token | null
}

const CLOSER_FOR: Record<string, string> = {
  '(': ')',
  '[': ']',
  '{': '}',
}

/**
 * Match bracket tokens. Brackets inside strings and comments are already folded
 * into their string or comment tokens.
 */
export function scanBrackets(tokens: readonly Token[]): BracketScan {
  const stack: Token[] = []

  for (const token of tokens) {
    if (token.kind === 'open-brace') {
      stack.push(token)
      continue
    }
    if (token.kind !== 'close-brace') continue

    const opener = stack.length > 0 ? stack[stack.length - 1] : null
    // `${` and `#[` close like their last character
    if (!opener || CLOSER_FOR[opener.text.slice(-1)] !== token.text) {
      return { unclosed: stack, strayCloser: token }
    }
    stack.pop()
  }

  return { unclosed: stack, strayCloser: null }
}
