/**
 * Match Context Module
 *
 * Builds the view every matcher sees: the trailing window of significant
 * tokens before the cursor, the typed prefix and the collaborator extras.
 */

import type { ScopeResolver } from '../scope/resolver'
import type { MatchContext, Token } from './types'
import { lastToken, significantTokens } from './tokenizer'

export const DEFAULT_WINDOW_SIZE = 10

const STRING_PREFIX = /^['"]([A-Za-z0-9_.\-:\\/]*)$/

interface Prefix {
  text: string
  token: Token | null
}

/**
 * Take the identifier fragment the last token contributes at the cursor.
 */
export function extractPrefix(token: Token | null): Prefix {
  if (!token) {
    return { text: '', token: null }
  }

  switch (token.kind) {
    case 'variable':
      return { text: token.text.replace(/^\$+/, ''), token }
    case 'identifier':
    case 'keyword':
      return { text: token.text, token }
    case 'string': {
      if (!token.unterminated) {
        return { text: '', token: null }
      }
      const match = STRING_PREFIX.exec(token.text)
      return { text: match ? match[1] : '', token }
    }
    default:
      return { text: '', token: null }
  }
}

/**
 * Build the match context from tokens of the source before the cursor.
 */
export function buildMatchContext(
  tokens: readonly Token[],
  scope: ScopeResolver,
  windowSize: number = DEFAULT_WINDOW_SIZE
): MatchContext {
  const last = lastToken(tokens)
  const prefix = extractPrefix(last)
  const window = significantTokens(tokens).slice(-Math.max(1, windowSize))

  return {
    tokens: window,
    cursorPrefix: prefix.text,
    prefixToken: prefix.token,
    insideString: last !== null && last.kind === 'string' && last.unterminated === true,
    auxInfo: readAuxInfo(scope),
    scope,
  }
}

function readAuxInfo(scope: ScopeResolver): ReadonlyMap<string, unknown> {
  try {
    return scope.auxInfo()
  } catch (err) {
    console.warn('Scope auxInfo failed:', err)
    return new Map()
  }
}

/**
 * Window tokens that precede the prefix token.
 */
export function leadingTokens(context: MatchContext): readonly Token[] {
  const { tokens, prefixToken } = context
  if (prefixToken && tokens.length > 0 && tokens[tokens.length - 1] === prefixToken) {
    return tokens.slice(0, -1)
  }
  return tokens
}

/**
 * The token right before the prefix, or null at the start of the window.
 */
export function previousToken(context: MatchContext): Token | null {
  const leading = leadingTokens(context)
  return leading.length > 0 ? leading[leading.length - 1] : null
}
