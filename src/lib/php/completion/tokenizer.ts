/**
 * PHP Tokenizer Module
 *
 * Uses php-parser's tokenGetAll for accurate PHP tokenization.
 * Converts tokens to a normalized format with source offsets. Never throws:
 * an unterminated string, heredoc or comment becomes a single token running to
 * end of input, and text the scanner cannot handle becomes a degraded token.
 */

import { createPhpParser } from '../core'
import type { ScanToken } from '../core'
import type { Scanner, Token, TokenKind } from './types'

/**
 * Default scanner implementation using php-parser.
 */
const defaultScanner: Scanner = createPhpParser()

/**
 * Options for tokenizer.
 */
export interface TokenizerOptions {
  /** Custom scanner for testing */
  parser?: Scanner
}

// Token names with a fixed kind; everything else is classified by its text
const NAMED_KINDS = new Map<string, TokenKind>([
  ['T_WHITESPACE', 'whitespace'],
  ['T_COMMENT', 'comment'],
  ['T_DOC_COMMENT', 'comment'],
  ['T_VARIABLE', 'variable'],
  ['T_STRING', 'identifier'],
  ['T_STRING_VARNAME', 'identifier'],
  ['T_NAME_QUALIFIED', 'identifier'],
  ['T_NAME_FULLY_QUALIFIED', 'identifier'],
  ['T_NAME_RELATIVE', 'identifier'],
  ['T_CONSTANT_ENCAPSED_STRING', 'string'],
  ['T_ENCAPSED_AND_WHITESPACE', 'string'],
  ['T_START_HEREDOC', 'string'],
  ['T_END_HEREDOC', 'string'],
  ['T_NUM_STRING', 'number'],
  ['T_LNUMBER', 'number'],
  ['T_DNUMBER', 'number'],
  ['T_CURLY_OPEN', 'open-brace'],
  ['T_DOLLAR_OPEN_CURLY_BRACES', 'open-brace'],
  ['T_ATTRIBUTE', 'open-brace'],
  ['T_OPEN_TAG', 'punctuation'],
  ['T_OPEN_TAG_WITH_ECHO', 'punctuation'],
  ['T_CLOSE_TAG', 'punctuation'],
  ['T_INLINE_HTML', 'unknown'],
])

const SINGLE_CHAR_KINDS = new Map<string, TokenKind>([
  ['(', 'open-brace'],
  ['[', 'open-brace'],
  ['{', 'open-brace'],
  [')', 'close-brace'],
  [']', 'close-brace'],
  ['}', 'close-brace'],
  [';', 'punctuation'],
  [',', 'punctuation'],
  ['$', 'variable'],
  ['"', 'string'],
  ['`', 'string'],
])

const WORD = /^[A-Za-z_\x80-￿][A-Za-z0-9_\x80-￿]*$/

/**
 * Map a php-parser token to our TokenKind
 */
export function classifyToken(token: ScanToken): TokenKind {
  const { name, text } = token

  const single = SINGLE_CHAR_KINDS.get(text)
  if (single && (name === null || text.length === 1)) {
    return single
  }

  if (name !== null) {
    const named = NAMED_KINDS.get(name)
    if (named) {
      return named
    }
  }

  if (/^\$[A-Za-z_\x80-￿]/.test(text)) {
    return 'variable'
  }
  if (/^\s+$/.test(text)) {
    return 'whitespace'
  }
  // Reserved words come back under their own token names (T_ECHO, T_IF, ...)
  if (WORD.test(text)) {
    return name === null ? 'identifier' : 'keyword'
  }
  if (/^\d/.test(text)) {
    return 'number'
  }
  return 'operator'
}

/**
 * Tokenize PHP source (eval mode, no open tag).
 *
 * @returns tokens in source order, always ending with an `eof` token
 */
export function tokenize(source: string, options?: TokenizerOptions): Token[] {
  const scanner = options?.parser ?? defaultScanner
  const open = findUnterminated(source)
  const scannable = open ? source.slice(0, open.position) : source

  const tokens = scan(scannable, scanner)

  if (open) {
    tokens.push({
      kind: open.kind === 'comment' ? 'comment' : 'string',
      text: source.slice(open.position),
      position: open.position,
      end: source.length,
      unterminated: true,
    })
  }

  tokens.push({ kind: 'eof', text: '', position: source.length, end: source.length })
  return tokens
}

function scan(source: string, scanner: Scanner): Token[] {
  if (!source) {
    return []
  }

  let scanned: ScanToken[]
  try {
    scanned = scanner.scanSync(source)
  } catch (err) {
    console.warn('PHP scanner error:', err)
    return [degradedToken(source, 0)]
  }

  const tokens: Token[] = []
  let offset = 0
  for (const entry of scanned) {
    if (!entry.text) {
      continue
    }
    // Stop at the first token that does not line up with the source
    if (!source.startsWith(entry.text, offset)) {
      break
    }
    const end = offset + entry.text.length
    tokens.push({ kind: classifyToken(entry), text: entry.text, position: offset, end })
    offset = end
  }

  if (offset < source.length) {
    tokens.push(degradedToken(source, offset))
  }
  return tokens
}

function degradedToken(source: string, position: number): Token {
  return {
    kind: 'unknown',
    text: source.slice(position),
    position,
    end: source.length,
    degraded: true,
  }
}

// ============================================================================
// UNTERMINATED CONSTRUCTS
// ============================================================================

export interface OpenConstruct {
  kind: 'string' | 'heredoc' | 'comment'
  /** Offset of the opening quote, `<<<` or `/*` */
  position: number
}

type Frame =
  | { mode: 'interpolation'; depth: number }
  | { mode: 'quoted'; quote: '"' | '`'; start: number }
  | { mode: 'heredoc'; closing: RegExp; nowdoc: boolean; start: number }

const HEREDOC_START = /<<<[ \t]*(['"]?)([A-Za-z_\x80-￿][A-Za-z0-9_\x80-￿]*)\1\r?\n/y
const HEREDOC_PENDING = /<<<[ \t]*['"]?(?:[A-Za-z_\x80-￿][A-Za-z0-9_\x80-￿]*['"]?)?[ \t]*$/y

/**
 * Find a string, heredoc or comment that is still open at end of input.
 * Returns the outermost open construct, or null when everything is closed.
 */
export function findUnterminated(source: string): OpenConstruct | null {
  const stack: Frame[] = []
  const length = source.length
  let i = 0

  while (i < length) {
    const frame = stack.length > 0 ? stack[stack.length - 1] : null
    const ch = source[i]

    if (frame === null || frame.mode === 'interpolation') {
      if (ch === "'") {
        const close = findQuoteEnd(source, i + 1, "'")
        if (close === -1) {
          return { kind: 'string', position: outermostStart(stack, i) }
        }
        i = close + 1
        continue
      }
      if (ch === '"' || ch === '`') {
        stack.push({ mode: 'quoted', quote: ch, start: i })
        i++
        continue
      }
      if ((ch === '#' && source[i + 1] !== '[') || (ch === '/' && source[i + 1] === '/')) {
        const newline = source.indexOf('\n', i)
        i = newline === -1 ? length : newline + 1
        continue
      }
      if (ch === '/' && source[i + 1] === '*') {
        const close = source.indexOf('*/', i + 2)
        if (close === -1) {
          return { kind: 'comment', position: outermostStart(stack, i) }
        }
        i = close + 2
        continue
      }
      if (ch === '<' && source.startsWith('<<<', i)) {
        HEREDOC_START.lastIndex = i
        const start = HEREDOC_START.exec(source)
        if (start) {
          stack.push({
            mode: 'heredoc',
            closing: new RegExp(`[ \\t]*${start[2]}(?![A-Za-z0-9_\\x80-\\uffff])`, 'y'),
            nowdoc: start[1] === "'",
            start: i,
          })
          i = HEREDOC_START.lastIndex
          continue
        }
        HEREDOC_PENDING.lastIndex = i
        if (HEREDOC_PENDING.test(source)) {
          return { kind: 'heredoc', position: outermostStart(stack, i) }
        }
        i += 3
        continue
      }
      if (frame !== null) {
        if (ch === '{') {
          frame.depth++
        } else if (ch === '}') {
          if (frame.depth === 0) {
            stack.pop()
          } else {
            frame.depth--
          }
        }
      }
      i++
      continue
    }

    if (frame.mode === 'heredoc') {
      if (i === 0 || source[i - 1] === '\n') {
        frame.closing.lastIndex = i
        if (frame.closing.test(source)) {
          i = frame.closing.lastIndex
          stack.pop()
          continue
        }
      }
      if (frame.nowdoc) {
        i++
        continue
      }
    } else if (ch === frame.quote) {
      stack.pop()
      i++
      continue
    }

    // Quoted string or heredoc body
    if (ch === '\\') {
      i += 2
      continue
    }
    if ((ch === '{' && source[i + 1] === '$') || (ch === '$' && source[i + 1] === '{')) {
      stack.push({ mode: 'interpolation', depth: 0 })
      i += ch === '{' ? 1 : 2
      continue
    }
    i++
  }

  for (const frame of stack) {
    if (frame.mode !== 'interpolation') {
      return { kind: frame.mode === 'heredoc' ? 'heredoc' : 'string', position: frame.start }
    }
  }
  return null
}

function findQuoteEnd(source: string, from: number, quote: string): number {
  let i = from
  while (i < source.length) {
    if (source[i] === '\\') {
      i += 2
      continue
    }
    if (source[i] === quote) {
      return i
    }
    i++
  }
  return -1
}

function outermostStart(stack: Frame[], fallback: number): number {
  for (const frame of stack) {
    if (frame.mode !== 'interpolation') {
      return frame.start
    }
  }
  return fallback
}

// ============================================================================
// TOKEN QUERIES
// ============================================================================

const INSIGNIFICANT_KINDS = new Set<TokenKind>(['whitespace', 'comment', 'eof'])

/**
 * Tokens that carry syntax: no whitespace, no closed comments, no eof marker.
 * An unterminated comment is kept so callers can see the cursor is inside it.
 */
export function significantTokens(tokens: readonly Token[]): Token[] {
  return tokens.filter(
    (token) => !INSIGNIFICANT_KINDS.has(token.kind) || (token.kind === 'comment' && token.unterminated === true)
  )
}

/**
 * Last token before the eof marker, or null for empty input.
 */
export function lastToken(tokens: readonly Token[]): Token | null {
  for (let i = tokens.length - 1; i >= 0; i--) {
    if (tokens[i].kind !== 'eof') {
      return tokens[i]
    }
  }
  return null
}

/**
 * Check if the token stream ends inside an unterminated string literal.
 */
export function isInsideString(tokens: readonly Token[]): boolean {
  const last = lastToken(tokens)
  return last !== null && last.kind === 'string' && last.unterminated === true
}

/**
 * Check if the token stream ends inside an unterminated comment.
 */
export function isInsideComment(tokens: readonly Token[]): boolean {
  const last = lastToken(tokens)
  return last !== null && last.kind === 'comment' && last.unterminated === true
}
