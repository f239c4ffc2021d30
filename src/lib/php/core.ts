import { Engine } from 'php-parser'

// ============ Parser Types ============

/**
 * Why a parse failed, as far as the REPL cares:
 * - unexpected-eof: the parser ran out of input while still expecting more
 * - unterminated: a string, heredoc or comment reached end of input
 * - unexpected-token: a token the grammar cannot accept at that point
 * - unknown: anything the adapter could not classify
 */
export type ParseErrorKind = 'unexpected-eof' | 'unterminated' | 'unexpected-token' | 'unknown'

export interface ErrorInfo {
  message: string
  kind: ParseErrorKind
  /** 0-indexed character offset into the parsed source */
  position: number
}

export type ParseResult = { ok: true } | { ok: false; error: ErrorInfo }

/**
 * Token as produced by the scanner, before classification.
 * `name` is the PHP token name (T_VARIABLE, ...) or null for single-character tokens.
 */
export interface ScanToken {
  name: string | null
  text: string
}

/**
 * PHP parser dependency.
 * Allows injection of stub parsers for testing.
 */
export interface PhpParser {
  /** Parse source in eval mode (no leading `<?php`) */
  parseSync: (source: string) => ParseResult
  /** Scan source in eval mode; throws when the scanner cannot continue */
  scanSync: (source: string) => ScanToken[]
}

// ============ Engine ============

const OPEN_TAG = '<?php '

let engine: Engine | null = null

function getEngine(): Engine {
  if (!engine) {
    engine = new Engine({
      parser: { extractDoc: false, suppressErrors: false },
      ast: { withPositions: false },
    })
  }
  return engine
}

/**
 * Default parser implementation using php-parser.
 */
export function createPhpParser(): PhpParser {
  return {
    parseSync: (source) => {
      try {
        getEngine().parseEval(source)
        return { ok: true }
      } catch (err) {
        return { ok: false, error: toErrorInfo(err, source) }
      }
    },
    scanSync: (source) => {
      const raw: unknown = getEngine().tokenGetAll(OPEN_TAG + source)
      if (!Array.isArray(raw)) {
        throw new Error('php-parser returned no token list')
      }
      // tokenGetAll needs an open tag; drop its characters so offsets match the source
      let skip = OPEN_TAG.length
      const tokens: ScanToken[] = []
      for (const entry of raw) {
        const token = toScanToken(entry)
        if (skip > 0) {
          if (token.text.length <= skip) {
            skip -= token.text.length
            continue
          }
          tokens.push({ name: token.name, text: token.text.slice(skip) })
          skip = 0
          continue
        }
        tokens.push(token)
      }
      return tokens
    },
  }
}

function toScanToken(entry: unknown): ScanToken {
  if (typeof entry === 'string') {
    return { name: null, text: entry }
  }
  if (Array.isArray(entry) && typeof entry[0] === 'string' && typeof entry[1] === 'string') {
    return { name: entry[0], text: entry[1] }
  }
  throw new Error(`Unexpected token entry from php-parser: ${JSON.stringify(entry)}`)
}

// ============ Error Classification ============

function toErrorInfo(err: unknown, source: string): ErrorInfo {
  // Location travels as `position`; drop php-parser's own " on line N" suffix
  const message = (err instanceof Error ? err.message : String(err)).replace(/ on line \d+$/, '')

  if (!(err instanceof SyntaxError)) {
    return { message, kind: 'unknown', position: source.length }
  }

  const line = numericField(err, 'lineNumber')
  const column = numericField(err, 'columnNumber')
  const position = line === null ? source.length : offsetAt(source, line, column ?? 0)

  return { message, kind: classifyError(message, position, source), position }
}

function numericField(err: Error, field: 'lineNumber' | 'columnNumber'): number | null {
  if (field in err) {
    const value: unknown = Reflect.get(err, field)
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value
    }
  }
  return null
}

/**
 * php-parser reports end-of-input failures as a "Parse Error" located after the last
 * character. Its other "Parse Error"s name the unexpected token; compile-time errors
 * ("Fatal Error : Cannot use empty list") are left unclassified.
 */
function classifyError(message: string, position: number, source: string): ParseErrorKind {
  if (/unterminated|unclosed/i.test(message)) {
    return 'unterminated'
  }
  if (!/^\s*Parse Error/i.test(message)) {
    return 'unknown'
  }
  if (position >= source.trimEnd().length) {
    return 'unexpected-eof'
  }
  return 'unexpected-token'
}

/**
 * Convert a 1-based line and 0-based column into a character offset.
 */
export function offsetAt(source: string, line: number, column: number): number {
  let offset = 0
  for (let current = 1; current < line; current++) {
    const newline = source.indexOf('\n', offset)
    if (newline === -1) {
      return source.length
    }
    offset = newline + 1
  }
  return Math.min(source.length, Math.max(0, offset + column))
}
