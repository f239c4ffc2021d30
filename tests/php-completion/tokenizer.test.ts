// tests/php-completion/tokenizer.test.ts

import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  tokenize,
  findUnterminated,
  significantTokens,
  isInsideString,
  isInsideComment,
  classifyToken,
} from '../../src/lib/php/completion/tokenizer'
import type { OpenConstruct } from '../../src/lib/php/completion/tokenizer'
import type { TokenKind } from '../../src/lib/php/completion/types'
import type { ScanToken } from '../../src/lib/php/core'

// ============================================================================
// TEST CASE TYPES
// ============================================================================

interface KindsTestCase {
  name: string
  source: string
  expectedKinds: TokenKind[]
}

interface UnterminatedTestCase {
  name: string
  source: string
  expected: OpenConstruct | null
}

interface ClassifyTestCase {
  name: string
  token: ScanToken
  expected: TokenKind
}

// ============================================================================
// TEST DATA
// ============================================================================

const kindsTests: KindsTestCase[] = [
  {
    name: 'tokenizes member access',
    source: '$myVar->fo',
    expectedKinds: ['variable', 'operator', 'identifier', 'eof'],
  },
  {
    name: 'tokenizes echo statement',
    source: 'echo "hi";',
    expectedKinds: ['keyword', 'whitespace', 'string', 'punctuation', 'eof'],
  },
  {
    name: 'tokenizes arithmetic',
    source: '$x = 1 + 2.5;',
    expectedKinds: [
      'variable', 'whitespace', 'operator', 'whitespace', 'number',
      'whitespace', 'operator', 'whitespace', 'number', 'punctuation', 'eof',
    ],
  },
  {
    name: 'tokenizes braces',
    source: 'if (true) {',
    expectedKinds: ['keyword', 'whitespace', 'open-brace', 'identifier', 'close-brace', 'whitespace', 'open-brace', 'eof'],
  },
  {
    name: 'tokenizes static access',
    source: 'Foo::bar',
    expectedKinds: ['identifier', 'operator', 'identifier', 'eof'],
  },
  {
    name: 'folds unterminated string into one token',
    source: "echo 'abc",
    expectedKinds: ['keyword', 'whitespace', 'string', 'eof'],
  },
  {
    name: 'folds unterminated comment into one token',
    source: '/* open',
    expectedKinds: ['comment', 'eof'],
  },
  {
    name: 'empty input is just eof',
    source: '',
    expectedKinds: ['eof'],
  },
]

const unterminatedTests: UnterminatedTestCase[] = [
  { name: 'closed single-quoted string', source: "echo 'abc';", expected: null },
  { name: 'open single-quoted string', source: "echo 'abc", expected: { kind: 'string', position: 5 } },
  { name: 'escaped quote keeps string open', source: "'it\\'s", expected: { kind: 'string', position: 0 } },
  { name: 'open double-quoted string after closed one', source: '"a" . "b', expected: { kind: 'string', position: 6 } },
  { name: 'interpolation with nested quotes', source: '"{$a["k"]}"', expected: null },
  { name: 'open string inside interpolation reports outer string', source: '"x {$a["k', expected: { kind: 'string', position: 0 } },
  { name: 'quote inside line comment', source: "# it's fine\n$a", expected: null },
  { name: 'attribute is not a comment', source: "#[Attr('x", expected: { kind: 'string', position: 7 } },
  { name: 'open block comment', source: '$a; /* note', expected: { kind: 'comment', position: 4 } },
  { name: 'closed block comment', source: '/* a */ $b', expected: null },
  { name: 'open heredoc', source: '$t = <<<EOT\nline', expected: { kind: 'heredoc', position: 5 } },
  { name: 'closed heredoc', source: '$t = <<<EOT\nline\nEOT;', expected: null },
  { name: 'indented heredoc terminator', source: '$t = <<<EOT\n  line\n  EOT;', expected: null },
  { name: 'label prefix does not close heredoc', source: '$t = <<<EOT\nEOTX', expected: { kind: 'heredoc', position: 5 } },
  { name: 'open nowdoc', source: "$t = <<<'EOT'\n{$x", expected: { kind: 'heredoc', position: 5 } },
  { name: 'heredoc start without body', source: '$t = <<<EOT', expected: { kind: 'heredoc', position: 5 } },
]

const classifyTests: ClassifyTestCase[] = [
  { name: 'whitespace by name', token: { name: 'T_WHITESPACE', text: ' ' }, expected: 'whitespace' },
  { name: 'doc comment', token: { name: 'T_DOC_COMMENT', text: '/** x */' }, expected: 'comment' },
  { name: 'reserved word', token: { name: 'T_FOREACH', text: 'foreach' }, expected: 'keyword' },
  { name: 'qualified name', token: { name: 'T_NAME_QUALIFIED', text: 'App\\User' }, expected: 'identifier' },
  { name: 'lone dollar', token: { name: null, text: '$' }, expected: 'variable' },
  { name: 'double arrow', token: { name: 'T_DOUBLE_ARROW', text: '=>' }, expected: 'operator' },
  { name: 'curly open in string', token: { name: 'T_CURLY_OPEN', text: '{' }, expected: 'open-brace' },
  { name: 'semicolon', token: { name: null, text: ';' }, expected: 'punctuation' },
]

// ============================================================================
// TESTS
// ============================================================================

describe('tokenizer', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('tokenize', () => {
    for (const tc of kindsTests) {
      it(tc.name, () => {
        const tokens = tokenize(tc.source)
        expect(tokens.map((t) => t.kind)).toEqual(tc.expectedKinds)
      })
    }

    it('records offsets for each token', () => {
      const tokens = tokenize('$myVar->fo')
      expect(tokens.map((t) => [t.text, t.position, t.end])).toEqual([
        ['$myVar', 0, 6],
        ['->', 6, 8],
        ['fo', 8, 10],
        ['', 10, 10],
      ])
    })

    it('token texts cover the source contiguously', () => {
      const sources = ['$a = [1, 2];', 'function f($x) { return $x; }', 'echo "x {$y} z" . \'w', '$t = <<<EOT\nabc']
      for (const source of sources) {
        const tokens = tokenize(source)
        expect(tokens.map((t) => t.text).join('')).toBe(source)
        for (let i = 1; i < tokens.length; i++) {
          expect(tokens[i].position).toBe(tokens[i - 1].end)
        }
      }
    })

    it('marks the unterminated tail', () => {
      const tokens = tokenize("echo 'abc")
      expect(tokens[2]).toEqual({ kind: 'string', text: "'abc", position: 5, end: 9, unterminated: true })
    })

    it('degrades to one unknown token when the scanner throws', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {})
      const parser = {
        scanSync: (): ScanToken[] => {
          throw new Error('scanner failure')
        },
      }
      const tokens = tokenize('abc', { parser })
      expect(tokens).toEqual([
        { kind: 'unknown', text: 'abc', position: 0, end: 3, degraded: true },
        { kind: 'eof', text: '', position: 3, end: 3 },
      ])
    })

    it('degrades the rest when scanner output drifts from the source', () => {
      const parser = {
        scanSync: (): ScanToken[] => [
          { name: 'T_STRING', text: 'ab' },
          { name: null, text: 'zz' },
        ],
      }
      const tokens = tokenize('abcd', { parser })
      expect(tokens).toEqual([
        { kind: 'identifier', text: 'ab', position: 0, end: 2 },
        { kind: 'unknown', text: 'cd', position: 2, end: 4, degraded: true },
        { kind: 'eof', text: '', position: 4, end: 4 },
      ])
    })

    it('does not scan the unterminated tail', () => {
      const seen: string[] = []
      const parser = {
        scanSync: (source: string): ScanToken[] => {
          seen.push(source)
          return [{ name: 'T_ECHO', text: 'echo' }, { name: 'T_WHITESPACE', text: ' ' }]
        },
      }
      tokenize('echo "abc', { parser })
      expect(seen).toEqual(['echo '])
    })
  })

  describe('findUnterminated', () => {
    for (const tc of unterminatedTests) {
      it(tc.name, () => {
        expect(findUnterminated(tc.source)).toEqual(tc.expected)
      })
    }
  })

  describe('classifyToken', () => {
    for (const tc of classifyTests) {
      it(tc.name, () => {
        expect(classifyToken(tc.token)).toBe(tc.expected)
      })
    }
  })

  describe('token queries', () => {
    it('significantTokens drops whitespace, comments and eof', () => {
      const tokens = significantTokens(tokenize('$a = 1; /* c */ $b'))
      expect(tokens.map((t) => t.text)).toEqual(['$a', '=', '1', ';', '$b'])
    })

    it('significantTokens keeps an unterminated comment', () => {
      const tokens = significantTokens(tokenize('$a; /* c'))
      expect(tokens.map((t) => t.kind)).toEqual(['variable', 'punctuation', 'comment'])
    })

    it('isInsideString', () => {
      expect(isInsideString(tokenize("echo 'ab"))).toBe(true)
      expect(isInsideString(tokenize("echo 'ab'"))).toBe(false)
      expect(isInsideString(tokenize('/* x'))).toBe(false)
    })

    it('isInsideComment', () => {
      expect(isInsideComment(tokenize('/* x'))).toBe(true)
      expect(isInsideComment(tokenize('/* x */'))).toBe(false)
    })
  })
})
