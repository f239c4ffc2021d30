/**
 * Completion Matchers
 *
 * Each matcher recognizes one completion context from the match context and
 * lists candidates for it. Matchers only read the context; they never mutate it.
 */

import type { MemberInfo } from '../scope/snapshot'
import type { SymbolKind } from '../scope/resolver'
import type { Candidate, MatchContext, Matcher, Token } from './types'
import { leadingTokens, previousToken } from './context'
import { isMatch } from './ranker'
import { createContainerMatchers } from './registry-matchers'
import keywordData from './keywords.json'

const OBJECT_OPERATORS = new Set(['->', '?->'])
const STATEMENT_BOUNDARIES = new Set([';', '{', '}'])

// Keywords after which a class-like name is expected
const CLASS_CONTEXT_KEYWORDS = new Set(['new', 'extends', 'implements', 'instanceof', 'insteadof', 'use'])

// Keywords after which a fresh name is being declared, so nothing existing fits
const DECLARATION_KEYWORDS = new Set([
  'function',
  'fn',
  'class',
  'interface',
  'trait',
  'enum',
  'const',
  'namespace',
  'goto',
  'as',
])

export const STATEMENT_KEYWORDS: readonly string[] = keywordData.statements
export const PHP_KEYWORDS: readonly string[] = keywordData.keywords

// ============================================================================
// CONTEXT HELPERS
// ============================================================================

function isWordToken(token: Token | null): token is Token & { kind: 'identifier' | 'keyword' } {
  return token !== null && (token.kind === 'identifier' || token.kind === 'keyword')
}

/**
 * Rebuild the expression before a `->` or `::` from tokens, e.g. `$a->b()->c`.
 * Call arguments collapse to `()`. Returns null when the tokens do not form a chain.
 */
export function ownerExpression(tokens: readonly Token[]): string | null {
  const parts: string[] = []
  let i = tokens.length - 1
  let expectOperand = true

  while (i >= 0) {
    const token = tokens[i]

    if (expectOperand) {
      if (token.text === ')') {
        let depth = 0
        let j = i
        for (; j >= 0; j--) {
          if (tokens[j].text === ')') depth++
          else if (tokens[j].text === '(') depth--
          if (depth === 0) break
        }
        const callee = j > 0 ? tokens[j - 1] : null
        if (!callee || !(isWordToken(callee) || callee.kind === 'variable')) return null
        parts.unshift(`${callee.text}()`)
        i = j - 2
        expectOperand = false
        continue
      }
      if (token.kind === 'variable' || isWordToken(token)) {
        parts.unshift(token.text)
        i--
        expectOperand = false
        continue
      }
      return null
    }

    if (OBJECT_OPERATORS.has(token.text) || token.text === '::') {
      parts.unshift(token.text)
      i--
      expectOperand = true
      continue
    }
    break
  }

  if (expectOperand || parts.length === 0) return null
  return parts.join('')
}

function memberOwner(context: MatchContext, operators: ReadonlySet<string>): string | null {
  const leading = leadingTokens(context)
  const operator = leading.length > 0 ? leading[leading.length - 1] : null
  if (!operator || !operators.has(operator.text)) return null
  return ownerExpression(leading.slice(0, -1))
}

/**
 * Cursor is on a plain word that is not a member name and not a new declaration.
 */
export function isBareContext(context: MatchContext): boolean {
  if (!isWordToken(context.prefixToken)) return false
  const previous = previousToken(context)
  if (!previous) return true
  if (OBJECT_OPERATORS.has(previous.text) || previous.text === '::') return false
  const word = previous.text.toLowerCase()
  return !DECLARATION_KEYWORDS.has(word) && !CLASS_CONTEXT_KEYWORDS.has(word)
}

/**
 * The keyword that makes a class name expected here, or null.
 * `catch (` counts as `catch`.
 */
export function classContextKeyword(context: MatchContext): string | null {
  const prefixToken = context.prefixToken
  if (prefixToken !== null && !isWordToken(prefixToken)) return null

  const leading = leadingTokens(context)
  const previous = leading.length > 0 ? leading[leading.length - 1] : null
  if (!previous) return null
  const word = previous.text.toLowerCase()
  if (CLASS_CONTEXT_KEYWORDS.has(word)) return word
  if (previous.text === '(' && leading.length > 1 && leading[leading.length - 2].text.toLowerCase() === 'catch') {
    return 'catch'
  }
  return null
}

function filterByPrefix(names: readonly string[], prefix: string): string[] {
  return names.filter((name) => isMatch(name, prefix))
}

function symbolCandidates(context: MatchContext, kind: SymbolKind): Candidate[] {
  return filterByPrefix(context.scope.listSymbols(kind), context.cursorPrefix).map((name): Candidate => ({
    kind,
    text: name,
    displayLabel: kind === 'function' ? `${name}()` : name,
  }))
}

function memberCandidate(member: MemberInfo, sigilTyped: boolean): Candidate {
  const detail = member.declaringClass ?? undefined
  switch (member.kind) {
    case 'method':
      return { kind: 'method', text: member.name, displayLabel: `${member.name}()`, detail }
    case 'constant':
      return { kind: 'constant', text: member.name, displayLabel: member.name, detail }
    case 'property': {
      const label = member.isStatic ? `$${member.name}` : member.name
      const text = member.isStatic && !sigilTyped ? label : member.name
      return { kind: 'property', text, displayLabel: label, detail }
    }
  }
}

// ============================================================================
// MEMBER MATCHERS
// ============================================================================

/**
 * Members after `->` / `?->`: methods and properties of the owner's class,
 * plus dynamic properties of a plain variable.
 */
export function createObjectMemberMatcher(): Matcher {
  return {
    name: 'object-members',
    matcherClass: 'member',
    canMatch: (context) => memberOwner(context, OBJECT_OPERATORS) !== null,
    getMatches: (context) => {
      const owner = memberOwner(context, OBJECT_OPERATORS)
      if (!owner) return []
      return context.scope
        .lookupMember(owner, 'instance')
        .filter((member) => isMatch(member.name, context.cursorPrefix))
        .map((member) => memberCandidate(member, false))
    },
  }
}

const STATIC_OPERATORS = new Set(['::'])

/**
 * Members after `::`: constants, static properties and static methods.
 * Once a `$` is typed only static properties fit.
 */
export function createStaticMemberMatcher(): Matcher {
  return {
    name: 'static-members',
    matcherClass: 'member',
    canMatch: (context) => memberOwner(context, STATIC_OPERATORS) !== null,
    getMatches: (context) => {
      const owner = memberOwner(context, STATIC_OPERATORS)
      if (!owner) return []
      const sigilTyped = context.prefixToken?.kind === 'variable'
      return context.scope
        .lookupMember(owner, 'static')
        .filter((member) => !sigilTyped || member.kind === 'property')
        .filter((member) => isMatch(member.name, context.cursorPrefix))
        .map((member) => memberCandidate(member, sigilTyped))
    },
  }
}

// ============================================================================
// SYMBOL MATCHERS
// ============================================================================

/**
 * Variables in scope once a `$` is typed. Candidate text omits the sigil.
 */
export function createVariableMatcher(): Matcher {
  return {
    name: 'variables',
    matcherClass: 'symbol',
    canMatch: (context) => {
      if (context.prefixToken?.kind !== 'variable') return false
      const previous = previousToken(context)
      return previous === null || (previous.text !== '::' && !OBJECT_OPERATORS.has(previous.text))
    },
    getMatches: (context) =>
      filterByPrefix(context.scope.listVariables(), context.cursorPrefix).map((name): Candidate => ({
        kind: 'variable',
        text: name,
        displayLabel: `$${name}`,
      })),
  }
}

const CLASS_KINDS_BY_KEYWORD: Record<string, readonly SymbolKind[]> = {
  new: ['class'],
  extends: ['class', 'interface'],
  implements: ['interface'],
  instanceof: ['class', 'interface'],
  catch: ['class', 'interface'],
  insteadof: ['trait'],
  use: ['class', 'interface', 'trait'],
}

/**
 * Class-like names: after `new`, `extends`, `implements`, `instanceof`, `catch (`
 * or `use`, and for any bare non-empty word.
 */
export function createClassNameMatcher(): Matcher {
  return {
    name: 'class-names',
    matcherClass: 'symbol',
    canMatch: (context) =>
      classContextKeyword(context) !== null || (isBareContext(context) && context.cursorPrefix !== ''),
    getMatches: (context) => {
      const keyword = classContextKeyword(context)
      const kinds: readonly SymbolKind[] = keyword ? CLASS_KINDS_BY_KEYWORD[keyword] : ['class', 'interface']
      const qualified = context.cursorPrefix.startsWith('\\')
      const candidates: Candidate[] = []
      for (const kind of kinds) {
        for (const candidate of symbolCandidates(context, kind)) {
          if (qualified && !candidate.text.startsWith('\\')) {
            candidates.push({ ...candidate, text: `\\${candidate.text}` })
          } else {
            candidates.push(candidate)
          }
        }
      }
      return candidates
    },
  }
}

/**
 * Defined functions for a bare non-empty word.
 */
export function createFunctionMatcher(): Matcher {
  return {
    name: 'functions',
    matcherClass: 'symbol',
    canMatch: (context) => isBareContext(context) && context.cursorPrefix !== '',
    getMatches: (context) => symbolCandidates(context, 'function'),
  }
}

/**
 * Defined constants for a bare non-empty word.
 */
export function createConstantMatcher(): Matcher {
  return {
    name: 'constants',
    matcherClass: 'symbol',
    canMatch: (context) => isBareContext(context) && context.cursorPrefix !== '',
    getMatches: (context) => symbolCandidates(context, 'constant'),
  }
}

/**
 * Shell command names for the first word of the input.
 */
export function createCommandMatcher(commandNames: readonly string[]): Matcher {
  return {
    name: 'commands',
    matcherClass: 'symbol',
    canMatch: (context) => isWordToken(context.prefixToken) && leadingTokens(context).length === 0,
    getMatches: (context) =>
      filterByPrefix(commandNames, context.cursorPrefix).map((name): Candidate => ({
        kind: 'command',
        text: name,
        displayLabel: name,
      })),
  }
}

// ============================================================================
// KEYWORD MATCHERS
// ============================================================================

function keywordCandidates(words: readonly string[], prefix: string): Candidate[] {
  return filterByPrefix(words, prefix).map((word): Candidate => ({
    kind: 'keyword',
    text: word,
    displayLabel: word,
  }))
}

/**
 * Statement-starting keywords at the start of input or after `;`, `{` or `}`.
 */
export function createStatementStartMatcher(): Matcher {
  return {
    name: 'statement-keywords',
    matcherClass: 'keyword',
    canMatch: (context) => {
      if (context.prefixToken !== null && !isWordToken(context.prefixToken)) return false
      const previous = previousToken(context)
      return previous === null || STATEMENT_BOUNDARIES.has(previous.text)
    },
    getMatches: (context) => keywordCandidates(STATEMENT_KEYWORDS, context.cursorPrefix),
  }
}

/**
 * Any reserved word for a bare non-empty word.
 */
export function createKeywordMatcher(): Matcher {
  return {
    name: 'keywords',
    matcherClass: 'keyword',
    canMatch: (context) => isBareContext(context) && context.cursorPrefix !== '',
    getMatches: (context) => keywordCandidates(PHP_KEYWORDS, context.cursorPrefix),
  }
}

// ============================================================================
// DEFAULT SET
// ============================================================================

export interface DefaultMatcherOptions {
  /** Shell command names offered for the first word */
  commands?: readonly string[]
}

/**
 * The standard matcher list, in priority order:
 * registry → member → symbol → keyword.
 */
export function createDefaultMatchers(options?: DefaultMatcherOptions): Matcher[] {
  const matchers: Matcher[] = [
    ...createContainerMatchers(),
    createObjectMemberMatcher(),
    createStaticMemberMatcher(),
    createVariableMatcher(),
  ]
  if (options?.commands && options.commands.length > 0) {
    matchers.push(createCommandMatcher(options.commands))
  }
  matchers.push(
    createClassNameMatcher(),
    createFunctionMatcher(),
    createConstantMatcher(),
    createStatementStartMatcher(),
    createKeywordMatcher()
  )
  return matchers
}
