/**
 * Registry Matchers
 *
 * Complete the first argument of container lookups such as
 * `$container->get('` from identifier registries supplied through auxInfo.
 */

import type { Candidate, CandidateKind, MatchContext, Matcher } from './types'
import { leadingTokens } from './context'
import { isMatch } from './ranker'

export const SYMFONY_SERVICES = 'symfony.services'
export const SYMFONY_PARAMETERS = 'symfony.parameters'
export const LARAVEL_SERVICES = 'laravel.services'

// Core bindings every Laravel application registers
export const LARAVEL_COMMON_SERVICES: readonly string[] = [
  'auth',
  'cache',
  'config',
  'db',
  'events',
  'files',
  'hash',
  'log',
  'mail',
  'queue',
  'redis',
  'request',
  'router',
  'session',
  'url',
  'validator',
  'view',
]

export interface RegistryMatcherOptions {
  name: string
  /** Receiver variable without the `$` sigil */
  receiver: string
  method: string
  /** auxInfo key holding the identifier list */
  registry: string
  kind: CandidateKind
  /** Used when the registry is absent */
  fallback?: readonly string[]
}

/**
 * Cursor is at the first argument of `$receiver->method(`, optionally inside an opened string.
 */
function isRegistryCall(context: MatchContext, receiver: string, method: string): boolean {
  if (context.prefixToken !== null && context.prefixToken.kind !== 'string') return false

  const leading = leadingTokens(context)
  if (leading.length < 4) return false
  const [variable, arrow, name, paren] = leading.slice(-4)
  return (
    variable.kind === 'variable' &&
    variable.text === `$${receiver}` &&
    (arrow.text === '->' || arrow.text === '?->') &&
    name.text.toLowerCase() === method.toLowerCase() &&
    paren.text === '('
  )
}

function registryIds(context: MatchContext, registry: string, fallback: readonly string[]): readonly string[] {
  const value = context.auxInfo.get(registry)
  if (Array.isArray(value)) {
    return value.filter((id): id is string => typeof id === 'string')
  }
  return fallback
}

export function createRegistryMatcher(options: RegistryMatcherOptions): Matcher {
  const fallback = options.fallback ?? []
  return {
    name: options.name,
    matcherClass: 'registry',
    acceptsStringContext: true,
    canMatch: (context) => isRegistryCall(context, options.receiver, options.method),
    getMatches: (context) => {
      // Without an opened string the candidate brings its own quotes
      const quote = context.insideString ? '' : "'"
      return registryIds(context, options.registry, fallback)
        .filter((id) => isMatch(id, context.cursorPrefix))
        .map((id): Candidate => ({
          kind: options.kind,
          text: `${quote}${id}${quote}`,
          displayLabel: id,
        }))
    },
  }
}

/**
 * Symfony and Laravel container lookups.
 */
export function createContainerMatchers(): Matcher[] {
  return [
    createRegistryMatcher({
      name: 'symfony-services',
      receiver: 'container',
      method: 'get',
      registry: SYMFONY_SERVICES,
      kind: 'service',
    }),
    createRegistryMatcher({
      name: 'symfony-parameters',
      receiver: 'container',
      method: 'getParameter',
      registry: SYMFONY_PARAMETERS,
      kind: 'parameter',
    }),
    createRegistryMatcher({
      name: 'laravel-services',
      receiver: 'app',
      method: 'make',
      registry: LARAVEL_SERVICES,
      kind: 'service',
      fallback: LARAVEL_COMMON_SERVICES,
    }),
  ]
}
