// tests/php-completion/registry-matchers.test.ts

import { describe, it, expect } from 'vitest'
import {
  createContainerMatchers,
  createRegistryMatcher,
  LARAVEL_COMMON_SERVICES,
} from '../../src/lib/php/completion/registry-matchers'
import { buildMatchContext } from '../../src/lib/php/completion/context'
import { tokenize } from '../../src/lib/php/completion/tokenizer'
import { createSnapshotResolver } from '../../src/lib/php/scope/resolver'
import type { Matcher } from '../../src/lib/php/completion/types'
import { snapshotOf } from '../test-utils'

const scope = createSnapshotResolver(
  snapshotOf({
    registries: {
      'symfony.services': ['doctrine', 'logger', 'router'],
      'symfony.parameters': ['kernel.debug', 'locale'],
    },
  })
)

const [symfonyServices, symfonyParameters, laravelServices] = createContainerMatchers()

function texts(matcher: Matcher, source: string): string[] | null {
  const context = buildMatchContext(tokenize(source), scope)
  if (!matcher.canMatch(context)) return null
  return matcher.getMatches(context).map((c) => c.text)
}

interface RegistryTestCase {
  name: string
  matcher: Matcher
  source: string
  expected: string[] | null
}

const registryTests: RegistryTestCase[] = [
  {
    name: 'service ids inside an opened string',
    matcher: symfonyServices,
    source: "$container->get('",
    expected: ['doctrine', 'logger', 'router'],
  },
  {
    name: 'filters by string content',
    matcher: symfonyServices,
    source: "$container->get('lo",
    expected: ['logger'],
  },
  {
    name: 'quotes ids when no string is open',
    matcher: symfonyServices,
    source: '$container->get(',
    expected: ["'doctrine'", "'logger'", "'router'"],
  },
  {
    name: 'parameters',
    matcher: symfonyParameters,
    source: '$container->getParameter("',
    expected: ['kernel.debug', 'locale'],
  },
  {
    name: 'parameter ids with dots',
    matcher: symfonyParameters,
    source: "$container->getParameter('kernel.",
    expected: ['kernel.debug'],
  },
  {
    name: 'laravel falls back to common bindings',
    matcher: laravelServices,
    source: "$app->make('ca",
    expected: ['cache'],
  },
  { name: 'other receiver', matcher: symfonyServices, source: "$other->get('", expected: null },
  { name: 'other method', matcher: symfonyServices, source: "$container->has('", expected: null },
  { name: 'second argument', matcher: symfonyServices, source: "$container->get('a', '", expected: null },
  { name: 'variable argument', matcher: symfonyServices, source: '$container->get($', expected: null },
]

describe('registry matchers', () => {
  for (const tc of registryTests) {
    it(tc.name, () => {
      expect(texts(tc.matcher, tc.source)).toEqual(tc.expected)
    })
  }

  it('accept string context', () => {
    expect(createContainerMatchers().every((m) => m.acceptsStringContext === true)).toBe(true)
  })

  it('laravel fallback lists the common bindings', () => {
    expect(texts(laravelServices, "$app->make('")).toEqual([...LARAVEL_COMMON_SERVICES])
  })

  it('custom registry matcher', () => {
    const matcher = createRegistryMatcher({
      name: 'routes',
      receiver: 'router',
      method: 'generate',
      registry: 'routes',
      kind: 'service',
      fallback: ['home', 'login'],
    })
    const context = buildMatchContext(tokenize("$router->generate('ho"), scope)
    expect(matcher.getMatches(context)).toEqual([{ kind: 'service', text: 'home', displayLabel: 'home' }])
  })
})
