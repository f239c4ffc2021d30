/**
 * Scope Resolver
 *
 * Answers what names exist in the live session: variables, declared symbols
 * and the members reachable from an owner expression such as `$user->profile()`.
 * Lookups never throw; a failed lookup yields an empty list.
 */

import type { ClassInfo, MemberInfo, RuntimeSnapshot, VariableInfo } from './snapshot'

export type SymbolKind = 'class' | 'interface' | 'trait' | 'function' | 'constant'
export type MemberAccess = 'instance' | 'static'

export interface ScopeResolver {
  /** Variable names in scope, without the `$` sigil */
  listVariables: () => string[]
  listSymbols: (kind: SymbolKind) => string[]
  /**
   * Members reachable through `ownerExpr->` (instance) or `ownerExpr::` (static).
   */
  lookupMember: (ownerExpr: string, access?: MemberAccess) => MemberInfo[]
  auxInfo: () => ReadonlyMap<string, unknown>
}

export const EMPTY_RESOLVER: ScopeResolver = {
  listVariables: () => [],
  listSymbols: () => [],
  lookupMember: () => [],
  auxInfo: () => new Map(),
}

const VARIABLE = /^\$([A-Za-z_\x80-￿][A-Za-z0-9_\x80-￿]*)$/
const CLASS_NAME = /^\\?[A-Za-z_\x80-￿][A-Za-z0-9_\x80-￿\\]*$/
const STATIC_ACCESS = /^(\\?[A-Za-z_\x80-￿][A-Za-z0-9_\x80-￿\\]*|\$[A-Za-z_\x80-￿][A-Za-z0-9_\x80-￿]*)::(\$?[A-Za-z_\x80-￿][A-Za-z0-9_\x80-￿]*)(\(\))?$/
const MEMBER_SEGMENT = /^([A-Za-z_\x80-￿][A-Za-z0-9_\x80-￿]*)(\(\))?$/

interface ResolvedOwner {
  className: string | null
  /** Set when the expression is a bare variable, so its dynamic properties count */
  variable: VariableInfo | null
}

/**
 * Split an owner expression on top-level `->` / `?->`, keeping call parentheses attached.
 */
export function splitChain(expr: string): string[] {
  const segments: string[] = []
  let depth = 0
  let current = ''
  for (let i = 0; i < expr.length; i++) {
    const ch = expr[i]
    if (ch === '(' || ch === '[') depth++
    if (ch === ')' || ch === ']') depth--
    if (depth === 0 && (expr.startsWith('->', i) || expr.startsWith('?->', i))) {
      segments.push(current)
      current = ''
      i += expr[i] === '?' ? 2 : 1
      continue
    }
    current += ch
  }
  segments.push(current)
  return segments.map((segment) => segment.trim())
}

/**
 * Build a resolver over a runtime snapshot.
 */
export function createSnapshotResolver(snapshot: RuntimeSnapshot): ScopeResolver {
  const classIndex = new Map<string, ClassInfo>()
  for (const info of Object.values(snapshot.classes)) {
    classIndex.set(normalizeClassName(info.name), info)
  }
  const aux: ReadonlyMap<string, unknown> = new Map(Object.entries(snapshot.registries))

  function findClass(name: string): ClassInfo | null {
    return classIndex.get(normalizeClassName(name)) ?? null
  }

  /** Members of a class and its ancestors; a subclass declaration shadows the parent's */
  function collectMembers(className: string): MemberInfo[] {
    const members: MemberInfo[] = []
    const seen = new Set<string>()
    const visited = new Set<string>()
    const queue = [className]

    while (queue.length > 0) {
      const next = queue.shift()
      if (next === undefined) break
      const info = findClass(next)
      const key = normalizeClassName(next)
      if (!info || visited.has(key)) continue
      visited.add(key)

      for (const member of info.members) {
        const memberKey = `${member.kind}:${member.kind === 'method' ? member.name.toLowerCase() : member.name}`
        if (seen.has(memberKey)) continue
        seen.add(memberKey)
        members.push(member)
      }
      if (info.parent) queue.push(info.parent)
      queue.push(...info.interfaces)
    }
    return members
  }

  function findMember(className: string, name: string, kind: 'method' | 'property'): MemberInfo | null {
    const wanted = kind === 'method' ? name.toLowerCase() : name
    for (const member of collectMembers(className)) {
      if (member.kind !== kind) continue
      const actual = kind === 'method' ? member.name.toLowerCase() : member.name
      if (actual === wanted) return member
    }
    return null
  }

  function classOfVariable(name: string): VariableInfo | null {
    return Object.prototype.hasOwnProperty.call(snapshot.variables, name) ? snapshot.variables[name] : null
  }

  function resolveHead(head: string, access: MemberAccess, isLast: boolean): ResolvedOwner | null {
    const variable = VARIABLE.exec(head)
    if (variable) {
      const info = classOfVariable(variable[1])
      if (!info) return null
      return { className: info.class, variable: info }
    }

    if (CLASS_NAME.test(head)) {
      // `Foo->` is not an expression; only `Foo::` resolves a bare class name
      if (!isLast || access !== 'static') return null
      return findClass(head) ? { className: head, variable: null } : null
    }

    const staticAccess = STATIC_ACCESS.exec(head)
    if (staticAccess) {
      const owner = resolveHead(staticAccess[1], 'static', true)
      if (!owner || !owner.className) return null
      const isCall = staticAccess[3] !== undefined
      const memberName = staticAccess[2].replace(/^\$/, '')
      const member = findMember(owner.className, memberName, isCall ? 'method' : 'property')
      if (!member || !member.type) return null
      return { className: member.type, variable: null }
    }

    return null
  }

  function resolveOwner(ownerExpr: string, access: MemberAccess): ResolvedOwner | null {
    const segments = splitChain(ownerExpr.trim())
    if (segments.some((segment) => segment === '')) return null

    let owner = resolveHead(segments[0], access, segments.length === 1)
    for (let i = 1; i < segments.length && owner; i++) {
      const segment = MEMBER_SEGMENT.exec(segments[i])
      if (!segment || !owner.className) return null
      const member = findMember(owner.className, segment[1], segment[2] ? 'method' : 'property')
      owner = member && member.type ? { className: member.type, variable: null } : null
    }
    return owner
  }

  return {
    listVariables: () => Object.keys(snapshot.variables),

    listSymbols: (kind) => {
      switch (kind) {
        case 'function':
          return [...snapshot.functions]
        case 'constant':
          return [...snapshot.constants]
        case 'class':
          return Object.values(snapshot.classes)
            .filter((info) => info.kind === 'class' || info.kind === 'enum')
            .map((info) => info.name)
        default:
          return Object.values(snapshot.classes)
            .filter((info) => info.kind === kind)
            .map((info) => info.name)
      }
    },

    lookupMember: (ownerExpr, access = 'instance') => {
      try {
        const owner = resolveOwner(ownerExpr, access)
        if (!owner) return []

        const members = owner.className ? collectMembers(owner.className) : []
        if (access === 'static') {
          return members.filter((member) => member.isStatic || member.kind === 'constant')
        }

        const visible = members.filter(
          (member) => member.kind === 'method' || (member.kind === 'property' && !member.isStatic)
        )
        if (owner.variable) {
          const declared = new Set(visible.filter((m) => m.kind === 'property').map((m) => m.name))
          for (const property of owner.variable.properties) {
            if (declared.has(property)) continue
            declared.add(property)
            visible.push({ name: property, kind: 'property', isStatic: false, type: null, declaringClass: null })
          }
        }
        return visible
      } catch (err) {
        console.warn(`Member lookup failed for ${ownerExpr}:`, err)
        return []
      }
    },

    auxInfo: () => aux,
  }
}

function normalizeClassName(name: string): string {
  return name.replace(/^\\/, '').toLowerCase()
}
