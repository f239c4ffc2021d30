/**
 * Runtime Snapshot
 *
 * The shape of a REPL session's scope as reported by the PHP runner after each
 * statement: variables, declared classes with their public members, functions,
 * constants and container registries.
 */

// ============================================================================
// TYPES
// ============================================================================

export type MemberKind = 'method' | 'property' | 'constant'

export interface MemberInfo {
  name: string
  kind: MemberKind
  isStatic: boolean
  /** Class name of the property type or method return type, null when not a class */
  type: string | null
  declaringClass: string | null
}

export type ClassKind = 'class' | 'interface' | 'trait' | 'enum'

export interface ClassInfo {
  name: string
  kind: ClassKind
  parent: string | null
  interfaces: string[]
  members: MemberInfo[]
}

export interface VariableInfo {
  /** Debug type name: int, string, array, object, ... */
  type: string
  /** Class of an object value */
  class: string | null
  /** Public properties present on an object value, declared or dynamic */
  properties: string[]
  preview: string
}

export interface RuntimeSnapshot {
  variables: Record<string, VariableInfo>
  functions: string[]
  classes: Record<string, ClassInfo>
  constants: string[]
  /** Identifier registries keyed by registry name (symfony.services, ...) */
  registries: Record<string, string[]>
}

const CLASS_KINDS: readonly ClassKind[] = ['class', 'interface', 'trait', 'enum']
const MEMBER_KINDS: readonly MemberKind[] = ['method', 'property', 'constant']

export function emptySnapshot(): RuntimeSnapshot {
  return { variables: {}, functions: [], classes: {}, constants: [], registries: {} }
}

// ============================================================================
// VALIDATION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Maps serialized from PHP come back as `[]` when empty.
 */
function recordField(value: unknown, field: string): Record<string, unknown> {
  if (value === undefined || value === null) {
    return {}
  }
  if (Array.isArray(value) && value.length === 0) {
    return {}
  }
  if (!isRecord(value)) {
    throw new Error(`${field} must be an object`)
  }
  return value
}

function stringList(value: unknown, field: string): string[] {
  if (value === undefined || value === null) {
    return []
  }
  if (!Array.isArray(value)) {
    throw new Error(`${field} must be an array of strings`)
  }
  const result: string[] = []
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new Error(`${field} must be an array of strings`)
    }
    result.push(item)
  }
  return result
}

function optionalString(value: unknown, field: string): string | null {
  if (value === undefined || value === null) {
    return null
  }
  if (typeof value !== 'string') {
    throw new Error(`${field} must be a string`)
  }
  return value
}

function parseVariable(value: unknown, field: string): VariableInfo {
  if (!isRecord(value)) {
    throw new Error(`${field} must be an object`)
  }
  return {
    type: optionalString(value.type, `${field}.type`) ?? 'mixed',
    class: optionalString(value.class, `${field}.class`),
    properties: stringList(value.properties, `${field}.properties`),
    preview: optionalString(value.preview, `${field}.preview`) ?? '',
  }
}

function parseMember(value: unknown, field: string): MemberInfo {
  if (!isRecord(value)) {
    throw new Error(`${field} must be an object`)
  }
  const name = optionalString(value.name, `${field}.name`)
  if (!name) {
    throw new Error(`${field}.name is required`)
  }
  const kind = MEMBER_KINDS.find((k) => k === value.kind)
  if (!kind) {
    throw new Error(`${field}.kind must be one of: ${MEMBER_KINDS.join(', ')}`)
  }
  return {
    name,
    kind,
    isStatic: value.static === true,
    type: optionalString(value.type, `${field}.type`),
    declaringClass: optionalString(value.class, `${field}.class`),
  }
}

function parseClass(name: string, value: unknown, field: string): ClassInfo {
  if (!isRecord(value)) {
    throw new Error(`${field} must be an object`)
  }
  const kind = value.kind === undefined ? 'class' : CLASS_KINDS.find((k) => k === value.kind)
  if (!kind) {
    throw new Error(`${field}.kind must be one of: ${CLASS_KINDS.join(', ')}`)
  }
  const members = value.members === undefined ? [] : value.members
  if (!Array.isArray(members)) {
    throw new Error(`${field}.members must be an array`)
  }
  return {
    name,
    kind,
    parent: optionalString(value.parent, `${field}.parent`),
    interfaces: stringList(value.interfaces, `${field}.interfaces`),
    members: members.map((member, i) => parseMember(member, `${field}.members[${i}]`)),
  }
}

/**
 * Validate a decoded snapshot document. Throws on malformed input.
 */
export function parseSnapshot(value: unknown): RuntimeSnapshot {
  if (!isRecord(value)) {
    throw new Error('snapshot must be an object')
  }

  // Built from entries so a variable named `__proto__` stays an ordinary key
  const variables = Object.fromEntries(
    Object.entries(recordField(value.variables, 'variables')).map(([name, info]): [string, VariableInfo] => [
      name,
      parseVariable(info, `variables.${name}`),
    ])
  )

  const classes = Object.fromEntries(
    Object.entries(recordField(value.classes, 'classes')).map(([name, info]): [string, ClassInfo] => [
      name,
      parseClass(name, info, `classes.${name}`),
    ])
  )

  const registries = Object.fromEntries(
    Object.entries(recordField(value.registries, 'registries')).map(([name, ids]): [string, string[]] => [
      name,
      stringList(ids, `registries.${name}`),
    ])
  )

  return {
    variables,
    functions: stringList(value.functions, 'functions'),
    classes,
    constants: stringList(value.constants, 'constants'),
    registries,
  }
}

/**
 * Add statically configured registry ids to a snapshot. Ids reported at runtime come first.
 */
export function mergeRegistries(
  snapshot: RuntimeSnapshot,
  registries: Record<string, readonly string[]>
): RuntimeSnapshot {
  const merged = new Map<string, string[]>(Object.entries(snapshot.registries))
  for (const [name, ids] of Object.entries(registries)) {
    const existing = merged.get(name) ?? []
    const seen = new Set(existing)
    merged.set(name, [...existing, ...ids.filter((id) => !seen.has(id))])
  }
  return { ...snapshot, registries: Object.fromEntries(merged) }
}
