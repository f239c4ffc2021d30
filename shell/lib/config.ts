import { parse } from 'smol-toml'
import { readFileSync, existsSync } from 'fs'

export interface GeneralConfig {
  php_binary: string
  timeout_ms: number
  require_semicolons: boolean
  history_size: number
}

export interface CompletionConfig {
  window_size: number
  max_candidates: number
}

export interface RegistryConfig {
  name: string
  ids: string[]
}

export interface ShellConfig {
  general: GeneralConfig
  completion: CompletionConfig
  registries: RegistryConfig[]
}

export const DEFAULT_CONFIG: ShellConfig = {
  general: { php_binary: 'php', timeout_ms: 10000, require_semicolons: false, history_size: 500 },
  completion: { window_size: 10, max_candidates: 50 },
  registries: [],
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readInteger(section: Record<string, unknown>, key: string, prefix: string, fallback: number, min: number, max: number): number {
  const value = section[key]
  if (value === undefined) return fallback
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`${prefix}.${key} must be an integer`)
  }
  if (value < min || value > max) {
    throw new Error(`${prefix}.${key} must be between ${min} and ${max}`)
  }
  return value
}

function parseGeneral(raw: unknown): GeneralConfig {
  const defaults = DEFAULT_CONFIG.general
  if (raw === undefined) return { ...defaults }
  if (!isRecord(raw)) {
    throw new Error('[general] must be a table')
  }

  let php_binary = defaults.php_binary
  if (raw.php_binary !== undefined) {
    if (typeof raw.php_binary !== 'string' || !raw.php_binary.trim()) {
      throw new Error('general.php_binary must be a non-empty string')
    }
    php_binary = raw.php_binary
  }

  let require_semicolons = defaults.require_semicolons
  if (raw.require_semicolons !== undefined) {
    if (typeof raw.require_semicolons !== 'boolean') {
      throw new Error('general.require_semicolons must be a boolean')
    }
    require_semicolons = raw.require_semicolons
  }

  return {
    php_binary,
    timeout_ms: readInteger(raw, 'timeout_ms', 'general', defaults.timeout_ms, 100, 3_600_000),
    require_semicolons,
    history_size: readInteger(raw, 'history_size', 'general', defaults.history_size, 0, 100_000),
  }
}

function parseCompletion(raw: unknown): CompletionConfig {
  const defaults = DEFAULT_CONFIG.completion
  if (raw === undefined) return { ...defaults }
  if (!isRecord(raw)) {
    throw new Error('[completion] must be a table')
  }
  return {
    window_size: readInteger(raw, 'window_size', 'completion', defaults.window_size, 1, 100),
    max_candidates: readInteger(raw, 'max_candidates', 'completion', defaults.max_candidates, 1, 1000),
  }
}

function parseRegistries(raw: unknown): RegistryConfig[] {
  if (raw === undefined) return []
  if (!Array.isArray(raw)) {
    throw new Error('[[registries]] must be an array of tables')
  }

  const registries: RegistryConfig[] = []
  const names = new Set<string>()
  raw.forEach((entry: unknown, i: number) => {
    if (!isRecord(entry)) {
      throw new Error(`registries[${i}] must be a table`)
    }
    const { name, ids } = entry
    if (typeof name !== 'string' || !name) {
      throw new Error(`registries[${i}].name is required`)
    }
    if (names.has(name)) {
      throw new Error(`Duplicate registry name: ${name}`)
    }
    names.add(name)
    if (!Array.isArray(ids)) {
      throw new Error(`registries[${i}].ids must be an array of strings`)
    }
    const validIds: string[] = []
    for (const id of ids) {
      if (typeof id !== 'string') {
        throw new Error(`registries[${i}].ids must be an array of strings`)
      }
      validIds.push(id)
    }
    registries.push({ name, ids: validIds })
  })
  return registries
}

/**
 * Parse and validate config file content.
 */
export function parseConfig(content: string): ShellConfig {
  const parsed: unknown = parse(content)
  if (!isRecord(parsed)) {
    throw new Error('Config must be a TOML table')
  }
  return {
    general: parseGeneral(parsed.general),
    completion: parseCompletion(parsed.completion),
    registries: parseRegistries(parsed.registries),
  }
}

export async function loadConfig(configPath: string): Promise<ShellConfig> {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`)
  }
  const content = readFileSync(configPath, 'utf-8')
  return parseConfig(content)
}

/**
 * Registries as the snapshot stores them, keyed by name.
 */
export function registryMap(config: ShellConfig): Record<string, string[]> {
  const result: Record<string, string[]> = {}
  for (const registry of config.registries) {
    result[registry.name] = registry.ids
  }
  return result
}
