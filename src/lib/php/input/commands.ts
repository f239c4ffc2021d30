/**
 * Shell Command Splitting
 *
 * A line may start with a shell command (`timeit`, `ls`, ...). Commands that
 * take code hand their argument to the detector with the command prefix removed,
 * so the command name is never mistaken for a PHP syntax error.
 */

import { detect } from './detector'
import type { DetectionResult, DetectorOptions } from './detector'

export interface CommandSpec {
  name: string
  aliases?: string[]
  /** The argument is PHP code to detect and execute */
  takesCode: boolean
}

export interface CommandTable {
  lookup: (name: string) => CommandSpec | undefined
  /** Primary names in registration order */
  names: () => string[]
}

export function createCommandTable(specs: readonly CommandSpec[]): CommandTable {
  const byName = new Map<string, CommandSpec>()
  for (const spec of specs) {
    for (const name of [spec.name, ...(spec.aliases ?? [])]) {
      if (byName.has(name)) {
        throw new Error(`Duplicate command name: ${name}`)
      }
      byName.set(name, spec)
    }
  }
  return {
    lookup: (name) => byName.get(name),
    names: () => specs.map((spec) => spec.name),
  }
}

export interface SplitInput {
  command: CommandSpec | null
  /** Leading `--flag` / `-f` options after the command name */
  options: string[]
  /** Everything after the command and its options, or the whole input */
  argument: string
  /** Offset of the argument in the raw input */
  argumentOffset: number
}

const COMMAND_NAME = /^(\s*)([A-Za-z][\w-]*)(?=\s|$)/
// What follows a word that makes it PHP code instead of a command
const LOOKS_LIKE_CODE = /^\s*(?:[=([;]|->|\?->|::)/
const OPTION = /^\s+(--?[A-Za-z][\w-]*(?:=\S*)?)(?=\s|$)/
const LEADING_SPACE = /^\s*/

/**
 * Separate a recognized command prefix from the rest of the input.
 */
export function splitCommand(raw: string, table: CommandTable): SplitInput {
  const plain: SplitInput = { command: null, options: [], argument: raw, argumentOffset: 0 }

  const match = COMMAND_NAME.exec(raw)
  if (!match) return plain
  const command = table.lookup(match[2])
  if (!command) return plain

  let offset = match[0].length
  if (LOOKS_LIKE_CODE.test(raw.slice(offset))) return plain

  const options: string[] = []
  for (let option = OPTION.exec(raw.slice(offset)); option; option = OPTION.exec(raw.slice(offset))) {
    options.push(option[1])
    offset += option[0].length
  }

  const space = LEADING_SPACE.exec(raw.slice(offset))
  offset += space ? space[0].length : 0

  return { command, options, argument: raw.slice(offset), argumentOffset: offset }
}

export interface InputDetection extends DetectionResult, SplitInput {}

/**
 * Detect completeness of raw input that may start with a shell command.
 * Commands that do not take code are always complete.
 */
export function detectInput(raw: string, table: CommandTable, options?: DetectorOptions): InputDetection {
  const split = splitCommand(raw, table)

  if (split.command && !split.command.takesCode) {
    return { ...split, status: 'COMPLETE', code: split.argument, error: null }
  }

  return { ...split, ...detect(split.argument, options) }
}

export interface ErrorLocation {
  /** 1-based */
  line: number
  /** 1-based */
  column: number
}

/**
 * Locate the detection error in the raw input, adding back the stripped command prefix.
 */
export function rawErrorLocation(raw: string, detection: InputDetection): ErrorLocation | null {
  if (!detection.error) return null
  const offset = Math.min(raw.length, detection.argumentOffset + detection.error.position)
  const before = raw.slice(0, offset)
  const lineStart = before.lastIndexOf('\n') + 1
  return { line: before.split('\n').length, column: offset - lineStart + 1 }
}
