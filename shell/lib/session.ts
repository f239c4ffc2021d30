import type { PhpParser } from '../../src/lib/php/core'
import { createPipeline } from '../../src/lib/php/completion/pipeline'
import { createDefaultMatchers } from '../../src/lib/php/completion/matchers'
import type { CompletionOutput } from '../../src/lib/php/completion/types'
import { InputBuffer } from '../../src/lib/php/input/buffer'
import { createCommandTable, detectInput, rawErrorLocation, splitCommand } from '../../src/lib/php/input/commands'
import type { CommandTable } from '../../src/lib/php/input/commands'
import { createSnapshotResolver } from '../../src/lib/php/scope/resolver'
import type { ScopeResolver } from '../../src/lib/php/scope/resolver'
import { emptySnapshot, mergeRegistries } from '../../src/lib/php/scope/snapshot'
import type { RuntimeSnapshot } from '../../src/lib/php/scope/snapshot'
import { createShellCommands } from './commands'
import type { ShellCommand, ShellHost } from './commands'
import type { CodeExecutor, ExecutionResult } from './executor'
import { WatchList } from './watch'

export const PROMPT = '> '
export const CONTINUATION_PROMPT = '... '

export interface SessionOptions {
  executor: CodeExecutor
  print: (text: string) => void
  requireSemicolons?: boolean
  windowSize?: number
  maxCandidates?: number
  /** Registry ids known up front, merged into every snapshot */
  registries?: Record<string, string[]>
  commands?: ShellCommand[]
  /** Custom parser for testing (injectable dependency) */
  parser?: PhpParser
}

export type LineOutcome = 'empty' | 'incomplete' | 'syntax-error' | 'executed' | 'command' | 'exit'

const NO_COMPLETIONS: CompletionOutput = { candidates: [], replacedPrefix: '', matchedBy: [] }

/**
 * One interactive session: buffers lines until a statement is complete, runs
 * statements and commands, and answers completion requests against the live scope.
 */
export class ReplSession {
  private readonly buffer = new InputBuffer()
  private readonly watchList = new WatchList()
  private readonly statements: string[] = []
  private readonly commands: ShellCommand[]
  private readonly commandsByName = new Map<string, ShellCommand>()
  private readonly commandTable: CommandTable
  private readonly completer: ReturnType<typeof createPipeline>
  private readonly host: ShellHost
  private snapshot: RuntimeSnapshot
  private resolver: ScopeResolver
  private exitRequested = false

  constructor(private readonly options: SessionOptions) {
    this.commands = options.commands ?? createShellCommands()
    for (const command of this.commands) {
      this.commandsByName.set(command.name, command)
    }
    this.commandTable = createCommandTable(this.commands)
    this.completer = createPipeline({
      matchers: createDefaultMatchers({ commands: this.commandTable.names() }),
      windowSize: options.windowSize,
      maxCandidates: options.maxCandidates,
      parser: options.parser,
    })

    this.snapshot = mergeRegistries(emptySnapshot(), options.registries ?? {})
    this.resolver = createSnapshotResolver(this.snapshot)

    this.host = {
      print: (text) => options.print(text),
      snapshot: () => this.snapshot,
      history: () => this.statements,
      watchList: this.watchList,
      execute: (code) => this.executeCode(code),
      requestExit: () => {
        this.exitRequested = true
      },
      commands: () => this.commands,
    }
  }

  get prompt(): string {
    return this.buffer.isEmpty ? PROMPT : CONTINUATION_PROMPT
  }

  get isExitRequested(): boolean {
    return this.exitRequested
  }

  get scope(): ScopeResolver {
    return this.resolver
  }

  get executedStatements(): readonly string[] {
    return this.statements
  }

  /**
   * Feed one line of input.
   */
  async handleLine(line: string): Promise<LineOutcome> {
    if (this.buffer.isEmpty && line.trim() === '') {
      return 'empty'
    }

    const source = this.buffer.append(line)
    const detection = detectInput(source, this.commandTable, {
      parser: this.options.parser,
      requireSemicolons: this.options.requireSemicolons,
    })

    if (detection.status === 'INCOMPLETE') {
      this.buffer.recordError(detection.error)
      return 'incomplete'
    }

    this.buffer.reset()

    if (detection.status === 'SYNTAX_ERROR') {
      const location = rawErrorLocation(source, detection)
      const where = location ? ` at line ${location.line}, column ${location.column}` : ''
      this.options.print(`PHP Parse error: ${detection.error?.message ?? 'syntax error'}${where}`)
      return 'syntax-error'
    }

    if (detection.command) {
      const command = this.commandsByName.get(detection.command.name)
      if (!command) {
        throw new Error(`Command not registered: ${detection.command.name}`)
      }
      try {
        await command.run(
          { options: detection.options, argument: command.takesCode ? detection.code : detection.argument },
          this.host
        )
      } catch (err) {
        this.options.print(`Error: ${err instanceof Error ? err.message : String(err)}`)
      }
      return this.exitRequested ? 'exit' : 'command'
    }

    await this.executeCode(detection.code)
    return 'executed'
  }

  /**
   * Complete the current line, taking any buffered lines as preceding context.
   */
  complete(line: string, cursor: number = line.length): CompletionOutput {
    const before = this.buffer.isEmpty ? '' : `${this.buffer.combinedSource}\n`
    const source = before + line
    const offset = before.length + Math.max(0, Math.min(cursor, line.length))

    const split = splitCommand(source, this.commandTable)
    // Past `command ` the argument is completed on its own
    if (split.command && offset >= split.argumentOffset && /\s/.test(source.charAt(split.argumentOffset - 1))) {
      if (!split.command.takesCode) {
        return NO_COMPLETIONS
      }
      return this.completer({
        source: split.argument,
        cursorOffset: offset - split.argumentOffset,
        scope: this.resolver,
      })
    }

    return this.completer({ source, cursorOffset: offset, scope: this.resolver })
  }

  /**
   * Discard buffered lines (Ctrl-C). Returns how many lines were dropped.
   */
  abort(): number {
    const dropped = this.buffer.rawLines.length
    this.buffer.reset()
    return dropped
  }

  /**
   * End of input: a statement still waiting for lines is reported with its last parse error.
   */
  finish(): void {
    const error = this.buffer.lastParseError
    if (!this.buffer.isEmpty && error) {
      this.options.print(`PHP Parse error: ${error.message}`)
    }
    this.buffer.reset()
  }

  private async executeCode(code: string): Promise<ExecutionResult | null> {
    if (!code.trim()) {
      return null
    }

    const result = await this.options.executor.execute(code, this.statements)
    const output = result.output.replace(/\n$/, '')
    if (output) {
      this.options.print(output)
    }

    if (result.timedOut) {
      this.options.print('Execution timed out')
      return result
    }
    if (result.error) {
      this.options.print(`PHP error: ${result.error}`)
      return result
    }

    this.statements.push(code)
    if (result.snapshot) {
      this.applySnapshot(result.snapshot)
    }
    return result
  }

  private applySnapshot(snapshot: RuntimeSnapshot): void {
    this.snapshot = mergeRegistries(snapshot, this.options.registries ?? {})
    this.resolver = createSnapshotResolver(this.snapshot)

    for (const change of this.watchList.update(this.snapshot)) {
      this.options.print(
        change.after === null ? `$${change.name} is undefined` : `$${change.name} = ${change.after}`
      )
    }
  }
}
