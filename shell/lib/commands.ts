import type { CommandSpec } from '../../src/lib/php/input/commands'
import type { RuntimeSnapshot } from '../../src/lib/php/scope/snapshot'
import type { ExecutionResult } from './executor'
import type { WatchList } from './watch'

export interface CommandInvocation {
  options: string[]
  argument: string
}

/**
 * What a command may do to the session running it.
 */
export interface ShellHost {
  print: (text: string) => void
  snapshot: () => RuntimeSnapshot
  history: () => readonly string[]
  watchList: WatchList
  execute: (code: string) => Promise<ExecutionResult | null>
  requestExit: () => void
  commands: () => readonly ShellCommand[]
}

export interface ShellCommand extends CommandSpec {
  description: string
  usage: string
  run: (invocation: CommandInvocation, host: ShellHost) => Promise<void> | void
}

function variableName(argument: string): string | null {
  const match = /^\$?([A-Za-z_\x80-\uffff][A-Za-z0-9_\x80-\uffff]*)$/.exec(argument.trim())
  return match ? match[1] : null
}

const help: ShellCommand = {
  name: 'help',
  takesCode: false,
  description: 'Show available commands',
  usage: 'help',
  run: (_invocation, host) => {
    const commands = host.commands()
    const width = Math.max(...commands.map((command) => command.usage.length))
    for (const command of commands) {
      host.print(`  ${command.usage.padEnd(width)}  ${command.description}`)
    }
  },
}

const exit: ShellCommand = {
  name: 'exit',
  aliases: ['quit', 'q'],
  takesCode: false,
  description: 'End the session',
  usage: 'exit',
  run: (_invocation, host) => {
    host.requestExit()
  },
}

const ls: ShellCommand = {
  name: 'ls',
  takesCode: false,
  description: 'List variables in scope',
  usage: 'ls',
  run: (_invocation, host) => {
    const variables = Object.entries(host.snapshot().variables).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    if (variables.length === 0) {
      host.print('No variables defined')
      return
    }
    for (const [name, info] of variables) {
      host.print(`$${name} = ${info.preview}`)
    }
  },
}

const history: ShellCommand = {
  name: 'history',
  aliases: ['hist'],
  takesCode: false,
  description: 'Show executed statements',
  usage: 'history',
  run: (_invocation, host) => {
    host.history().forEach((statement, i) => {
      host.print(`${String(i + 1).padStart(4)}: ${statement}`)
    })
  },
}

const watch: ShellCommand = {
  name: 'watch',
  takesCode: false,
  description: 'Report a variable whenever it changes',
  usage: 'watch [--list | --clear [name|all]] [name]',
  run: ({ options, argument }, host) => {
    const { watchList } = host

    if (options.includes('--list') || (options.length === 0 && !argument.trim())) {
      const watched = watchList.list()
      if (watched.length === 0) {
        host.print('No watched variables')
        return
      }
      for (const { name, preview } of watched) {
        host.print(`$${name} = ${preview ?? '(undefined)'}`)
      }
      return
    }

    if (options.includes('--clear')) {
      const target = argument.trim()
      if (!target || target === 'all') {
        watchList.clear()
        host.print('Cleared all watches')
        return
      }
      const name = variableName(target)
      if (name && watchList.remove(name)) {
        host.print(`Stopped watching $${name}`)
      } else {
        host.print(`Not watching ${target}`)
      }
      return
    }

    const name = variableName(argument)
    if (!name) {
      host.print(`Invalid variable name: ${argument.trim()}`)
      return
    }
    if (watchList.add(name, host.snapshot())) {
      host.print(`Watching $${name}`)
    } else {
      host.print(`Already watching $${name}`)
    }
  },
}

const timeit: ShellCommand = {
  name: 'timeit',
  takesCode: true,
  description: 'Execute code and report how long it took',
  usage: 'timeit <code>',
  run: async ({ argument }, host) => {
    if (!argument.trim()) {
      host.print('Usage: timeit <code>')
      return
    }
    const result = await host.execute(argument)
    if (result && result.elapsedMs !== null) {
      host.print(`Command took ${result.elapsedMs.toFixed(6)} ms to complete.`)
    }
  },
}

export function createShellCommands(): ShellCommand[] {
  return [help, exit, ls, history, watch, timeit]
}
