import readline from 'readline'
import path from 'path'
import { DEFAULT_CONFIG, loadConfig, registryMap } from './lib/config'
import type { ShellConfig } from './lib/config'
import { createPhpExecutor } from './lib/executor'
import { ReplSession } from './lib/session'

function parseArgs(): { config?: string; php?: string } {
  const args = process.argv.slice(2)
  const result: { config?: string; php?: string } = {}
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--config' && args[i + 1]) {
      result.config = args[i + 1]
    } else if (args[i] === '--php' && args[i + 1]) {
      result.php = args[i + 1]
    }
  }
  return result
}

async function start() {
  const args = parseArgs()

  let config: ShellConfig = DEFAULT_CONFIG
  if (args.config) {
    try {
      config = await loadConfig(args.config)
      console.log(`✓ Loaded config from: ${path.resolve(args.config)}`)
    } catch (error) {
      console.error('Failed to load config:', error instanceof Error ? error.message : error)
      process.exit(1)
    }
  }

  const phpBinary = args.php || config.general.php_binary
  const session = new ReplSession({
    executor: createPhpExecutor({ phpBinary, timeoutMs: config.general.timeout_ms }),
    print: (text) => console.log(text),
    requireSemicolons: config.general.require_semicolons,
    windowSize: config.completion.window_size,
    maxCandidates: config.completion.max_candidates,
    registries: registryMap(config),
  })

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    historySize: config.general.history_size,
    completer: (line: string): [string[], string] => {
      const result = session.complete(line)
      return [result.candidates.map((candidate) => candidate.text), result.replacedPrefix]
    },
  })

  console.log(`phrepl using ${phpBinary}. Type "help" for commands.`)

  let pending: Promise<void> = Promise.resolve()

  const handle = async (line: string) => {
    const outcome = await session.handleLine(line)
    if (outcome === 'exit') {
      rl.close()
      return
    }
    rl.setPrompt(session.prompt)
    rl.prompt()
  }

  // Lines pasted while a statement runs wait their turn
  rl.on('line', (line) => {
    pending = pending.then(() => handle(line)).catch((error: unknown) => {
      console.error('Error:', error instanceof Error ? error.message : error)
      rl.setPrompt(session.prompt)
      rl.prompt()
    })
  })

  rl.on('SIGINT', () => {
    if (session.abort() === 0) {
      process.stdout.write('\n(type "exit" to quit)')
    }
    process.stdout.write('\n')
    rl.setPrompt(session.prompt)
    rl.prompt()
  })

  rl.on('close', () => {
    session.finish()
    process.exit(0)
  })

  rl.setPrompt(session.prompt)
  rl.prompt()
}

start().catch((error: unknown) => {
  console.error('Error starting shell:', error instanceof Error ? error.message : error)
  process.exit(1)
})
