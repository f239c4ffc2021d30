import { spawn } from 'child_process'
import { fileURLToPath } from 'url'
import { parseSnapshot } from '../../src/lib/php/scope/snapshot'
import type { RuntimeSnapshot } from '../../src/lib/php/scope/snapshot'

export interface ExecutionResult {
  /** What the statement printed */
  output: string
  /** Uncaught throwable or process failure, null on success */
  error: string | null
  /** Scope after the statement, null when the runner did not report one */
  snapshot: RuntimeSnapshot | null
  elapsedMs: number | null
  timedOut: boolean
}

export interface CodeExecutor {
  /**
   * Evaluate code in a scope rebuilt from previously executed statements.
   */
  execute: (code: string, history: readonly string[]) => Promise<ExecutionResult>
}

export interface PhpExecutorOptions {
  phpBinary: string
  timeoutMs: number
  /** Defaults to runner.php beside this module */
  runnerPath?: string
}

export const SNAPSHOT_MARKER = '__PHREPL_SNAPSHOT__'

/** runner.php declares its helpers under this prefix; they are not part of the session scope */
export const RUNNER_FUNCTION_PREFIX = 'phrepl_'

const DEFAULT_RUNNER_PATH = fileURLToPath(new URL('./runner.php', import.meta.url))

interface RunnerReport {
  error: string | null
  elapsedMs: number | null
  snapshot: RuntimeSnapshot | null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseReport(json: string): RunnerReport {
  const value: unknown = JSON.parse(json)
  if (!isRecord(value)) {
    throw new Error('runner report must be an object')
  }
  return {
    error: typeof value.error === 'string' ? value.error : null,
    elapsedMs: typeof value.elapsed_ms === 'number' ? value.elapsed_ms : null,
    snapshot: value.snapshot === undefined || value.snapshot === null ? null : withoutRunnerFunctions(parseSnapshot(value.snapshot)),
  }
}

function withoutRunnerFunctions(snapshot: RuntimeSnapshot): RuntimeSnapshot {
  return { ...snapshot, functions: snapshot.functions.filter((name) => !name.startsWith(RUNNER_FUNCTION_PREFIX)) }
}

/**
 * Split runner stdout into the statement's own output and the scope report.
 */
export function splitOutput(stdout: string, marker: string = SNAPSHOT_MARKER): { output: string; report: RunnerReport | null } {
  const separator = `\n${marker}\n`
  const index = stdout.lastIndexOf(separator)
  if (index === -1) {
    return { output: stdout, report: null }
  }
  const output = stdout.slice(0, index)
  const json = stdout.slice(index + separator.length).trim()
  try {
    return { output, report: parseReport(json) }
  } catch (err) {
    console.warn('Failed to read runner report:', err instanceof Error ? err.message : err)
    return { output, report: null }
  }
}

/**
 * Build a result from a finished runner process.
 */
export function buildResult(stdout: string, stderr: string, exitCode: number | null, timedOut: boolean): ExecutionResult {
  const { output, report } = splitOutput(stdout)

  let error = report?.error ?? null
  if (!error && !report && !timedOut && exitCode !== 0) {
    error = stderr.trim() || `PHP exited with code ${exitCode ?? 'unknown'}`
  }

  return {
    output,
    error,
    snapshot: report?.snapshot ?? null,
    elapsedMs: report?.elapsedMs ?? null,
    timedOut,
  }
}

/**
 * Executor that runs each statement in a fresh PHP process.
 */
export function createPhpExecutor(options: PhpExecutorOptions): CodeExecutor {
  const runnerPath = options.runnerPath ?? DEFAULT_RUNNER_PATH

  return {
    execute: (code, history) =>
      new Promise<ExecutionResult>((resolve) => {
        const child = spawn(options.phpBinary, [runnerPath], { stdio: ['pipe', 'pipe', 'pipe'] })
        let stdout = ''
        let stderr = ''
        let timedOut = false

        const timer = setTimeout(() => {
          timedOut = true
          child.kill('SIGKILL')
        }, options.timeoutMs)

        child.stdout.setEncoding('utf-8')
        child.stdout.on('data', (chunk: string) => {
          stdout += chunk
        })
        child.stderr.setEncoding('utf-8')
        child.stderr.on('data', (chunk: string) => {
          stderr += chunk
        })
        child.stdin.on('error', (err) => {
          console.warn('Failed to write to PHP process:', err.message)
        })

        child.on('error', (err) => {
          clearTimeout(timer)
          resolve({
            output: '',
            error: `Failed to start ${options.phpBinary}: ${err.message}`,
            snapshot: null,
            elapsedMs: null,
            timedOut: false,
          })
        })
        child.on('close', (exitCode) => {
          clearTimeout(timer)
          resolve(buildResult(stdout, stderr, exitCode, timedOut))
        })

        child.stdin.end(JSON.stringify({ history, code, marker: SNAPSHOT_MARKER }))
      }),
  }
}
