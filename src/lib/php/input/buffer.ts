import type { ErrorInfo } from '../core'

/**
 * Lines typed since the last complete statement.
 */
export class InputBuffer {
  private lines: string[] = []
  private lastError: ErrorInfo | null = null

  get rawLines(): readonly string[] {
    return this.lines
  }

  /** Lines joined with `\n` */
  get combinedSource(): string {
    return this.lines.join('\n')
  }

  get lastParseError(): ErrorInfo | null {
    return this.lastError
  }

  get isEmpty(): boolean {
    return this.lines.length === 0
  }

  /**
   * Add a line and return the combined source.
   */
  append(line: string): string {
    this.lines.push(line)
    return this.combinedSource
  }

  recordError(error: ErrorInfo | null): void {
    this.lastError = error
  }

  reset(): void {
    this.lines = []
    this.lastError = null
  }
}
