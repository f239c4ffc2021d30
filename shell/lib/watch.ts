import type { RuntimeSnapshot } from '../../src/lib/php/scope/snapshot'

export interface WatchChange {
  name: string
  before: string | null
  after: string | null
}

function previewOf(snapshot: RuntimeSnapshot, name: string): string | null {
  const info = Object.prototype.hasOwnProperty.call(snapshot.variables, name) ? snapshot.variables[name] : null
  return info ? info.preview : null
}

/**
 * Variables whose value is reported after every statement that changes it.
 */
export class WatchList {
  private readonly watched = new Map<string, string | null>()

  /** Start watching a variable (name without `$`); returns false when already watched */
  add(name: string, snapshot: RuntimeSnapshot): boolean {
    if (this.watched.has(name)) return false
    this.watched.set(name, previewOf(snapshot, name))
    return true
  }

  remove(name: string): boolean {
    return this.watched.delete(name)
  }

  clear(): void {
    this.watched.clear()
  }

  list(): Array<{ name: string; preview: string | null }> {
    return [...this.watched].map(([name, preview]) => ({ name, preview }))
  }

  /**
   * Record the new previews and return the variables that changed, in watch order.
   */
  update(snapshot: RuntimeSnapshot): WatchChange[] {
    const changes: WatchChange[] = []
    for (const [name, before] of this.watched) {
      const after = previewOf(snapshot, name)
      if (after !== before) {
        changes.push({ name, before, after })
        this.watched.set(name, after)
      }
    }
    return changes
  }
}
