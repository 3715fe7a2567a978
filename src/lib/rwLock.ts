/**
 * Read/write lock for async code
 *
 * Any number of readers may hold the lock together; a writer holds it alone.
 * Waiters are served in arrival order, so a queued writer is not starved by
 * readers that arrive after it.
 */

type Waiter = { kind: 'read' | 'write'; grant: () => void }

export class ReadWriteLock {
  private readers = 0
  private writing = false
  private waiters: Waiter[] = []

  /**
   * Runs `fn` while holding a shared read lock.
   */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read')
    try {
      return await fn()
    } finally {
      this.readers--
      this.drain()
    }
  }

  /**
   * Runs `fn` while holding the exclusive write lock.
   */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write')
    try {
      return await fn()
    } finally {
      this.writing = false
      this.drain()
    }
  }

  /** Current holders, for diagnostics */
  get state(): { readers: number; writing: boolean; waiting: number } {
    return { readers: this.readers, writing: this.writing, waiting: this.waiters.length }
  }

  private acquire(kind: 'read' | 'write'): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push({ kind, grant: resolve })
      this.drain()
    })
  }

  private drain(): void {
    while (this.waiters.length > 0 && !this.writing) {
      const next = this.waiters[0]
      if (next.kind === 'read') {
        this.waiters.shift()
        this.readers++
        next.grant()
        continue
      }
      if (this.readers === 0) {
        this.waiters.shift()
        this.writing = true
        next.grant()
      }
      break
    }
  }
}
