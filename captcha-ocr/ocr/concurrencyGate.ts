/**
 * Counting semaphore bounding how many recognition calls run at once.
 *
 * Waiters queue FIFO. A released permit is handed straight to the oldest
 * waiter, so a late arrival can never overtake a queued call. `acquire()`
 * waits indefinitely unless given a timeout, in which case it rejects with
 * `GateTimeoutError` and leaves the queue.
 */

export class GateTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for a recognition permit`)
    this.name = 'GateTimeoutError'
  }
}

interface Waiter {
  grant: () => void
}

export class ConcurrencyGate {
  readonly permits: number
  private free: number
  private readonly waiters: Waiter[] = []

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`permits must be a positive integer, got ${permits}`)
    }
    this.permits = permits
    this.free = permits
  }

  /** Permits not currently held. */
  get available(): number {
    return this.free
  }

  /** Permits currently held. */
  get active(): number {
    return this.permits - this.free
  }

  /** Callers queued for a permit. */
  get pending(): number {
    return this.waiters.length
  }

  acquire(timeoutMs?: number): Promise<void> {
    if (this.free > 0 && this.waiters.length === 0) {
      this.free--
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null

      const waiter: Waiter = {
        grant: () => {
          if (timer !== null) clearTimeout(timer)
          resolve()
        },
      }
      this.waiters.push(waiter)

      if (timeoutMs !== undefined && timeoutMs > 0) {
        timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter)
          if (index !== -1) {
            this.waiters.splice(index, 1)
            reject(new GateTimeoutError(timeoutMs))
          }
        }, timeoutMs)
      }
    })
  }

  release(): void {
    const next = this.waiters.shift()
    if (next) {
      // Permit passes directly to the next waiter; `free` is unchanged.
      next.grant()
      return
    }
    if (this.free >= this.permits) {
      throw new Error('ConcurrencyGate released more times than acquired')
    }
    this.free++
  }

  /** Run `fn` while holding a permit, releasing it on every exit path. */
  async run<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs)
    try {
      return await fn()
    } finally {
      this.release()
    }
  }
}
