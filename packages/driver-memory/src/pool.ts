import { TransientConnectionError } from '@dbjob/core'

export interface PoolOptions {
  readonly max: number
  /** How long `acquire()` waits for a free slot. `0` fails at once when the pool is full. */
  readonly acquireTimeoutMs: number
}

interface Waiter {
  readonly resolve: () => void
  readonly reject: (err: unknown) => void
}

/**
 * Counting pool of connection slots. Waiters are served in arrival order.
 */
export class SlotPool {
  private inUse = 0
  private readonly waiters: Waiter[] = []

  constructor(
    private readonly driver: string,
    private readonly options: PoolOptions,
  ) {}

  get active(): number {
    return this.inUse
  }

  get waiting(): number {
    return this.waiters.length
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()
    if (this.inUse < this.options.max) {
      this.inUse++
      return
    }
    if (this.options.acquireTimeoutMs <= 0) throw this.exhausted()

    await new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
        const index = this.waiters.indexOf(waiter)
        if (index >= 0) this.waiters.splice(index, 1)
      }
      const waiter: Waiter = {
        resolve: () => {
          cleanup()
          resolve()
        },
        reject: (err) => {
          cleanup()
          reject(err)
        },
      }
      const onAbort = (): void => waiter.reject(signal?.reason)
      const timer = setTimeout(() => waiter.reject(this.exhausted()), this.options.acquireTimeoutMs)
      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(waiter)
    })
  }

  /** Hands the slot to the next waiter, or frees it. */
  release(): void {
    const next = this.waiters[0]
    if (next !== undefined) {
      next.resolve()
      return
    }
    this.inUse = Math.max(0, this.inUse - 1)
  }

  /** Rejects every waiter; later `acquire()` calls are up to the owner. */
  drain(reason: Error): void {
    for (const waiter of [...this.waiters]) waiter.reject(reason)
  }

  private exhausted(): TransientConnectionError {
    return new TransientConnectionError(
      'POOL_EXHAUSTED',
      `Connection pool exhausted (${this.options.max} in use)`,
      { driver: this.driver, timeoutMs: this.options.acquireTimeoutMs },
    )
  }
}
