import type { DebugLogEntry } from '@dbjob/validation'

import type { Logger } from '../debug/logger.js'
import { entry } from '../debug/logger.js'

export type PipelineState =
  | 'configured'
  | 'connectionAcquired'
  | 'transactionOpen'
  | 'executing'
  | 'materializing'
  | 'completing'
  | 'succeeded'
  | 'failed'
  | 'canceled'

export interface ReleaseFailure {
  readonly label: string
  /** Critical releases (a transaction's commit) turn a successful run into a failure. */
  readonly critical: boolean
  readonly error: unknown
}

interface Deferred {
  readonly label: string
  readonly release: () => Promise<void>
  readonly critical: boolean
}

export interface RunContextOptions {
  readonly logger: Logger
  readonly signal?: AbortSignal | undefined
  readonly timeoutMs?: number | undefined
  readonly debug?: boolean | undefined
}

/**
 * Resources and diagnostics of one run attempt. Resources are released in
 * reverse acquisition order, exactly once.
 */
export class RunContext {
  readonly signal: AbortSignal | undefined
  readonly timeoutMs: number | undefined
  readonly debugLog: DebugLogEntry[] = []
  private readonly logger: Logger
  private readonly debug: boolean
  private readonly deferred: Deferred[] = []
  private disposed = false
  private current: PipelineState = 'configured'

  constructor(options: RunContextOptions) {
    this.logger = options.logger
    this.signal = options.signal
    this.timeoutMs = options.timeoutMs
    this.debug = options.debug === true
  }

  get state(): PipelineState {
    return this.current
  }

  get isAlive(): boolean {
    return !this.disposed
  }

  get canceled(): boolean {
    return this.signal?.aborted === true
  }

  transition(next: PipelineState): void {
    this.logger.trace({ from: this.current, to: next }, 'state')
    this.current = next
  }

  defer(label: string, release: () => Promise<void>, options: { critical?: boolean } = {}): void {
    this.deferred.push({ label, release, critical: options.critical === true })
  }

  record(phase: DebugLogEntry['phase'], message: string, startedAt: number, details?: unknown): void {
    if (this.debug) this.debugLog.push(entry(phase, message, Date.now() - startedAt, details))
  }

  async dispose(): Promise<ReleaseFailure[]> {
    if (this.disposed) return []
    this.disposed = true

    const failures: ReleaseFailure[] = []
    const pending = this.deferred.splice(0).reverse()
    for (const resource of pending) {
      try {
        await resource.release()
      } catch (err) {
        failures.push({ label: resource.label, critical: resource.critical, error: err })
        if (!resource.critical) {
          this.logger.warn({ err, resource: resource.label }, 'Failed to release resource')
        }
      }
    }
    return failures
  }
}
