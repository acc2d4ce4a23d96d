import type {
  BufferingMode,
  DbJobError,
  IsolationLevel,
  JobConfiguration,
  JobOutcome,
} from '@dbjob/validation'
import { ConfigError } from '@dbjob/validation'

import type { JobBody, PipelineRuntime, SharedScope } from './pipeline.js'
import { releaseContext, runJob } from './pipeline.js'

export interface ExecuteOptions {
  readonly signal?: AbortSignal | undefined
}

/**
 * Result of `executeDisposable()`. The run's connection, transaction and
 * cursor stay open until `dispose()`, which commits (or rolls back after a
 * cancel without `commitOnCancel`) and releases them.
 */
export interface DisposableResult<T> {
  readonly value: T
  readonly outcome: JobOutcome<T>
  readonly disposed: boolean
  dispose(): Promise<void>
}

/**
 * One deferred unit of database work. Configure with the `with*` setters,
 * then run it once with `execute`, `executeHandled` or `executeDisposable`.
 * Setters throw `ConfigError(JOB_LOCKED)` once the run has started.
 */
export class DbJob<T> {
  private config: JobConfiguration
  private fallback: ((error: DbJobError) => T) | undefined
  private readonly completedHooks: ((value: T) => void | Promise<void>)[] = []
  private readonly failedHooks: ((error: DbJobError) => void | Promise<void>)[] = []
  private started = false

  constructor(
    config: JobConfiguration,
    private readonly body: JobBody<T>,
    private readonly runtime: PipelineRuntime,
    private readonly scope?: SharedScope | undefined,
  ) {
    this.config = config
  }

  // --- Configuration ---

  configuration(): JobConfiguration {
    return { ...this.config, retry: { ...this.config.retry } }
  }

  get locked(): boolean {
    return this.started
  }

  withIsolationLevel(level: IsolationLevel): this {
    return this.update({ isolationLevel: level })
  }

  withTimeout(ms: number): this {
    return this.update({ commandTimeoutMs: ms })
  }

  /** Total attempts, including the first. Only transient connection failures are retried. */
  withRetry(attempts: number, delayMs?: number): this {
    return this.update({ retry: { attempts, delayMs } })
  }

  withBuffering(mode: BufferingMode): this {
    return this.update({ buffering: mode })
  }

  /** Commit instead of rolling back when the run is canceled. */
  withCommitOnCancel(commit = true): this {
    return this.update({ commitOnCancel: commit })
  }

  withDebug(debug = true): this {
    return this.update({ debug })
  }

  /** Turns a failed run into a success with the produced value. The error stays on `outcome.error`. */
  onError(fallback: (error: DbJobError) => T): this {
    this.assertMutable()
    this.fallback = fallback
    return this
  }

  onCompleted(hook: (value: T) => void | Promise<void>): this {
    this.assertMutable()
    this.completedHooks.push(hook)
    return this
  }

  onFailed(hook: (error: DbJobError) => void | Promise<void>): this {
    this.assertMutable()
    this.failedHooks.push(hook)
    return this
  }

  // --- Execution ---

  /** Never rejects. */
  async executeHandled(options: ExecuteOptions = {}): Promise<JobOutcome<T>> {
    const { outcome } = await this.run(options, false)
    return outcome
  }

  /**
   * Resolves with the value, or the partial value of a canceled run.
   * Rejects with the terminal error otherwise.
   */
  async execute(options: ExecuteOptions = {}): Promise<T> {
    return unwrap(await this.executeHandled(options))
  }

  async executeDisposable(options: ExecuteOptions = {}): Promise<DisposableResult<T>> {
    const { outcome, release } = await this.run(options, true)
    const value = unwrap(outcome)
    let disposed = false
    return {
      value,
      outcome,
      get disposed() {
        return disposed
      },
      async dispose() {
        if (disposed) return
        disposed = true
        await release()
      },
    }
  }

  private async run(
    options: ExecuteOptions,
    keepAlive: boolean,
  ): Promise<{ outcome: JobOutcome<T>; release: () => Promise<void> }> {
    if (this.started) {
      const error = new ConfigError('JOB_LOCKED', 'Job has already been executed', 'job')
      return { outcome: { status: 'failed', error, attempts: 0 }, release: async () => {} }
    }
    this.started = true

    const { outcome, context } = await runJob(
      this.configuration(),
      this.body,
      { fallback: this.fallback, onCompleted: this.completedHooks, onFailed: this.failedHooks },
      this.runtime,
      { signal: options.signal, scope: this.scope, keepAlive },
    )
    return {
      outcome,
      release: async () => {
        if (context !== undefined) await releaseContext(context)
      },
    }
  }

  private update(patch: Partial<JobConfiguration>): this {
    this.assertMutable()
    this.config = { ...this.config, ...patch }
    return this
  }

  private assertMutable(): void {
    if (this.started) {
      throw new ConfigError('JOB_LOCKED', 'Job configuration cannot change once it has run', 'job')
    }
  }
}

function unwrap<T>(outcome: JobOutcome<T>): T {
  switch (outcome.status) {
    case 'succeeded':
      return outcome.value
    case 'failed':
      throw outcome.error
    case 'canceled':
      if (outcome.value !== undefined) return outcome.value
      throw outcome.error
  }
}
