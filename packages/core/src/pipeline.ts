import { setTimeout as delay } from 'node:timers/promises'

import type {
  BufferingMode,
  CommandBehavior,
  CommandSpec,
  DebugLogEntry,
  JobConfiguration,
  JobOutcome,
  ParameterDescriptor,
} from '@dbjob/validation'
import {
  CanceledError,
  CommandExecutionError,
  ConfigError,
  DbJobError,
  HookError,
  isTransientError,
  MappingError,
  validateCommandSpec,
  validateJobConfig,
} from '@dbjob/validation'

import { bindParameters, ParameterCollection } from './binding/parameters.js'
import { buildCommand, resolveCommandSpec } from './command/builder.js'
import type { Logger } from './debug/logger.js'
import { entry, logError } from './debug/logger.js'
import { ResultMaterializer } from './materialize/materializer.js'
import { RunContext } from './run/context.js'
import type { Driver, DriverConnection, DriverTransaction } from './types/interfaces.js'

// ── Public Types ───────────────────────────────────────────────

/** What a job does with the rows once the command has run. */
export interface JobBody<T> {
  readonly expectsRows: boolean
  readonly behavior?: CommandBehavior | undefined
  /** Resolves `undefined` only when the materializer observed cancellation first. */
  materialize(results: ResultMaterializer, buffering: BufferingMode): Promise<T | undefined>
}

export interface JobHooks<T> {
  readonly fallback?: ((error: DbJobError) => T) | undefined
  readonly onCompleted: readonly ((value: T) => void | Promise<void>)[]
  readonly onFailed: readonly ((error: DbJobError) => void | Promise<void>)[]
}

/** Connection (and transaction) owned by a caller-managed scope. */
export interface SharedScope {
  readonly connection: DriverConnection
  readonly transaction: DriverTransaction | undefined
  readonly closed: boolean
}

export interface PipelineRuntime {
  readonly driver: Driver
  readonly logger: Logger
  readonly parameterNamesCaseSensitive: boolean
  readonly isClosed: () => boolean
}

export interface RunOptions {
  readonly signal?: AbortSignal | undefined
  readonly scope?: SharedScope | undefined
  /** Keep the run context open after success; the caller disposes it. */
  readonly keepAlive?: boolean | undefined
}

export interface RunResult<T> {
  readonly outcome: JobOutcome<T>
  /** Still-open context of a successful `keepAlive` run. */
  readonly context: RunContext | undefined
}

/** Resolved command and bound parameters, reused by every attempt. */
interface PreparedCommand {
  readonly spec: CommandSpec
  readonly parameters: readonly ParameterDescriptor[]
}

type AttemptResult<T> =
  | { readonly status: 'succeeded'; readonly value: T; readonly context: RunContext }
  | { readonly status: 'failed'; readonly error: DbJobError; readonly context: RunContext }
  | { readonly status: 'canceled'; readonly value: T | undefined; readonly context: RunContext }

let jobCounter = 0

// ── runJob ─────────────────────────────────────────────────────

/**
 * Runs one job to a terminal outcome. Never rejects: every failure ends up in
 * the returned outcome.
 *
 * Only `TransientConnectionError` is retried, each attempt in a fresh run
 * context after the previous one was fully released.
 */
export async function runJob<T>(
  config: JobConfiguration,
  body: JobBody<T>,
  hooks: JobHooks<T>,
  runtime: PipelineRuntime,
  options: RunOptions = {},
): Promise<RunResult<T>> {
  const jobId = `job-${++jobCounter}`
  const log = runtime.logger.child({ job: jobId, driver: runtime.driver.name })
  const debugLog: DebugLogEntry[] = []

  const invalid = preflight(config, runtime, options)
  if (invalid !== null) {
    return finish({ status: 'failed', error: invalid, attempts: 0 }, undefined)
  }

  // binding and command errors end the job before any I/O
  let prepared: PreparedCommand
  try {
    prepared = prepareCommand(config, runtime)
  } catch (err) {
    const error = normalizeError(err, runtime.driver.name, undefined, [])
    return finish({ status: 'failed', error, attempts: 0 }, undefined)
  }

  let attempt = 0
  let result: AttemptResult<T>
  while (true) {
    attempt++
    result = await runAttempt(config, prepared, body, runtime, options, log)
    debugLog.push(...result.context.debugLog)

    if (result.status !== 'failed' || !isTransientError(result.error)) break
    // a shared scope owns the connection, so there is nothing to rebuild
    if (options.scope !== undefined) break
    if (attempt >= config.retry.attempts || options.signal?.aborted === true) break

    log.warn({ attempt, err: result.error }, 'Transient failure, retrying')
    if (config.debug) debugLog.push(entry('retry', `Attempt ${attempt} failed: ${result.error.code}`, 0))
    const waitMs = config.retry.delayMs ?? 0
    if (waitMs > 0) {
      try {
        await delay(waitMs, undefined, { signal: options.signal })
      } catch (err) {
        log.debug({ err, attempt }, 'Retry back-off aborted')
        return finish(
          {
            status: 'canceled',
            value: undefined,
            error: new CanceledError('pipeline', options.signal?.reason),
            attempts: attempt,
          },
          undefined,
        )
      }
    }
  }

  switch (result.status) {
    case 'succeeded':
      return finish({ status: 'succeeded', value: result.value, attempts: attempt }, result.context)
    case 'canceled':
      return finish(
        {
          status: 'canceled',
          value: result.value,
          error: new CanceledError('pipeline', options.signal?.reason),
          attempts: attempt,
        },
        undefined,
      )
    case 'failed':
      return finish({ status: 'failed', error: result.error, attempts: attempt }, undefined)
  }

  async function finish(outcome: JobOutcome<T>, context: RunContext | undefined): Promise<RunResult<T>> {
    const settled = await settle(outcome, hooks, log)
    if (settled.status === 'failed' && context !== undefined) {
      // a hook failed after a keepAlive success
      await releaseContext(context)
      context = undefined
    }
    log.debug({ status: settled.status, attempts: settled.attempts }, 'Job finished')
    return {
      outcome: config.debug && debugLog.length > 0 ? { ...settled, debugLog } : settled,
      context,
    }
  }
}

function preflight(config: JobConfiguration, runtime: PipelineRuntime, options: RunOptions): DbJobError | null {
  const { driver } = runtime
  const { scope } = options
  if (runtime.isClosed()) {
    return new ConfigError('CONNECTOR_CLOSED', 'Connector is closed', 'job')
  }
  if (scope?.closed === true) {
    return new ConfigError('SCOPE_CLOSED', 'Shared scope is already closed', 'job')
  }
  const invalid = validateJobConfig(config)
  if (invalid !== null) return invalid

  const level = config.isolationLevel
  if (level === undefined) return null
  if (!driver.capabilities.transactions) {
    return new ConfigError('TRANSACTIONS_UNSUPPORTED', `Driver '${driver.name}' does not support transactions`, 'pipeline')
  }
  const shared = scope?.transaction?.isolationLevel
  if (scope !== undefined && shared !== level) {
    return new ConfigError(
      'SCOPE_ISOLATION_MISMATCH',
      `Job isolation level '${level}' differs from the scope's (${shared ?? 'no transaction'})`,
      'job',
    )
  }
  return null
}

function prepareCommand(config: JobConfiguration, runtime: PipelineRuntime): PreparedCommand {
  const spec = resolveCommandSpec(config.command)
  const invalid = validateCommandSpec(spec)
  if (invalid !== null) throw invalid
  const parameters = bindParameters(spec.parameters, {
    caseSensitive: runtime.parameterNamesCaseSensitive,
    ...spec.restrictions,
  })
  return { spec, parameters }
}

// ── Attempt ────────────────────────────────────────────────────

async function runAttempt<T>(
  config: JobConfiguration,
  prepared: PreparedCommand,
  body: JobBody<T>,
  runtime: PipelineRuntime,
  options: RunOptions,
  log: Logger,
): Promise<AttemptResult<T>> {
  const { driver } = runtime
  const { signal, scope } = options
  const ctx = new RunContext({ logger: log, signal, timeoutMs: config.commandTimeoutMs, debug: config.debug })

  const { spec, parameters } = prepared
  let verdict: 'commit' | 'rollback' = 'rollback'
  let result: AttemptResult<T>

  const checkpoint = (): void => {
    if (ctx.canceled) throw new CanceledError('pipeline', signal?.reason)
  }

  try {
    checkpoint()

    // 1. Connection
    let t = Date.now()
    const connection = scope?.connection ?? (await driver.openConnection(signal))
    if (scope === undefined) ctx.defer('connection', () => connection.dispose())
    ctx.transition('connectionAcquired')
    ctx.record('connection', scope !== undefined ? 'Joined shared connection' : 'Connection acquired', t)
    checkpoint()

    // 2. Transaction
    let transaction = scope?.transaction
    if (scope === undefined && config.isolationLevel !== undefined) {
      t = Date.now()
      const tx = await connection.beginTransaction(config.isolationLevel)
      transaction = tx
      ctx.defer(
        'transaction',
        async () => {
          try {
            if (verdict === 'commit') await tx.commit()
            else await tx.rollback()
          } finally {
            await tx.dispose()
          }
        },
        { critical: true },
      )
      ctx.transition('transactionOpen')
      ctx.record('transaction', `Transaction started (${config.isolationLevel})`, t)
      checkpoint()
    }

    // 3. Command
    t = Date.now()
    const command = buildCommand({
      connection,
      transaction,
      capabilities: driver.capabilities,
      spec,
      parameters,
      timeoutMs: ctx.timeoutMs,
      behavior: body.behavior,
      expectsRows: body.expectsRows,
    })
    ctx.defer('command', () => command.dispose())
    ctx.record('command', 'Command built', t, { text: command.text, parameters: parameters.map((p) => p.name) })
    checkpoint()

    // 4. Execute
    ctx.transition('executing')
    t = Date.now()
    const cursor = await command.execute(signal)
    ctx.defer('cursor', () => cursor.dispose())
    ctx.record('execution', 'Executed', t)

    // 5. Materialize
    ctx.transition('materializing')
    t = Date.now()
    const results = new ResultMaterializer(cursor, {
      signal,
      mapSettings: spec.mapSettings,
      isAlive: () => ctx.isAlive,
    })
    const value = await body.materialize(results, config.buffering)
    if (spec.parameters instanceof ParameterCollection) {
      spec.parameters.applyOutputs(command.outputValues())
    }
    ctx.record('materialization', 'Materialized', t)

    if (results.canceled) {
      verdict = config.commitOnCancel ? 'commit' : 'rollback'
      result = { status: 'canceled', value, context: ctx }
    } else if (value !== undefined) {
      verdict = 'commit'
      result = { status: 'succeeded', value, context: ctx }
    } else {
      throw new MappingError({ code: 'UNSUPPORTED_SHAPE', shape: 'result shape produced no value' })
    }
  } catch (err) {
    verdict = 'rollback'
    if (err instanceof CanceledError || (ctx.canceled && !(err instanceof DbJobError))) {
      result = { status: 'canceled', value: undefined, context: ctx }
    } else {
      result = { status: 'failed', error: normalizeError(err, driver.name, spec, parameters), context: ctx }
    }
  }

  // 6. Complete
  ctx.transition('completing')
  if (options.keepAlive === true && result.status === 'succeeded') return result

  const t = Date.now()
  const failures = await ctx.dispose()
  ctx.record('completion', `Released (${result.status})`, t)
  ctx.transition(result.status)

  const critical = failures.find((f) => f.critical)
  if (critical !== undefined && result.status === 'succeeded') {
    return {
      status: 'failed',
      error: normalizeError(critical.error, driver.name, spec, parameters),
      context: ctx,
    }
  }
  return result
}

/** Releases a context kept open by a `keepAlive` run. Rejects when the commit fails. */
export async function releaseContext(context: RunContext): Promise<void> {
  const failures = await context.dispose()
  const critical = failures.find((f) => f.critical)
  if (critical !== undefined) {
    throw critical.error instanceof Error ? critical.error : new Error(String(critical.error))
  }
}

// ── Outcome ────────────────────────────────────────────────────

async function settle<T>(outcome: JobOutcome<T>, hooks: JobHooks<T>, log: Logger): Promise<JobOutcome<T>> {
  if (outcome.status === 'succeeded') {
    for (const hook of hooks.onCompleted) {
      try {
        await hook(outcome.value)
      } catch (err) {
        logError(log, err, 'onCompleted hook failed')
        return { status: 'failed', error: new HookError('onCompleted', err), attempts: outcome.attempts }
      }
    }
    return outcome
  }

  if (outcome.status === 'canceled') return outcome

  log.error({ err: outcome.error }, 'Job failed')
  for (const hook of hooks.onFailed) {
    try {
      await hook(outcome.error)
    } catch (err) {
      logError(log, err, 'onFailed hook failed')
      return { status: 'failed', error: new HookError('onFailed', err), attempts: outcome.attempts }
    }
  }

  if (hooks.fallback === undefined) return outcome
  try {
    const value = hooks.fallback(outcome.error)
    return { status: 'succeeded', value, error: outcome.error, attempts: outcome.attempts }
  } catch (err) {
    logError(log, err, 'onError fallback failed')
    return { status: 'failed', error: new HookError('onError', err), attempts: outcome.attempts }
  }
}

function normalizeError(
  err: unknown,
  driver: string,
  spec: CommandSpec | undefined,
  parameters: readonly ParameterDescriptor[],
): DbJobError {
  if (err instanceof DbJobError) return err
  const cause = err instanceof Error ? err : new Error(String(err))
  return new CommandExecutionError(
    {
      code: 'COMMAND_FAILED',
      driver,
      commandText: spec?.text ?? '',
      parameters: parameters.map((p) => p.name),
    },
    cause,
    'pipeline',
  )
}
