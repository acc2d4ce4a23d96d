import type {
  CommandBehavior,
  CommandSource,
  DataSet,
  DataTable,
  GenericRecord,
  HealthCheckResult,
  IsolationLevel,
  JobConfiguration,
  JobSettings,
  KeyValuePairs,
} from '@dbjob/validation'
import { ConfigError } from '@dbjob/validation'

import type { Logger } from './debug/logger.js'
import { createModuleLogger, logError } from './debug/logger.js'
import { DbJob } from './job.js'
import type { FieldSpec, FieldValue, RowShape } from './mapping/shapes.js'
import { dictionary, keyValuePairs, scalar } from './mapping/shapes.js'
import type { ResultMaterializer, SlotResults, SlotTuple } from './materialize/materializer.js'
import type { RowSequence } from './materialize/rows.js'
import { BufferedRows } from './materialize/rows.js'
import type { JobBody, PipelineRuntime, SharedScope } from './pipeline.js'
import type { Driver, DriverTransaction } from './types/interfaces.js'

// ── Public Types ───────────────────────────────────────────────

export interface CreateDbConnectorOptions {
  driver: Driver
  logger?: Logger | undefined
  defaults?: JobSettings | undefined
}

/** Builds jobs, one method per result shape. Jobs run only when executed. */
export interface JobFactory {
  /** Rows of segment 0, buffered or lazy per the job's buffering mode. */
  read<T>(command: CommandSource, shape: RowShape<T>): DbJob<RowSequence<T>>
  readFirst<T>(command: CommandSource, shape: RowShape<T>): DbJob<T>
  readFirstOrDefault<T>(command: CommandSource, shape: RowShape<T>): DbJob<T | null>
  readSingle<T>(command: CommandSource, shape: RowShape<T>): DbJob<T>
  readSingleOrDefault<T>(command: CommandSource, shape: RowShape<T>): DbJob<T | null>
  readToList<T>(command: CommandSource, shape: RowShape<T>): DbJob<T[]>
  /** Segment k into slot k, one to eight slots. */
  readMany<S extends SlotTuple>(command: CommandSource, slots: S): DbJob<SlotResults<S>>
  readToTable(command: CommandSource): DbJob<DataTable>
  readToDataSet(command: CommandSource): DbJob<DataSet>
  readToDictionaries(command: CommandSource): DbJob<GenericRecord[]>
  readToKeyValuePairs(command: CommandSource): DbJob<KeyValuePairs[]>
  readToCollectionSet(command: CommandSource): DbJob<GenericRecord[][]>
  /** First column of the first row, `null` when there is no row. */
  scalar<S extends FieldSpec>(command: CommandSource, spec: S): DbJob<FieldValue<S> | null>
  /** Records affected. Runs in a `readCommitted` transaction unless told otherwise. */
  nonQuery(command: CommandSource): DbJob<number>
}

export interface ScopeOptions {
  /** Defaults to `readCommitted` when the driver supports transactions. */
  isolationLevel?: IsolationLevel | undefined
  signal?: AbortSignal | undefined
}

/** Jobs created from a scope share its connection and transaction. */
export type DbScope = JobFactory

export interface DbConnector extends JobFactory {
  /**
   * Runs `fn` on one connection (and transaction). Commits when `fn`
   * resolves, rolls back when it rejects.
   */
  scope<R>(fn: (scope: DbScope) => Promise<R>, options?: ScopeOptions): Promise<R>
  healthCheck(): Promise<HealthCheckResult>
  close(): Promise<void>
}

const SINGLE_SEGMENT: CommandBehavior = { singleResult: true }
const FIRST_ROW: CommandBehavior = { singleResult: true, singleRow: true }

// ── Factory ────────────────────────────────────────────────────

export function createDbConnector(options: CreateDbConnectorOptions): DbConnector {
  const { driver } = options
  const defaults = options.defaults ?? {}
  const log = createModuleLogger('connector', options.logger).child({ driver: driver.name })
  let closed = false

  const runtime: PipelineRuntime = {
    driver,
    logger: log,
    parameterNamesCaseSensitive: defaults.parameterNamesCaseSensitive === true,
    isClosed: () => closed,
  }

  const factory = createJobFactory(runtime, defaults, undefined)

  return {
    ...factory,

    async scope(fn, scopeOptions = {}) {
      if (closed) throw new ConfigError('CONNECTOR_CLOSED', 'Connector is closed', 'job')
      const level = scopeOptions.isolationLevel ?? (driver.capabilities.transactions ? 'readCommitted' : undefined)
      if (level !== undefined && !driver.capabilities.transactions) {
        throw new ConfigError('TRANSACTIONS_UNSUPPORTED', `Driver '${driver.name}' does not support transactions`, 'job')
      }

      const connection = await driver.openConnection(scopeOptions.signal)
      let transaction: DriverTransaction | undefined
      let scopeClosed = false
      try {
        if (level !== undefined) transaction = await connection.beginTransaction(level)
        const shared: SharedScope = {
          connection,
          transaction,
          get closed() {
            return scopeClosed
          },
        }

        let result: Awaited<ReturnType<typeof fn>>
        try {
          result = await fn(createJobFactory(runtime, defaults, shared))
        } catch (err) {
          if (transaction !== undefined) await rollbackLogged(transaction, log)
          throw err
        }
        if (transaction !== undefined) await transaction.commit()
        return result
      } finally {
        scopeClosed = true
        if (transaction !== undefined) await transaction.dispose()
        await connection.dispose()
      }
    },

    async healthCheck() {
      return measureHealth(driver)
    },

    async close() {
      if (closed) return
      closed = true
      await driver.close()
    },
  }
}

// ── Jobs ───────────────────────────────────────────────────────

function createJobFactory(
  runtime: PipelineRuntime,
  defaults: JobSettings,
  scope: SharedScope | undefined,
): JobFactory {
  const job = <T>(command: CommandSource, body: JobBody<T>, extra: Partial<JobConfiguration> = {}): DbJob<T> => {
    const config: JobConfiguration = {
      command,
      commandTimeoutMs: defaults.commandTimeoutMs,
      buffering: defaults.buffering ?? 'buffered',
      retry: defaults.retry ?? { attempts: 1 },
      commitOnCancel: false,
      debug: defaults.debug === true,
      ...extra,
    }
    return new DbJob(config, body, runtime, scope)
  }

  const rows = <T>(
    behavior: CommandBehavior | undefined,
    materialize: (results: ResultMaterializer) => Promise<T | undefined>,
  ): JobBody<T> => ({ expectsRows: true, behavior, materialize })

  return {
    read<T>(command: CommandSource, shape: RowShape<T>) {
      return job<RowSequence<T>>(command, {
        expectsRows: true,
        behavior: SINGLE_SEGMENT,
        materialize: async (results, buffering) =>
          buffering === 'buffered' ? new BufferedRows(await results.list(shape)) : results.lazy(shape),
      })
    },
    readFirst: (command, shape) => job(command, rows(FIRST_ROW, (r) => r.first(shape))),
    readFirstOrDefault: (command, shape) => job(command, rows(FIRST_ROW, (r) => r.firstOrDefault(shape))),
    readSingle: (command, shape) => job(command, rows(SINGLE_SEGMENT, (r) => r.single(shape))),
    readSingleOrDefault: (command, shape) => job(command, rows(SINGLE_SEGMENT, (r) => r.singleOrDefault(shape))),
    readToList: (command, shape) => job(command, rows(SINGLE_SEGMENT, (r) => r.list(shape))),
    readMany: (command, slots) => job(command, rows(undefined, (r) => r.multiple(slots)), { arity: slots.length }),
    readToTable: (command) => job(command, rows(SINGLE_SEGMENT, (r) => r.table())),
    readToDataSet: (command) => job(command, rows(undefined, (r) => r.dataSet())),
    readToDictionaries: (command) => job(command, rows(SINGLE_SEGMENT, (r) => r.list(dictionary()))),
    readToKeyValuePairs: (command) => job(command, rows(SINGLE_SEGMENT, (r) => r.list(keyValuePairs()))),
    readToCollectionSet: (command) => job(command, rows(undefined, (r) => r.collectionSet())),
    scalar: (command, spec) => job(command, rows(FIRST_ROW, (r) => r.firstOrDefault(scalar(spec)))),
    nonQuery: (command) =>
      job(
        command,
        { expectsRows: false, materialize: async (r) => r.recordsAffected() },
        scope === undefined && runtime.driver.capabilities.transactions ? { isolationLevel: 'readCommitted' } : {},
      ),
  }
}

// ── Helpers ────────────────────────────────────────────────────

async function rollbackLogged(transaction: DriverTransaction, log: Logger): Promise<void> {
  try {
    await transaction.rollback()
  } catch (err) {
    logError(log, err, 'Scope rollback failed')
  }
}

async function measureHealth(driver: Driver): Promise<HealthCheckResult> {
  const s = Date.now()
  try {
    await driver.ping()
    return { healthy: true, driver: driver.name, latencyMs: Date.now() - s }
  } catch (err) {
    return {
      healthy: false,
      driver: driver.name,
      latencyMs: Date.now() - s,
      error: err instanceof Error ? err.message : String(err),
    }
  }
}
