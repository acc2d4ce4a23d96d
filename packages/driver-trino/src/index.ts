import type {
  DbJobError,
  Driver,
  DriverCommand,
  DriverConnection,
  ParameterDescriptor,
  PrepareCommandRequest,
  RowCursor,
} from '@dbjob/core'
import {
  CanceledError,
  CommandExecutionError,
  ConfigError,
  createModuleLogger,
  logError,
  TransientConnectionError,
} from '@dbjob/core'
import type { ConnectionOptions, QueryResult } from 'trino-client'
import { Trino } from 'trino-client'

import { PagedCursor } from './cursor.js'
import { compileStatement } from './literals.js'

export interface TrinoDriverConfig {
  readonly server: string
  readonly catalog?: string | undefined
  readonly schema?: string | undefined
  readonly user?: string | undefined
  readonly source?: string | undefined
  /** Default per-command limit; the query is canceled when it elapses. */
  readonly timeoutMs?: number | undefined
}

const DRIVER_NAME = 'trino'
const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND'])

const log = createModuleLogger('driver-trino')

// ── Errors ─────────────────────────────────────────────────────

function isNetworkError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false
  if ('code' in err && typeof err.code === 'string' && NETWORK_CODES.has(err.code)) return true
  return err instanceof Error && [...NETWORK_CODES].some((code) => err.message.includes(code))
}

interface StatementContext {
  readonly sql: string
  readonly parameters: readonly string[]
  readonly timeoutMs: number | undefined
  readonly timedOut: () => boolean
}

function queryFailed(context: StatementContext, cause: Error, sqlState?: string): CommandExecutionError {
  return new CommandExecutionError(
    { code: 'COMMAND_FAILED', driver: DRIVER_NAME, commandText: context.sql, parameters: context.parameters, sqlState },
    cause,
  )
}

function queryTimedOut(context: StatementContext, cause: Error): CommandExecutionError {
  return new CommandExecutionError(
    { code: 'COMMAND_TIMEOUT', driver: DRIVER_NAME, commandText: context.sql, timeoutMs: context.timeoutMs ?? 0 },
    cause,
  )
}

function classifyError(err: unknown, context: StatementContext): DbJobError {
  const cause = err instanceof Error ? err : new Error(String(err))
  if (context.timedOut()) return queryTimedOut(context, cause)
  if (isNetworkError(err)) {
    return new TransientConnectionError('CONNECTION_FAILED', `Trino request failed: ${cause.message}`, { driver: DRIVER_NAME }, cause)
  }
  return queryFailed(context, cause)
}

function classifyPageError(error: NonNullable<QueryResult['error']>, context: StatementContext): DbJobError {
  const cause = new Error(error.message)
  if (context.timedOut() || error.errorName === 'EXCEEDED_TIME_LIMIT') return queryTimedOut(context, cause)
  return queryFailed(context, cause, error.errorName)
}

// ── Factory ────────────────────────────────────────────────────

export function createTrinoDriver(config: TrinoDriverConfig): Driver {
  const options: ConnectionOptions = {
    server: config.server,
    ...(config.catalog !== undefined ? { catalog: config.catalog } : {}),
    ...(config.schema !== undefined ? { schema: config.schema } : {}),
    ...(config.source !== undefined ? { source: config.source } : {}),
    ...(config.user !== undefined ? { extraHeaders: { 'X-Trino-User': config.user } } : {}),
  }

  const trino = Trino.create(options)

  function cancel(queryId: string, reason: string): void {
    void trino.cancel(queryId).catch((err: unknown) => {
      logError(log, err, 'Trino cancel failed', { queryId, reason })
    })
  }

  async function open(
    sql: string,
    context: Omit<StatementContext, 'timedOut'>,
    behavior: PrepareCommandRequest['behavior'],
    signal?: AbortSignal,
  ): Promise<PagedCursor> {
    let queryId: string | undefined
    let timedOut = false
    let cursor: PagedCursor | undefined
    const live: StatementContext = { ...context, timedOut: () => timedOut }

    const stop = (reason: string): void => {
      if (queryId !== undefined && cursor?.finished !== true) cancel(queryId, reason)
    }
    const timer =
      context.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true
            stop('timeout')
          }, context.timeoutMs)
        : undefined
    const onAbort = (): void => stop('abort')
    signal?.addEventListener('abort', onAbort, { once: true })

    const fail = (err: unknown): Error => (signal?.aborted === true ? new CanceledError('driver', err) : classifyError(err, live))

    let pages: AsyncIterator<QueryResult>
    try {
      pages = await trino.query(sql)
    } catch (err) {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      throw fail(err)
    }

    const paged = new PagedCursor(pages, {
      behavior,
      onPage: (page) => {
        queryId = page.id
        if (page.error === undefined) return
        throw signal?.aborted === true ? new CanceledError('driver') : classifyPageError(page.error, live)
      },
      onError: fail,
      onDispose: async (finished) => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
        if (!finished && queryId !== undefined) cancel(queryId, 'dispose')
      },
    })
    cursor = paged

    try {
      await paged.open()
    } catch (err) {
      await paged.dispose()
      throw err
    }
    return paged
  }

  const prepare = (request: PrepareCommandRequest): DriverCommand => {
    const parameters: ParameterDescriptor[] = []

    return {
      text: request.text,
      bindParameter(descriptor) {
        parameters.push(descriptor)
      },
      async execute(signal): Promise<RowCursor> {
        signal?.throwIfAborted()
        const names = parameters.map((p) => p.name)
        let sql: string
        try {
          sql = compileStatement(request, parameters)
        } catch (err) {
          const cause = err instanceof Error ? err : new Error(String(err))
          throw queryFailed({ sql: request.text, parameters: names, timeoutMs: undefined, timedOut: () => false }, cause)
        }

        const cursor = await open(sql, { sql, parameters: names, timeoutMs: request.timeoutMs }, request.behavior, signal)
        if (!request.expectsRows) {
          try {
            await cursor.drain()
          } catch (err) {
            await cursor.dispose()
            throw err
          }
        }
        return cursor
      },
      outputValues: () => new Map(),
      dispose: async () => {},
    }
  }

  // HTTP is stateless: a connection only scopes the commands prepared on it
  const connection: DriverConnection = {
    async beginTransaction() {
      throw new ConfigError('TRANSACTIONS_UNSUPPORTED', 'Trino driver does not support transactions', 'driver')
    },
    prepareCommand: prepare,
    dispose: async () => {},
  }

  return {
    name: DRIVER_NAME,
    capabilities: {
      transactions: false,
      multipleSegments: false,
      arrayParameters: 'native',
      parameterMarker: '@',
      defaultTimeoutMs: config.timeoutMs,
    },

    async openConnection(signal): Promise<DriverConnection> {
      signal?.throwIfAborted()
      return connection
    },

    async ping(): Promise<void> {
      try {
        const cursor = await open('SELECT 1', { sql: 'SELECT 1', parameters: [], timeoutMs: config.timeoutMs }, {})
        try {
          await cursor.drain()
        } finally {
          await cursor.dispose()
        }
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new TransientConnectionError('CONNECTION_FAILED', 'Trino ping failed', { driver: DRIVER_NAME }, cause)
      }
    },

    async close(): Promise<void> {
      // HTTP only; no pooled connections to release
    },
  }
}

export { PagedCursor } from './cursor.js'
export type { PagedCursorOptions } from './cursor.js'
export { compileStatement, escapeTrinoValue } from './literals.js'
