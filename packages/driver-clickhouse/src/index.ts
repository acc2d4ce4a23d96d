import type { ClickHouseClient } from '@clickhouse/client'
import { ClickHouseError, createClient } from '@clickhouse/client'
import type {
  DbJobError,
  Driver,
  DriverCommand,
  DriverConnection,
  ParameterDescriptor,
  ParameterTypeHint,
  PrepareCommandRequest,
  RowCursor,
} from '@dbjob/core'
import {
  bufferedCursor,
  columnsOf,
  CommandExecutionError,
  ConfigError,
  createModuleLogger,
  inferTypeHint,
  rewriteNamedParameters,
  TransientConnectionError,
} from '@dbjob/core'

export interface ClickHouseDriverConfig {
  readonly url?: string | undefined
  readonly username?: string | undefined
  readonly password?: string | undefined
  readonly database?: string | undefined
  /** Default `max_execution_time`, rounded up to whole seconds. */
  readonly timeoutMs?: number | undefined
  readonly requestTimeoutMs?: number | undefined
}

const DRIVER_NAME = 'clickhouse'
const TIMEOUT_EXCEEDED = '159'
const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND'])

const log = createModuleLogger('driver-clickhouse')

// ── Parameters ─────────────────────────────────────────────────

const SCALAR_TYPES: Record<Exclude<ParameterTypeHint, 'array' | 'null'>, string> = {
  integer: 'Int64',
  bigint: 'Int64',
  float: 'Float64',
  text: 'String',
  boolean: 'Bool',
  binary: 'String',
  date: 'DateTime64(3)',
  json: 'String',
}

function typeFor(hint: ParameterTypeHint, value: unknown): string {
  switch (hint) {
    case 'null':
      return 'Nullable(String)'
    case 'array': {
      const items = Array.isArray(value) ? value : []
      const sample = items.find((item) => item !== null && item !== undefined)
      const inner = sample === undefined ? 'String' : typeFor(inferTypeHint(sample), sample)
      return `Array(${items.some((item) => item === null) ? `Nullable(${inner})` : inner})`
    }
    default:
      return SCALAR_TYPES[hint]
  }
}

function toParamValue(hint: ParameterTypeHint, value: unknown): unknown {
  if (value === undefined) return null
  if (typeof value === 'bigint') return value.toString()
  if (value instanceof Uint8Array) return Buffer.from(value).toString('latin1')
  if (hint === 'json' && typeof value !== 'string') return JSON.stringify(value)
  return value
}

export interface CompiledQuery {
  readonly query: string
  readonly params: Record<string, unknown>
}

/** Rewrites `@name` into ClickHouse's typed `{name:Type}` placeholders. */
export function compileQuery(
  request: Pick<PrepareCommandRequest, 'text' | 'type'>,
  parameters: readonly ParameterDescriptor[],
): CompiledQuery {
  if (request.type === 'tableDirect') return { query: `SELECT * FROM ${request.text}`, params: {} }

  const byName = new Map(parameters.map((p) => [p.name.toLowerCase(), p]))
  const params: Record<string, unknown> = {}
  const query = rewriteNamedParameters(request.text, '@', (name) => {
    const descriptor = byName.get(name.toLowerCase())
    if (descriptor === undefined) return undefined
    const hint = descriptor.typeHint ?? inferTypeHint(descriptor.value)
    params[descriptor.name] = toParamValue(hint, descriptor.value)
    return `{${descriptor.name}:${typeFor(hint, descriptor.value)}}`
  })
  return { query, params }
}

// ── Errors ─────────────────────────────────────────────────────

function isNetworkError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false
  if ('code' in err && typeof err.code === 'string' && NETWORK_CODES.has(err.code)) return true
  return err instanceof Error && err.message.includes('socket hang up')
}

function classifyError(err: unknown, query: string, params: readonly string[], timeoutMs: number | undefined): DbJobError {
  const cause = err instanceof Error ? err : new Error(String(err))
  if (isNetworkError(err)) {
    return new TransientConnectionError('CONNECTION_FAILED', `ClickHouse request failed: ${cause.message}`, { driver: DRIVER_NAME }, cause)
  }
  if (err instanceof ClickHouseError && err.code === TIMEOUT_EXCEEDED) {
    return new CommandExecutionError(
      { code: 'COMMAND_TIMEOUT', driver: DRIVER_NAME, commandText: query, timeoutMs: timeoutMs ?? 0 },
      cause,
    )
  }
  return new CommandExecutionError(
    {
      code: 'COMMAND_FAILED',
      driver: DRIVER_NAME,
      commandText: query,
      parameters: params,
      sqlState: err instanceof ClickHouseError ? err.code : undefined,
    },
    cause,
  )
}

// ── Factory ────────────────────────────────────────────────────

export function createClickHouseDriver(config: ClickHouseDriverConfig): Driver {
  const settings: Record<string, number | string | boolean> = {}
  if (config.timeoutMs !== undefined) {
    settings.max_execution_time = Math.ceil(config.timeoutMs / 1000)
  }

  const client: ClickHouseClient = createClient({
    url: config.url,
    username: config.username,
    password: config.password,
    database: config.database,
    request_timeout: config.requestTimeoutMs,
    clickhouse_settings: settings,
  })

  const prepare = (request: PrepareCommandRequest): DriverCommand => {
    const parameters: ParameterDescriptor[] = []

    return {
      text: request.text,
      bindParameter(descriptor) {
        parameters.push(descriptor)
      },
      async execute(signal): Promise<RowCursor> {
        signal?.throwIfAborted()
        if (request.type === 'storedProcedure') {
          throw new CommandExecutionError({
            code: 'COMMAND_FAILED',
            driver: DRIVER_NAME,
            commandText: request.text,
            parameters: parameters.map((p) => p.name),
          })
        }

        const { query, params } = compileQuery(request, parameters)
        const perQuery = request.timeoutMs !== undefined ? { max_execution_time: Math.ceil(request.timeoutMs / 1000) } : {}
        try {
          if (!request.expectsRows) {
            const result = await client.command({
              query,
              query_params: params,
              clickhouse_settings: perQuery,
              abort_signal: signal,
            })
            const written = result.summary?.written_rows
            return bufferedCursor([], { recordsAffected: written !== undefined ? Number(written) : -1 })
          }

          const result = await client.query({
            query,
            query_params: params,
            format: 'JSONCompact',
            clickhouse_settings: perQuery,
            abort_signal: signal,
          })
          const body = await result.json<unknown[]>()
          const meta = body.meta ?? []
          const columns = columnsOf(
            meta.map((m) => m.name),
            meta.map((m) => m.type),
          )
          return bufferedCursor([{ columns, rows: body.data }], { behavior: request.behavior })
        } catch (err) {
          // Aborted requests surface as-is so the pipeline reports cancellation
          if (signal?.aborted === true) throw err
          log.debug({ err, query }, 'clickhouse request failed')
          throw classifyError(err, query, Object.keys(params), request.timeoutMs ?? config.timeoutMs)
        }
      },
      outputValues: () => new Map(),
      dispose: async () => {},
    }
  }

  // HTTP is stateless: a connection only scopes the commands prepared on it
  const connection: DriverConnection = {
    async beginTransaction() {
      throw new ConfigError('TRANSACTIONS_UNSUPPORTED', 'ClickHouse does not support transactions', 'driver')
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
      let result: Awaited<ReturnType<ClickHouseClient['ping']>>
      try {
        result = await client.ping()
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new TransientConnectionError('CONNECTION_FAILED', 'ClickHouse ping failed', { driver: DRIVER_NAME }, cause)
      }
      if (!result.success) {
        throw new TransientConnectionError('CONNECTION_FAILED', 'ClickHouse ping failed', { driver: DRIVER_NAME }, result.error)
      }
    },

    async close(): Promise<void> {
      await client.close()
    },
  }
}
