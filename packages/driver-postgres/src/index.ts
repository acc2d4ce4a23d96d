import type {
  Driver,
  DriverCommand,
  DriverConnection,
  DriverTransaction,
  IsolationLevel,
  ParameterDescriptor,
  PrepareCommandRequest,
  RowCursor,
} from '@dbjob/core'
import { bufferedCursor, createModuleLogger, rewriteNamedParameters, TransientConnectionError } from '@dbjob/core'
import type { PoolClient, PoolConfig, QueryArrayConfig, QueryArrayResult } from 'pg'
import { Pool, types } from 'pg'

import type { CommandContext } from './errors.js'
import { breaksConnection, classifyCommandError, classifyConnectError, DRIVER_NAME } from './errors.js'

/** INT8 values past 2^53 keep every digit; `integer` fields narrow them with a range check. */
export function parseInt8(value: string): bigint {
  return BigInt(value)
}

// Parse NUMERIC/DECIMAL as JavaScript numbers and INT8 as bigint instead of strings
types.setTypeParser(1700, parseFloat) // numeric / decimal
types.setTypeParser(20, parseInt8) // int8 / bigint

export interface PostgresDriverConfig {
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly ssl?: PoolConfig['ssl']
  readonly max?: number | undefined
  /** Server-side `statement_timeout` for every pooled connection. */
  readonly timeoutMs?: number | undefined
  /** How long `openConnection` waits for a pooled client. */
  readonly connectionTimeoutMs?: number | undefined
}

const ISOLATION_SQL: Record<IsolationLevel, string> = {
  readUncommitted: 'READ UNCOMMITTED',
  readCommitted: 'READ COMMITTED',
  repeatableRead: 'REPEATABLE READ',
  serializable: 'SERIALIZABLE',
  snapshot: 'REPEATABLE READ',
}

const TYPE_NAMES = new Map<number, string>([
  [16, 'bool'],
  [17, 'bytea'],
  [20, 'int8'],
  [21, 'int2'],
  [23, 'int4'],
  [25, 'text'],
  [114, 'json'],
  [700, 'float4'],
  [701, 'float8'],
  [1043, 'varchar'],
  [1082, 'date'],
  [1114, 'timestamp'],
  [1184, 'timestamptz'],
  [1700, 'numeric'],
  [2950, 'uuid'],
  [3802, 'jsonb'],
])

const COUNTED_COMMANDS = new Set(['INSERT', 'UPDATE', 'DELETE', 'MERGE', 'COPY'])

type ArrayResult = QueryArrayResult<unknown[]>

/** `query_timeout` is read per query by `pg` but missing from its config type. */
type TimedQueryConfig = QueryArrayConfig<unknown[]> & { readonly query_timeout?: number | undefined }

interface CompiledCommand {
  readonly text: string
  readonly values: unknown[]
}

const log = createModuleLogger('driver-postgres')

// ── Command text ───────────────────────────────────────────────

function toPgValue(descriptor: ParameterDescriptor): unknown {
  if (descriptor.direction === 'output') return null
  const value = descriptor.value
  if (value === undefined) return null
  if (descriptor.typeHint === 'json' && typeof value !== 'string') return JSON.stringify(value)
  return value
}

export function compileCommand(
  request: Pick<PrepareCommandRequest, 'text' | 'type'>,
  parameters: readonly ParameterDescriptor[],
): CompiledCommand {
  const bindable = parameters.filter((p) => p.direction !== 'returnValue')

  switch (request.type) {
    case 'tableDirect':
      return { text: `SELECT * FROM ${request.text}`, values: [] }

    case 'storedProcedure': {
      const args = bindable.map((p, i) => `${p.name} => $${i + 1}`)
      return { text: `CALL ${request.text}(${args.join(', ')})`, values: bindable.map(toPgValue) }
    }

    case 'text': {
      const byName = new Map(bindable.map((p) => [p.name.toLowerCase(), p]))
      const positions = new Map<string, number>()
      const values: unknown[] = []
      const text = rewriteNamedParameters(request.text, '@', (name) => {
        const key = name.toLowerCase()
        const descriptor = byName.get(key)
        if (descriptor === undefined) return undefined
        let position = positions.get(key)
        if (position === undefined) {
          values.push(toPgValue(descriptor))
          position = values.length
          positions.set(key, position)
        }
        return `$${position}`
      })
      return { text, values }
    }
  }
}

// ── Results ────────────────────────────────────────────────────

function recordsAffected(results: readonly ArrayResult[]): number {
  let total = -1
  for (const result of results) {
    if (!COUNTED_COMMANDS.has(result.command) || result.rowCount === null) continue
    total = (total < 0 ? 0 : total) + result.rowCount
  }
  return total
}

function toCursor(results: readonly ArrayResult[], request: PrepareCommandRequest): RowCursor {
  const segments = results
    .filter((r) => r.fields.length > 0)
    .map((r) => ({
      columns: r.fields.map((f, ordinal) => ({
        name: f.name,
        type: TYPE_NAMES.get(f.dataTypeID) ?? `oid:${f.dataTypeID}`,
        ordinal,
      })),
      rows: r.rows,
    }))
  return bufferedCursor(segments, { recordsAffected: recordsAffected(results), behavior: request.behavior })
}

// ── Factory ────────────────────────────────────────────────────

export function createPostgresDriver(config: PostgresDriverConfig): Driver {
  const pool = new Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.max,
    statement_timeout: config.timeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  })

  function connect(client: PoolClient): DriverConnection {
    let broken = false
    let released = false

    const run = async (query: string | TimedQueryConfig, context: CommandContext): Promise<ArrayResult[]> => {
      try {
        const raw: ArrayResult | ArrayResult[] = await client.query<unknown[]>(
          typeof query === 'string' ? { text: query, rowMode: 'array' } : query,
        )
        return Array.isArray(raw) ? raw : [raw]
      } catch (err) {
        if (breaksConnection(err)) broken = true
        throw classifyCommandError(err, context, config.timeoutMs)
      }
    }

    const statement = (text: string): CommandContext => ({ text, parameters: [], timeoutMs: undefined })

    const prepare = (request: PrepareCommandRequest): DriverCommand => {
      const parameters: ParameterDescriptor[] = []
      let outputs = new Map<string, unknown>()

      return {
        text: request.text,
        bindParameter(descriptor) {
          parameters.push(descriptor)
        },
        async execute(signal): Promise<RowCursor> {
          signal?.throwIfAborted()
          const compiled = compileCommand(request, parameters)
          const query: TimedQueryConfig = {
            text: compiled.text,
            values: compiled.values,
            rowMode: 'array',
            query_timeout: request.timeoutMs,
          }
          const results = await run(query, {
            text: compiled.text,
            parameters: parameters.map((p) => p.name),
            timeoutMs: request.timeoutMs,
          })

          const first = results[0]
          if (request.type === 'storedProcedure' && first !== undefined) {
            const row = first.rows[0] ?? []
            outputs = new Map(first.fields.map((f, i) => [f.name, row[i] ?? null]))
          }
          return toCursor(results, request)
        },
        outputValues: () => outputs,
        dispose: async () => {},
      }
    }

    return {
      async beginTransaction(level): Promise<DriverTransaction> {
        await run(`BEGIN ISOLATION LEVEL ${ISOLATION_SQL[level]}`, statement('BEGIN'))
        let done = false
        const finish = async (sql: 'COMMIT' | 'ROLLBACK'): Promise<void> => {
          if (done) return
          done = true
          await run(sql, statement(sql))
        }
        return {
          isolationLevel: level,
          commit: () => finish('COMMIT'),
          rollback: () => finish('ROLLBACK'),
          dispose: () => (broken ? Promise.resolve() : finish('ROLLBACK')),
        }
      },
      prepareCommand: prepare,
      async dispose() {
        if (released) return
        released = true
        if (broken) log.debug('discarding broken connection')
        client.release(broken)
      },
    }
  }

  return {
    name: DRIVER_NAME,
    capabilities: {
      transactions: true,
      multipleSegments: true,
      arrayParameters: 'native',
      parameterMarker: '@',
      defaultTimeoutMs: config.timeoutMs,
    },

    async openConnection(signal): Promise<DriverConnection> {
      signal?.throwIfAborted()
      let client: PoolClient
      try {
        client = await pool.connect()
      } catch (err) {
        throw classifyConnectError(err)
      }
      return connect(client)
    },

    async ping(): Promise<void> {
      try {
        await pool.query('SELECT 1')
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new TransientConnectionError('CONNECTION_FAILED', 'PostgreSQL ping failed', { driver: DRIVER_NAME }, cause)
      }
    },

    async close(): Promise<void> {
      await pool.end()
    },
  }
}

export type { CommandContext } from './errors.js'
export { breaksConnection, classifyCommandError, classifyConnectError, isConnectionFault } from './errors.js'
