import { ClickHouseError } from '@clickhouse/client'
import type { Driver } from '@dbjob/core'
import {
  CommandExecutionError,
  ConfigError,
  createDbConnector,
  record,
  TransientConnectionError,
} from '@dbjob/core'
import { afterEach, describe, expect, it, vi } from 'vitest'

// ── Mock @clickhouse/client ────────────────────────────────────

const mockClientConfig = vi.fn()
const mockPing = vi.fn()
const mockQuery = vi.fn()
const mockCommand = vi.fn()
const mockClose = vi.fn()

vi.mock('@clickhouse/client', () => ({
  createClient: (config: unknown) => {
    mockClientConfig(config)
    return {
      query: mockQuery,
      command: mockCommand,
      ping: mockPing,
      close: mockClose,
    }
  },
  ClickHouseError: class extends Error {
    readonly code: string
    readonly type: string | undefined
    constructor({ message, code, type }: { message: string; code: string; type?: string }) {
      super(message)
      this.code = code
      this.type = type
    }
  },
}))

// ── Mock helpers ───────────────────────────────────────────────

function resultSet(meta: { name: string; type: string }[], data: unknown[][]) {
  return { json: async () => ({ meta, data, rows: data.length }) }
}

async function driver(): Promise<Driver> {
  const { createClickHouseDriver } = await import('../src/index.js')
  return createClickHouseDriver({ url: 'http://localhost:8123', timeoutMs: 10_000 })
}

const Event = record({ id: 'integer', name: 'string' })

// ── Tests ──────────────────────────────────────────────────────

describe('driver-clickhouse', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('sets the default max_execution_time in whole seconds', async () => {
    await driver()
    expect(mockClientConfig).toHaveBeenCalledWith(
      expect.objectContaining({ url: 'http://localhost:8123', clickhouse_settings: { max_execution_time: 10 } }),
    )
  })

  it('ping failure throws TransientConnectionError', async () => {
    mockPing.mockResolvedValue({ success: false, error: new Error('bad gateway') })
    const ch = await driver()

    try {
      await ch.ping()
      expect.fail('Expected TransientConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(TransientConnectionError)
      const e = err as TransientConnectionError
      expect(e.code).toBe('CONNECTION_FAILED')
      expect(e.message).toBe('ClickHouse ping failed')
    }
  })

  it('ping success does not throw', async () => {
    mockPing.mockResolvedValue({ success: true })
    await expect((await driver()).ping()).resolves.toBeUndefined()
  })

  it('ping network error throws TransientConnectionError', async () => {
    mockPing.mockRejectedValue(new Error('ECONNREFUSED'))
    await expect((await driver()).ping()).rejects.toBeInstanceOf(TransientConnectionError)
  })

  it('rewrites named placeholders into typed query parameters', async () => {
    mockQuery.mockResolvedValue(resultSet([{ name: 'id', type: 'UInt64' }, { name: 'name', type: 'String' }], [['1', 'login']]))
    const db = createDbConnector({ driver: await driver() })
    const since = new Date('2024-01-01T00:00:00Z')

    const events = await db
      .readToList(
        {
          text: 'SELECT id, name FROM events WHERE org = @org AND kind IN @kinds AND ts >= @since',
          parameters: { org: 7, kinds: ['a', 'b'], since },
        },
        Event,
      )
      .execute()

    expect(events).toEqual([{ id: 1, name: 'login' }])
    expect(mockQuery).toHaveBeenCalledWith(
      expect.objectContaining({
        query: 'SELECT id, name FROM events WHERE org = {org:Int64} AND kind IN {kinds:Array(String)} AND ts >= {since:DateTime64(3)}',
        query_params: { org: 7, kinds: ['a', 'b'], since },
        format: 'JSONCompact',
      }),
    )
  })

  it('reports ClickHouse column types', async () => {
    mockQuery.mockResolvedValue(resultSet([{ name: 'id', type: 'UInt64' }, { name: 'tags', type: 'Array(String)' }], []))
    const db = createDbConnector({ driver: await driver() })

    const table = await db.readToTable('SELECT id, tags FROM events').execute()

    expect(table.columns).toEqual([
      { name: 'id', type: 'UInt64', ordinal: 0 },
      { name: 'tags', type: 'Array(String)', ordinal: 1 },
    ])
  })

  it('nonQuery runs a command and returns written rows', async () => {
    mockCommand.mockResolvedValue({ query_id: 'q1', summary: { written_rows: '3' } })
    const db = createDbConnector({ driver: await driver() })

    const written = await db
      .nonQuery({ text: 'INSERT INTO audit SELECT * FROM staging WHERE org = @org', parameters: { org: 2 } })
      .withTimeout(2500)
      .execute()

    expect(written).toBe(3)
    expect(mockQuery).not.toHaveBeenCalled()
    expect(mockCommand).toHaveBeenCalledWith(
      expect.objectContaining({
        query: 'INSERT INTO audit SELECT * FROM staging WHERE org = {org:Int64}',
        query_params: { org: 2 },
        clickhouse_settings: { max_execution_time: 3 },
      }),
    )
  })

  it('isolation levels fail with TRANSACTIONS_UNSUPPORTED', async () => {
    const db = createDbConnector({ driver: await driver() })

    const outcome = await db.readToList('SELECT 1 AS id', Event).withIsolationLevel('serializable').executeHandled()

    expect(outcome.status).toBe('failed')
    expect(outcome.error).toBeInstanceOf(ConfigError)
    expect((outcome.error as ConfigError).code).toBe('TRANSACTIONS_UNSUPPORTED')
    expect(mockQuery).not.toHaveBeenCalled()
  })

  it('stored procedures are rejected', async () => {
    const db = createDbConnector({ driver: await driver() })

    const outcome = await db.readToTable({ text: 'refresh_stats', type: 'storedProcedure' }).executeHandled()

    expect((outcome.error as CommandExecutionError).code).toBe('COMMAND_FAILED')
  })

  it('TIMEOUT_EXCEEDED throws COMMAND_TIMEOUT', async () => {
    mockQuery.mockRejectedValue(
      new ClickHouseError({ message: 'Timeout exceeded: elapsed 3 seconds', code: '159', type: 'TIMEOUT_EXCEEDED' }),
    )
    const db = createDbConnector({ driver: await driver() })

    const outcome = await db.readToList('SELECT sleep(3)', Event).withTimeout(2000).executeHandled()

    const e = outcome.error as CommandExecutionError
    expect(e).toBeInstanceOf(CommandExecutionError)
    expect(e.code).toBe('COMMAND_TIMEOUT')
    expect(e.details).toMatchObject({ timeoutMs: 2000 })
  })

  it('server errors throw COMMAND_FAILED with the server code', async () => {
    mockQuery.mockRejectedValue(
      new ClickHouseError({ message: 'Table default.__bad__ does not exist', code: '60', type: 'UNKNOWN_TABLE' }),
    )
    const db = createDbConnector({ driver: await driver() })

    const outcome = await db.readToList('SELECT * FROM __bad__', Event).withRetry(3).executeHandled()

    const e = outcome.error as CommandExecutionError
    expect(e.code).toBe('COMMAND_FAILED')
    expect(e.details).toMatchObject({ driver: 'clickhouse', commandText: 'SELECT * FROM __bad__', sqlState: '60' })
    expect(mockQuery).toHaveBeenCalledTimes(1)
  })

  it('network errors are transient and retried', async () => {
    mockQuery
      .mockRejectedValueOnce(Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8123'), { code: 'ECONNREFUSED' }))
      .mockResolvedValueOnce(resultSet([{ name: 'id', type: 'UInt64' }, { name: 'name', type: 'String' }], [['2', 'x']]))
    const db = createDbConnector({ driver: await driver() })

    const outcome = await db.readToList('SELECT id, name FROM events', Event).withRetry(2).executeHandled()

    expect(outcome).toMatchObject({ status: 'succeeded', value: [{ id: 2, name: 'x' }], attempts: 2 })
  })

  it('close closes the client', async () => {
    mockClose.mockResolvedValue(undefined)
    await (await driver()).close()
    expect(mockClose).toHaveBeenCalledTimes(1)
  })
})
