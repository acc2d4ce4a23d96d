import type { Driver } from '@dbjob/core'
import {
  CommandExecutionError,
  createDbConnector,
  MappingError,
  ParameterCollection,
  record,
  TransientConnectionError,
} from '@dbjob/core'
import { afterEach, describe, expect, it, vi } from 'vitest'
import type { PostgresDriverConfig } from '../src/index.js'

// ── Mock pg ────────────────────────────────────────────────────

const mockPoolConfig = vi.fn()
const mockConnect = vi.fn()
const mockPoolQuery = vi.fn()
const mockEnd = vi.fn()
const mockClientQuery = vi.fn()
const mockRelease = vi.fn()

vi.mock('pg', () => ({
  Pool: class {
    connect = mockConnect
    query = mockPoolQuery
    end = mockEnd
    constructor(config: unknown) {
      mockPoolConfig(config)
    }
  },
  types: { setTypeParser: vi.fn() },
}))

// ── Mock helpers ───────────────────────────────────────────────

interface Field {
  name: string
  dataTypeID: number
}

function result(command: string, fields: Field[] = [], rows: unknown[][] = [], rowCount: number | null = rows.length) {
  return { command, fields, rows, rowCount }
}

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code })
}

/** Serves BEGIN/COMMIT/ROLLBACK itself and every other statement from `responses`, in order. */
function serve(...responses: unknown[]): void {
  mockConnect.mockResolvedValue({ query: mockClientQuery, release: mockRelease })
  mockClientQuery.mockImplementation(async (query: { text: string }) => {
    if (/^(BEGIN|COMMIT|ROLLBACK)/.test(query.text)) return result(query.text.split(' ')[0] ?? '')
    const next = responses.shift()
    if (next instanceof Error) throw next
    return next
  })
}

function statements(): string[] {
  return mockClientQuery.mock.calls.map((call: unknown[]) => {
    const query = call[0]
    return typeof query === 'object' && query !== null && 'text' in query ? String(query.text) : ''
  })
}

async function driver(config: PostgresDriverConfig = {}): Promise<Driver> {
  const { createPostgresDriver } = await import('../src/index.js')
  return createPostgresDriver(config)
}

const Id = record({ id: 'integer' })
const int4 = (name: string): Field => ({ name, dataTypeID: 23 })
const int8 = (name: string): Field => ({ name, dataTypeID: 20 })

// ── Tests ──────────────────────────────────────────────────────

describe('driver-postgres', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('passes pool settings through', async () => {
    await driver({ host: 'db.local', max: 4, timeoutMs: 5000, connectionTimeoutMs: 800 })
    expect(mockPoolConfig).toHaveBeenCalledWith(
      expect.objectContaining({ host: 'db.local', max: 4, statement_timeout: 5000, connectionTimeoutMillis: 800 }),
    )
  })

  it('rewrites named placeholders to numbered ones, reusing repeats', async () => {
    serve(result('SELECT', [int4('id')], [[1], [2]]))
    const db = createDbConnector({ driver: await driver() })

    const ids = await db
      .readToList(
        {
          text: 'SELECT id FROM users WHERE org = @org AND (owner = @user OR creator = @user)',
          parameters: { org: 7, user: 'u1' },
        },
        Id,
      )
      .execute()

    expect(ids).toEqual([{ id: 1 }, { id: 2 }])
    expect(mockClientQuery).toHaveBeenCalledWith(
      expect.objectContaining({
        text: 'SELECT id FROM users WHERE org = $1 AND (owner = $2 OR creator = $2)',
        values: [7, 'u1'],
        rowMode: 'array',
      }),
    )
    expect(mockRelease).toHaveBeenCalledWith(false)
  })

  it('wraps nonQuery in a READ COMMITTED transaction and sums rows affected', async () => {
    serve([result('UPDATE', [], [], 2), result('DELETE', [], [], 3)])
    const db = createDbConnector({ driver: await driver() })

    const affected = await db.nonQuery('UPDATE a SET x = 1; DELETE FROM b').execute()

    expect(affected).toBe(5)
    expect(statements()).toEqual([
      'BEGIN ISOLATION LEVEL READ COMMITTED',
      'UPDATE a SET x = 1; DELETE FROM b',
      'COMMIT',
    ])
  })

  it('maps snapshot isolation to REPEATABLE READ', async () => {
    serve(result('SELECT', [int4('id')], [[1]]))
    const db = createDbConnector({ driver: await driver() })

    await db.readToList('SELECT id FROM users', Id).withIsolationLevel('snapshot').execute()

    expect(statements()[0]).toBe('BEGIN ISOLATION LEVEL REPEATABLE READ')
  })

  it('returns one segment per row-returning statement', async () => {
    serve([result('SELECT', [int4('a')], [[1]]), result('SELECT', [int4('b')], [[2], [3]])])
    const db = createDbConnector({ driver: await driver() })

    const [first, second] = await db
      .readMany('SELECT 1 AS a; SELECT b FROM t', [record({ a: 'integer' }), record({ b: 'integer' })])
      .execute()

    expect(first).toEqual([{ a: 1 }])
    expect(second).toEqual([{ b: 2 }, { b: 3 }])
  })

  it('reports column type names from type OIDs', async () => {
    serve(result('SELECT', [int4('id'), { name: 'tags', dataTypeID: 3802 }, { name: 'x', dataTypeID: 99999 }], [[1, '[]', null]]))
    const db = createDbConnector({ driver: await driver() })

    const table = await db.readToTable('SELECT id, tags, x FROM t').execute()

    expect(table.columns.map((c) => c.type)).toEqual(['int4', 'jsonb', 'oid:99999'])
  })

  it('parses int8 as bigint so large ids keep every digit', async () => {
    const { parseInt8 } = await import('../src/index.js')
    const big = parseInt8('9007199254740993')
    expect(big).toBe(9007199254740993n)

    serve(result('SELECT', [int8('id')], [[big]]), result('SELECT', [int8('id')], [[big]]))
    const db = createDbConnector({ driver: await driver() })

    const exact = await db.readToList('SELECT id FROM events', record({ id: 'bigint' })).execute()
    expect(exact).toEqual([{ id: 9007199254740993n }])

    const outcome = await db.readToList('SELECT id FROM events', Id).executeHandled()
    expect(outcome.error).toBeInstanceOf(MappingError)
    expect((outcome.error as MappingError).code).toBe('COLUMN_TYPE_MISMATCH')
  })

  it('calls stored procedures with named arguments and reads outputs back', async () => {
    serve(result('CALL', [int4('invoice_no')], [[55]], null))
    const db = createDbConnector({ driver: await driver() })
    const params = new ParameterCollection().add('customer', 7).addOutput('invoice_no', 'integer')

    const affected = await db.nonQuery({ text: 'create_invoice', type: 'storedProcedure', parameters: params }).execute()

    expect(affected).toBe(-1)
    expect(mockClientQuery).toHaveBeenCalledWith(
      expect.objectContaining({ text: 'CALL create_invoice(customer => $1, invoice_no => $2)', values: [7, null] }),
    )
    expect(params.value('invoice_no')).toBe(55)
  })

  it('selects a whole table for tableDirect commands', async () => {
    serve(result('SELECT', [int4('id')], []))
    const db = createDbConnector({ driver: await driver() })

    await db.readToTable({ text: 'audit_log', type: 'tableDirect' }).execute()

    expect(mockClientQuery).toHaveBeenCalledWith(expect.objectContaining({ text: 'SELECT * FROM audit_log', values: [] }))
  })

  it('statement errors throw CommandExecutionError and are not retried', async () => {
    serve(pgError('relation "missing" does not exist', '42P01'))
    const db = createDbConnector({ driver: await driver() })

    const outcome = await db.readToList('SELECT id FROM missing', Id).withRetry(3).executeHandled()

    expect(outcome.status).toBe('failed')
    expect(outcome.error).toBeInstanceOf(CommandExecutionError)
    const e = outcome.error as CommandExecutionError
    expect(e.code).toBe('COMMAND_FAILED')
    expect(e.details).toMatchObject({ driver: 'postgres', commandText: 'SELECT id FROM missing', sqlState: '42P01' })
    expect(mockConnect).toHaveBeenCalledTimes(1)
    expect(mockRelease).toHaveBeenCalledWith(false)
  })

  it('server shutdown discards the client and the job retries on a new one', async () => {
    serve(pgError('terminating connection due to administrator command', '57P01'), result('SELECT', [int4('id')], [[9]]))
    const db = createDbConnector({ driver: await driver() })

    const outcome = await db.readToList('SELECT id FROM users', Id).withRetry(2).executeHandled()

    expect(outcome).toMatchObject({ status: 'succeeded', value: [{ id: 9 }], attempts: 2 })
    expect(mockRelease.mock.calls).toEqual([[true], [false]])
  })

  it('statement timeouts throw COMMAND_TIMEOUT with the effective limit', async () => {
    serve(pgError('canceling statement due to statement timeout', '57014'))
    const db = createDbConnector({ driver: await driver() })

    const outcome = await db.readToList('SELECT pg_sleep(1)', Id).withTimeout(250).executeHandled()

    expect(mockClientQuery).toHaveBeenCalledWith(expect.objectContaining({ query_timeout: 250 }))
    const e = outcome.error as CommandExecutionError
    expect(e.code).toBe('COMMAND_TIMEOUT')
    expect(e.details).toMatchObject({ timeoutMs: 250 })
  })

  it('connect failures throw TransientConnectionError', async () => {
    mockConnect.mockRejectedValueOnce(pgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED'))
    mockConnect.mockRejectedValueOnce(new Error('timeout exceeded when trying to connect'))
    const pg = await driver()

    try {
      await pg.openConnection()
      expect.fail('Expected TransientConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(TransientConnectionError)
      expect((err as TransientConnectionError).code).toBe('CONNECTION_FAILED')
    }
    await expect(pg.openConnection()).rejects.toMatchObject({ code: 'POOL_EXHAUSTED' })
  })

  it('ping failure throws TransientConnectionError', async () => {
    mockPoolQuery.mockRejectedValue(new Error('ECONNREFUSED'))
    const pg = await driver()

    try {
      await pg.ping()
      expect.fail('Expected TransientConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(TransientConnectionError)
      const e = err as TransientConnectionError
      expect(e.code).toBe('CONNECTION_FAILED')
      expect(e.message).toBe('PostgreSQL ping failed')
    }
  })

  it('ping success does not throw', async () => {
    mockPoolQuery.mockResolvedValue(result('SELECT', [int4('?column?')], [[1]]))
    await expect((await driver()).ping()).resolves.toBeUndefined()
  })

  it('close ends the pool', async () => {
    mockEnd.mockResolvedValue(undefined)
    await (await driver()).close()
    expect(mockEnd).toHaveBeenCalledTimes(1)
  })
})
