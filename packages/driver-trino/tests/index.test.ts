import {
  CommandExecutionError,
  ConfigError,
  createDbConnector,
  ParameterCollection,
  record,
  TransientConnectionError,
} from '@dbjob/core'
import type { QueryResult } from 'trino-client'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createTrinoDriver, escapeTrinoValue } from '../src/index.js'

// ── Mock trino-client ──────────────────────────────────────────

const mockCreate = vi.fn()
const mockQuery = vi.fn()
const mockCancel = vi.fn()

vi.mock('trino-client', () => ({
  Trino: {
    create: (options: unknown) => {
      mockCreate(options)
      return { query: mockQuery, cancel: mockCancel }
    },
  },
}))

// ── Mock helpers ───────────────────────────────────────────────

/** Page iterator over a fixed list of QueryResult pages. */
function pages(results: QueryResult[]): AsyncIterator<QueryResult> {
  return (async function* () {
    for (const r of results) yield r
  })()
}

function trinoOk(data: unknown[][], columns?: string[]): QueryResult {
  return {
    id: 'q1',
    data,
    ...(columns !== undefined ? { columns: columns.map((name) => ({ name, type: 'varchar' })) } : {}),
  }
}

function trinoError(message: string, errorName = 'GENERIC_INTERNAL_ERROR'): QueryResult {
  return {
    id: 'q1',
    error: {
      message,
      errorCode: 1,
      errorName,
      errorType: 'INTERNAL_ERROR',
      failureInfo: { type: 'error', message, suppressed: [], stack: [] },
    },
  }
}

const Order = record({ id: 'integer', status: 'string' })

function connector() {
  return createDbConnector({ driver: createTrinoDriver({ server: 'http://trino:8080' }) })
}

// ── Tests ──────────────────────────────────────────────────────

describe('driver-trino', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('passes connection options through', () => {
    createTrinoDriver({ server: 'http://trino:8080', catalog: 'hive', user: 'analyst' })
    expect(mockCreate).toHaveBeenCalledWith({
      server: 'http://trino:8080',
      catalog: 'hive',
      extraHeaders: { 'X-Trino-User': 'analyst' },
    })
  })

  // ── Literals ──────────────────────────────────────────────

  describe('escapeTrinoValue', () => {
    it('renders typed literals', () => {
      expect(escapeTrinoValue(null)).toBe('NULL')
      expect(escapeTrinoValue(12n)).toBe('12')
      expect(escapeTrinoValue(new Date('2024-03-01T12:00:00Z'))).toBe("TIMESTAMP '2024-03-01 12:00:00.000'")
      expect(escapeTrinoValue(new Uint8Array([0xca, 0xfe]))).toBe("X'cafe'")
      expect(escapeTrinoValue({ a: "it's" }, 'json')).toBe(`JSON '{"a":"it''s"}'`)
    })

    it('rejects values without a literal form', () => {
      expect(() => escapeTrinoValue(Symbol('x'))).toThrow('Unsupported Trino parameter type: symbol')
      expect(() => escapeTrinoValue(Number.NaN)).toThrow('Unsupported Trino number: NaN')
    })
  })

  // ── Happy path ────────────────────────────────────────────

  describe('happy path', () => {
    it('reads rows across pages', async () => {
      mockQuery.mockResolvedValue(
        pages([{ id: 'q1' }, trinoOk([['1', 'active']], ['id', 'status']), trinoOk([['2', 'shipped']])]),
      )

      const rows = await connector().readToList('SELECT id, status FROM orders', Order).execute()

      expect(rows).toEqual([
        { id: 1, status: 'active' },
        { id: 2, status: 'shipped' },
      ])
    })

    it('inlines parameters as literals', async () => {
      mockQuery.mockResolvedValue(pages([trinoOk([], ['id', 'status'])]))

      await connector()
        .readToList(
          {
            text: 'SELECT id, status FROM orders WHERE id = @id AND active = @active AND name = @name AND placed >= @since AND contains(@tags, tag)',
            parameters: { id: 42, active: true, name: "O'Brien", since: new Date('2024-03-01T12:00:00Z'), tags: ['a', 'b'] },
          },
          Order,
        )
        .execute()

      expect(mockQuery).toHaveBeenCalledWith(
        "SELECT id, status FROM orders WHERE id = 42 AND active = TRUE AND name = 'O''Brien' AND placed >= TIMESTAMP '2024-03-01 12:00:00.000' AND contains(ARRAY['a', 'b'], tag)",
      )
    })

    it('calls procedures with literal arguments', async () => {
      mockQuery.mockResolvedValue(pages([{ id: 'q1' }]))
      const params = new ParameterCollection().add('schema_name', 'web').add('table_name', 'page_views').add('mode', 'FULL')

      const affected = await connector()
        .nonQuery({ text: 'system.sync_partition_metadata', type: 'storedProcedure', parameters: params })
        .execute()

      expect(affected).toBe(-1)
      expect(mockQuery).toHaveBeenCalledWith("CALL system.sync_partition_metadata('web', 'page_views', 'FULL')")
    })

    it('selects a whole table for tableDirect commands', async () => {
      mockQuery.mockResolvedValue(pages([trinoOk([], ['id'])]))

      const table = await connector().readToTable({ text: 'hive.web.page_views', type: 'tableDirect' }).execute()

      expect(mockQuery).toHaveBeenCalledWith('SELECT * FROM hive.web.page_views')
      expect(table.columns).toEqual([{ name: 'id', type: 'varchar', ordinal: 0 }])
    })

    it('nonQuery polls the query to completion', async () => {
      let completed = false
      mockQuery.mockResolvedValue(
        (async function* () {
          yield trinoOk([], ['rows'])
          yield trinoOk([[3]])
          completed = true
        })(),
      )

      await connector().nonQuery('INSERT INTO orders_archive SELECT * FROM orders').execute()

      expect(completed).toBe(true)
      expect(mockCancel).not.toHaveBeenCalled()
    })
  })

  // ── Errors ────────────────────────────────────────────────

  describe('errors', () => {
    it('unsupported parameter values fail with COMMAND_FAILED', async () => {
      const params = new ParameterCollection().add('marker', Symbol('x'))

      const outcome = await connector().readToList({ text: 'SELECT @marker', parameters: params }, Order).executeHandled()

      expect(outcome.error).toBeInstanceOf(CommandExecutionError)
      const e = outcome.error as CommandExecutionError
      expect(e.code).toBe('COMMAND_FAILED')
      expect((e.cause as Error).message).toBe('Unsupported Trino parameter type: symbol')
      expect(mockQuery).not.toHaveBeenCalled()
    })

    it('initial error page throws COMMAND_FAILED with the error name', async () => {
      mockQuery.mockResolvedValue(pages([trinoError('Table not found', 'TABLE_NOT_FOUND')]))

      const outcome = await connector().readToList('SELECT * FROM bad_table', Order).executeHandled()

      const e = outcome.error as CommandExecutionError
      expect(e).toBeInstanceOf(CommandExecutionError)
      expect(e.code).toBe('COMMAND_FAILED')
      expect(e.details).toMatchObject({ driver: 'trino', commandText: 'SELECT * FROM bad_table', sqlState: 'TABLE_NOT_FOUND' })
    })

    it('error page while polling fails the read', async () => {
      mockQuery.mockResolvedValue(pages([trinoOk([], ['id', 'status']), trinoError('Query exceeded max time', 'EXCEEDED_TIME_LIMIT')]))

      const outcome = await connector().readToList('SELECT * FROM slow_table', Order).executeHandled()

      expect(outcome.status).toBe('failed')
      expect((outcome.error as CommandExecutionError).code).toBe('COMMAND_TIMEOUT')
    })

    it('cancels the query when the command timeout elapses', async () => {
      let release: () => void = () => {}
      const canceled = new Promise<void>((resolve) => {
        release = resolve
      })
      mockCancel.mockImplementation(async () => {
        release()
        return { id: 'q1' }
      })
      mockQuery.mockResolvedValue(
        (async function* () {
          yield trinoOk([], ['id', 'status'])
          await canceled
          yield trinoError('Query was canceled', 'USER_CANCELED')
        })(),
      )

      const outcome = await connector().readToList('SELECT * FROM huge', Order).withTimeout(20).executeHandled()

      expect(mockCancel).toHaveBeenCalledWith('q1')
      const e = outcome.error as CommandExecutionError
      expect(e.code).toBe('COMMAND_TIMEOUT')
      expect(e.details).toMatchObject({ timeoutMs: 20 })
    })

    it('network errors are transient and retried', async () => {
      mockQuery
        .mockRejectedValueOnce(new Error('connect ECONNREFUSED 10.0.0.5:8080'))
        .mockResolvedValueOnce(pages([trinoOk([['7', 'open']], ['id', 'status'])]))

      const outcome = await connector().readToList('SELECT id, status FROM orders', Order).withRetry(2).executeHandled()

      expect(outcome).toMatchObject({ status: 'succeeded', value: [{ id: 7, status: 'open' }], attempts: 2 })
    })

    it('isolation levels fail with TRANSACTIONS_UNSUPPORTED', async () => {
      const outcome = await connector().readToList('SELECT 1', Order).withIsolationLevel('readCommitted').executeHandled()

      expect((outcome.error as ConfigError).code).toBe('TRANSACTIONS_UNSUPPORTED')
    })
  })

  // ── Lazy reads ────────────────────────────────────────────

  it('disposing an unfinished lazy read cancels the query', async () => {
    mockCancel.mockResolvedValue({ id: 'q1' })
    mockQuery.mockResolvedValue(
      (async function* () {
        yield trinoOk([['1', 'active']], ['id', 'status'])
        yield trinoOk([['2', 'shipped']])
      })(),
    )

    const result = await connector().read('SELECT id, status FROM orders', Order).withBuffering('lazy').executeDisposable()
    await result.dispose()

    expect(mockCancel).toHaveBeenCalledWith('q1')
  })

  // ── ping() / close() ──────────────────────────────────────

  it('ping() wraps network error in TransientConnectionError', async () => {
    mockQuery.mockRejectedValue(new Error('connect ECONNREFUSED'))

    try {
      await createTrinoDriver({ server: 'http://trino:8080' }).ping()
      expect.fail('Expected TransientConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(TransientConnectionError)
      const e = err as TransientConnectionError
      expect(e.code).toBe('CONNECTION_FAILED')
      expect(e.message).toBe('Trino ping failed')
    }
  })

  it('ping() cancels the query when a later page fails to load', async () => {
    mockCancel.mockResolvedValue({ id: 'q1' })
    mockQuery.mockResolvedValue(
      (async function* () {
        yield trinoOk([], ['_col0'])
        throw new Error('socket hang up')
      })(),
    )

    await expect(createTrinoDriver({ server: 'http://trino:8080' }).ping()).rejects.toThrow('Trino ping failed')
    expect(mockCancel).toHaveBeenCalledWith('q1')
  })

  it('ping() polls SELECT 1 to completion', async () => {
    mockQuery.mockResolvedValue(pages([trinoOk([[1]], ['_col0'])]))
    await expect(createTrinoDriver({ server: 'http://trino:8080' }).ping()).resolves.toBeUndefined()
    expect(mockQuery).toHaveBeenCalledWith('SELECT 1')
  })

  it('close() resolves without error (stateless)', async () => {
    await expect(createTrinoDriver({ server: 'http://trino:8080' }).close()).resolves.toBeUndefined()
  })
})
