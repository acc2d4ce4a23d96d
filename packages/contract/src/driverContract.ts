import type { DbConnector, Driver } from '@dbjob/core'
import { CanceledError, CommandExecutionError, createDbConnector, dictionary, scalar } from '@dbjob/core'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'

// ── Types ──────────────────────────────────────────────────────

export interface DriverContractConfig {
  /** Returns at least one row whose first column is the integer `1` (e.g. `SELECT 1 AS n`). */
  readonly validQuery: string
  /** A command the database rejects (e.g. `SELECT * FROM __nonexistent_table_xyz__`). */
  readonly invalidQuery: string
  /** Returns the `@value` parameter as its only column. */
  readonly echoQuery?: string | undefined
  /** Returns two result segments, each with at least one row. */
  readonly multiSegmentQuery?: string | undefined
  /** A row-changing command, run inside a transaction that is rolled back. */
  readonly writeCommand?: string | undefined
}

// ── describeDriverContract ─────────────────────────────────────

export function describeDriverContract(name: string, factory: () => Driver, config: DriverContractConfig): void {
  describe(`DriverContract: ${name}`, () => {
    let driver: Driver
    let db: DbConnector

    beforeAll(() => {
      driver = factory()
      db = createDbConnector({ driver })
    })

    afterAll(async () => {
      await db.close()
    })

    it('C001: ping() resolves for a healthy driver', async () => {
      await expect(driver.ping()).resolves.toBeUndefined()
    })

    it('C002: healthCheck() reports the driver healthy', async () => {
      const health = await db.healthCheck()
      expect(health.healthy).toBe(true)
      expect(health.driver).toBe(driver.name)
    })

    it('C003: a valid query materializes as a table with ordered columns', async () => {
      const table = await db.readToTable(config.validQuery).execute()
      expect(table.rows.length).toBeGreaterThanOrEqual(1)
      expect(table.columns.map((c) => c.ordinal)).toEqual(table.columns.map((_, i) => i))
      for (const row of table.rows) {
        expect(row).toHaveLength(table.columns.length)
      }
    })

    it('C004: the first column of a valid query reads as a scalar', async () => {
      expect(await db.scalar(config.validQuery, 'integer').execute()).toBe(1)
    })

    it('C005: an invalid command fails with COMMAND_FAILED and is not retried', async () => {
      const outcome = await db.readToTable(config.invalidQuery).withRetry(3).executeHandled()
      expect(outcome.status).toBe('failed')
      expect(outcome.error).toBeInstanceOf(CommandExecutionError)
      expect(outcome.error?.code).toBe('COMMAND_FAILED')
      expect(outcome.attempts).toBe(1)
    })

    it.skipIf(config.echoQuery === undefined)('C006: text parameters round-trip with quotes intact', async () => {
      const value = "it's a 'quoted' value"
      const echoed = await db.scalar({ text: config.echoQuery ?? '', parameters: { value } }, 'string').execute()
      expect(echoed).toBe(value)
    })

    it.skipIf(config.multiSegmentQuery === undefined)('C007: segments map to slots in order', async () => {
      const [first, second] = await db
        .readMany(config.multiSegmentQuery ?? '', [dictionary(), dictionary()])
        .execute()
      expect(first.length).toBeGreaterThanOrEqual(1)
      expect(second.length).toBeGreaterThanOrEqual(1)
    })

    it.skipIf(config.writeCommand === undefined)('C008: a failing scope rolls back and rethrows', async () => {
      if (!driver.capabilities.transactions) return
      await expect(
        db.scope(async (scope) => {
          await scope.nonQuery(config.writeCommand ?? '').execute()
          throw new Error('abort scope')
        }),
      ).rejects.toThrow('abort scope')
    })

    it('C009: a run canceled before it starts does no work', async () => {
      const controller = new AbortController()
      controller.abort()
      const outcome = await db.readToTable(config.validQuery).executeHandled({ signal: controller.signal })
      expect(outcome.status).toBe('canceled')
      expect(outcome.error).toBeInstanceOf(CanceledError)
    })

    it('C010: close() resolves without error', async () => {
      const temp = createDbConnector({ driver: factory() })
      await expect(temp.close()).resolves.toBeUndefined()
      const outcome = await temp.readToTable(config.validQuery).executeHandled()
      expect(outcome.error?.code).toBe('CONNECTOR_CLOSED')
    })
  })
}
