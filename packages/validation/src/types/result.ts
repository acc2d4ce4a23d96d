import type { CanceledError, DbJobError } from '../errors.js'
import type { ColumnInfo, DbValue } from './values.js'

export interface DebugLogEntry {
  timestamp: number
  phase: 'connection' | 'transaction' | 'command' | 'execution' | 'materialization' | 'completion' | 'retry'
  message: string
  details?: unknown
}

/** Columns × rows of one result segment. Duplicate column names are kept. */
export interface DataTable {
  readonly columns: readonly ColumnInfo[]
  readonly rows: readonly (readonly unknown[])[]
}

export interface DataSet {
  readonly tables: readonly DataTable[]
}

export type GenericRecord = ReadonlyMap<string, DbValue>

export type KeyValuePairs = readonly (readonly [string, DbValue])[]

export type JobStatus = 'succeeded' | 'failed' | 'canceled'

export type JobOutcome<T> =
  | {
      readonly status: 'succeeded'
      readonly value: T
      /** Set when an error fallback replaced a failure. */
      readonly error?: DbJobError | undefined
      readonly attempts: number
      readonly debugLog?: readonly DebugLogEntry[] | undefined
    }
  | {
      readonly status: 'failed'
      readonly error: DbJobError
      readonly attempts: number
      readonly debugLog?: readonly DebugLogEntry[] | undefined
    }
  | {
      readonly status: 'canceled'
      /** What was materialized before the stop, if anything. */
      readonly value: T | undefined
      readonly error: CanceledError
      readonly attempts: number
      readonly debugLog?: readonly DebugLogEntry[] | undefined
    }

export interface HealthCheckResult {
  healthy: boolean
  driver: string
  latencyMs: number
  error?: string | undefined
}
