import type {
  ColumnInfo,
  CommandBehavior,
  CommandType,
  IsolationLevel,
  ParameterDescriptor,
} from '@dbjob/validation'

// --- Driver (implemented by driver packages) ---

export interface DriverCapabilities {
  readonly transactions: boolean
  /** Whether one command may produce more than one result segment. */
  readonly multipleSegments: boolean
  /**
   * `native`: array values are bound as one parameter.
   * `expand`: the command builder rewrites `@ids` into `@ids_0, @ids_1, ...`.
   */
  readonly arrayParameters: 'native' | 'expand'
  /** Prefix of named placeholders in command text, e.g. `@`. */
  readonly parameterMarker: string
  readonly defaultTimeoutMs?: number | undefined
}

/**
 * Database driver.
 *
 * Error contract:
 * - connection-level faults (refused, reset, pool exhausted) throw `TransientConnectionError`
 * - statement failures throw `CommandExecutionError`
 * - `ping()` throws `TransientConnectionError` (code: `'CONNECTION_FAILED'`)
 */
export interface Driver {
  readonly name: string
  readonly capabilities: DriverCapabilities
  openConnection(signal?: AbortSignal): Promise<DriverConnection>
  ping(): Promise<void>
  close(): Promise<void>
}

export interface DriverConnection {
  beginTransaction(level: IsolationLevel): Promise<DriverTransaction>
  prepareCommand(request: PrepareCommandRequest): DriverCommand
  dispose(): Promise<void>
}

export interface DriverTransaction {
  readonly isolationLevel: IsolationLevel
  commit(): Promise<void>
  rollback(): Promise<void>
  dispose(): Promise<void>
}

export interface PrepareCommandRequest {
  readonly text: string
  readonly type: CommandType
  readonly timeoutMs: number | undefined
  readonly behavior: CommandBehavior
  /** `false` for commands run only for their side effects. */
  readonly expectsRows: boolean
  readonly transaction: DriverTransaction | undefined
}

export interface DriverCommand {
  readonly text: string
  bindParameter(descriptor: ParameterDescriptor): void
  execute(signal?: AbortSignal): Promise<RowCursor>
  /** Output, input/output and return-value parameters after execution, by name. */
  outputValues(): ReadonlyMap<string, unknown>
  dispose(): Promise<void>
}

/**
 * Forward-only reader over the result segments of one execution.
 *
 * Positioned before the first row of segment 0. `advanceRow()` returns `false`
 * at the end of the current segment; `advanceSegment()` skips any rows left in
 * it and returns `false` when no segment follows.
 */
export interface RowCursor {
  columnSchema(): readonly ColumnInfo[]
  advanceRow(): Promise<boolean>
  advanceSegment(): Promise<boolean>
  readColumn(index: number): unknown
  /** Rows changed by the command, or -1 when it changed none. */
  readonly recordsAffected: number
  dispose(): Promise<void>
}
