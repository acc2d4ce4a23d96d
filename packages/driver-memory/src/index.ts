import type {
  BufferedSegment,
  CommandType,
  Driver,
  DriverCommand,
  DriverConnection,
  DriverTransaction,
  IsolationLevel,
  ParameterDescriptor,
  PrepareCommandRequest,
  RowCursor,
} from '@dbjob/core'
import {
  bufferedCursor,
  CommandExecutionError,
  columnsOf,
  createModuleLogger,
  TransientConnectionError,
} from '@dbjob/core'

import { SlotPool } from './pool.js'

// ── Types ──────────────────────────────────────────────────────

export interface MemoryResultSet {
  readonly columns: readonly string[]
  /** Driver type names, by column position. */
  readonly types?: readonly string[] | undefined
  readonly rows: readonly (readonly unknown[])[]
}

export interface MemoryResult {
  readonly segments?: readonly MemoryResultSet[] | undefined
  readonly recordsAffected?: number | undefined
  /** Values reported for output and return-value parameters. */
  readonly outputs?: Readonly<Record<string, unknown>> | undefined
}

/** What a handler sees of an executed command. */
export interface MemoryCommand {
  readonly text: string
  readonly type: CommandType
  readonly parameters: readonly ParameterDescriptor[]
  readonly isolationLevel: IsolationLevel | undefined
  readonly timeoutMs: number | undefined
  readonly signal: AbortSignal | undefined
  /** 1-based execution count across the driver. */
  readonly sequence: number
}

export type MemoryHandler = (command: MemoryCommand) => MemoryResult | Promise<MemoryResult>

export type MemoryEvent =
  | { readonly type: 'connect'; readonly connection: number }
  | { readonly type: 'release'; readonly connection: number }
  | { readonly type: 'begin'; readonly connection: number; readonly isolationLevel: IsolationLevel }
  | { readonly type: 'commit' | 'rollback'; readonly connection: number }
  | { readonly type: 'execute'; readonly connection: number; readonly text: string }

export interface MemoryDriverConfig {
  /** Results by exact command text. Checked before `handler`. */
  readonly routes?: Readonly<Record<string, MemoryResult | MemoryHandler>> | undefined
  readonly handler?: MemoryHandler | undefined
  readonly maxConnections?: number | undefined
  readonly acquireTimeoutMs?: number | undefined
  readonly transactions?: boolean | undefined
  readonly defaultTimeoutMs?: number | undefined
}

export interface MemoryDriver extends Driver {
  readonly events: readonly MemoryEvent[]
  readonly activeConnections: number
}

const log = createModuleLogger('driver-memory')

// ── Factory ────────────────────────────────────────────────────

export function createMemoryDriver(config: MemoryDriverConfig = {}): MemoryDriver {
  const name = 'memory'
  const events: MemoryEvent[] = []
  const pool = new SlotPool(name, {
    max: config.maxConnections ?? 10,
    acquireTimeoutMs: config.acquireTimeoutMs ?? 1000,
  })
  let closed = false
  let connections = 0
  let sequence = 0

  const resolve = async (command: MemoryCommand): Promise<MemoryResult> => {
    const route = config.routes?.[command.text]
    if (route !== undefined) return typeof route === 'function' ? route(command) : route
    if (config.handler !== undefined) return config.handler(command)
    throw new CommandExecutionError({
      code: 'COMMAND_FAILED',
      driver: name,
      commandText: command.text,
      parameters: command.parameters.map((p) => p.name),
    })
  }

  function connect(id: number): DriverConnection {
    let transaction: DriverTransaction | undefined
    let released = false

    const prepare = (request: PrepareCommandRequest): DriverCommand => {
      const parameters: ParameterDescriptor[] = []
      let outputs: Readonly<Record<string, unknown>> = {}

      return {
        text: request.text,
        bindParameter(descriptor) {
          parameters.push(descriptor)
        },
        async execute(signal): Promise<RowCursor> {
          signal?.throwIfAborted()
          if (released) throw new TransientConnectionError('CONNECTION_LOST', 'Connection was released', { driver: name })
          events.push({ type: 'execute', connection: id, text: request.text })
          const command: MemoryCommand = {
            text: request.text,
            type: request.type,
            parameters,
            isolationLevel: request.transaction?.isolationLevel,
            timeoutMs: request.timeoutMs,
            signal,
            sequence: ++sequence,
          }
          const result = await withTimeout(resolve(command), request.timeoutMs, request.text)
          outputs = result.outputs ?? {}
          const segments: BufferedSegment[] = (result.segments ?? []).map((s) => ({
            columns: columnsOf(s.columns, s.types),
            rows: s.rows,
          }))
          return bufferedCursor(segments, { recordsAffected: result.recordsAffected, behavior: request.behavior })
        },
        outputValues: () => new Map(Object.entries(outputs)),
        dispose: async () => {},
      }
    }

    return {
      async beginTransaction(level) {
        events.push({ type: 'begin', connection: id, isolationLevel: level })
        let done = false
        const finish = (type: 'commit' | 'rollback'): void => {
          if (done) throw new Error(`Transaction already finished`)
          done = true
          events.push({ type, connection: id })
        }
        const tx: DriverTransaction = {
          isolationLevel: level,
          commit: async () => finish('commit'),
          rollback: async () => finish('rollback'),
          dispose: async () => {
            if (!done) finish('rollback')
            if (transaction === tx) transaction = undefined
          },
        }
        transaction = tx
        return tx
      },
      prepareCommand: prepare,
      async dispose() {
        if (released) return
        if (transaction !== undefined) await transaction.dispose()
        released = true
        events.push({ type: 'release', connection: id })
        pool.release()
      },
    }
  }

  async function withTimeout<T>(work: Promise<T>, timeoutMs: number | undefined, text: string): Promise<T> {
    const limit = timeoutMs ?? config.defaultTimeoutMs
    if (limit === undefined || limit <= 0) return work
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new CommandExecutionError({ code: 'COMMAND_TIMEOUT', driver: name, commandText: text, timeoutMs: limit }))
      }, limit)
    })
    try {
      return await Promise.race([work, timeout])
    } finally {
      clearTimeout(timer)
    }
  }

  return {
    name,
    capabilities: {
      transactions: config.transactions ?? true,
      multipleSegments: true,
      arrayParameters: 'expand',
      parameterMarker: '@',
      defaultTimeoutMs: config.defaultTimeoutMs,
    },

    get events() {
      return events
    },

    get activeConnections() {
      return pool.active
    },

    async openConnection(signal) {
      if (closed) {
        throw new TransientConnectionError('CONNECTION_FAILED', 'Memory driver is closed', { driver: name })
      }
      await pool.acquire(signal)
      const id = ++connections
      events.push({ type: 'connect', connection: id })
      log.trace({ connection: id, active: pool.active }, 'connection acquired')
      return connect(id)
    },

    async ping() {
      if (closed) {
        throw new TransientConnectionError('CONNECTION_FAILED', 'Memory driver is closed', { driver: name })
      }
    },

    async close() {
      closed = true
      pool.drain(new TransientConnectionError('CONNECTION_FAILED', 'Memory driver is closed', { driver: name }))
    },
  }
}

export { SlotPool } from './pool.js'
export type { PoolOptions } from './pool.js'
