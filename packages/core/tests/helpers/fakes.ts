import type { IsolationLevel, ParameterDescriptor } from '@dbjob/validation'
import type {
  Driver,
  DriverCapabilities,
  DriverCommand,
  DriverConnection,
  DriverTransaction,
  PrepareCommandRequest,
  RowCursor,
} from '../../src/types/interfaces.js'

// ── Cursor ─────────────────────────────────────────────────────

export interface FakeSegment {
  columns: string[]
  rows: unknown[][]
}

export interface FakeCursorOptions {
  recordsAffected?: number
  events?: string[]
  /** Called after each successful `advanceRow()`. */
  onRow?: (segment: number, row: number) => void
}

export function fakeCursor(segments: FakeSegment[], options: FakeCursorOptions = {}): RowCursor {
  let segment = 0
  let row = -1
  return {
    columnSchema: () => (segments[segment]?.columns ?? []).map((name, ordinal) => ({ name, type: 'text', ordinal })),
    advanceRow: async () => {
      const current = segments[segment]
      if (current === undefined || row + 1 >= current.rows.length) return false
      row++
      options.onRow?.(segment, row)
      return true
    },
    advanceSegment: async () => {
      if (segment + 1 >= segments.length) {
        segment = segments.length
        return false
      }
      segment++
      row = -1
      return true
    },
    readColumn: (index) => segments[segment]?.rows[row]?.[index],
    recordsAffected: options.recordsAffected ?? -1,
    dispose: async () => {
      options.events?.push('dispose:cursor')
    },
  }
}

// ── Driver ─────────────────────────────────────────────────────

export interface ExecutedCommand {
  request: PrepareCommandRequest
  parameters: ParameterDescriptor[]
  attempt: number
}

export interface FakeDriverOptions {
  /** Segments returned by every execution, or a function of the executed command. */
  results?: FakeSegment[] | ((command: ExecutedCommand) => FakeSegment[] | Promise<FakeSegment[]>)
  recordsAffected?: number
  outputs?: Record<string, unknown>
  capabilities?: Partial<DriverCapabilities>
  /** Number of `openConnection()` calls that fail before one succeeds. */
  openFailures?: number
  openError?: () => Error
  onRow?: (segment: number, row: number) => void
  failCommit?: Error
  failCursorDispose?: Error
}

export interface FakeDriver {
  driver: Driver
  events: string[]
  executed: ExecutedCommand[]
}

export function fakeDriver(options: FakeDriverOptions = {}): FakeDriver {
  const events: string[] = []
  const executed: ExecutedCommand[] = []
  let opens = 0
  let attempt = 0

  const capabilities: DriverCapabilities = {
    transactions: true,
    multipleSegments: true,
    arrayParameters: 'native',
    parameterMarker: '@',
    ...options.capabilities,
  }

  const transaction = (level: IsolationLevel): DriverTransaction => ({
    isolationLevel: level,
    commit: async () => {
      events.push('commit')
      if (options.failCommit !== undefined) throw options.failCommit
    },
    rollback: async () => {
      events.push('rollback')
    },
    dispose: async () => {
      events.push('dispose:transaction')
    },
  })

  const command = (request: PrepareCommandRequest): DriverCommand => {
    const parameters: ParameterDescriptor[] = []
    return {
      text: request.text,
      bindParameter: (descriptor) => {
        parameters.push(descriptor)
      },
      execute: async () => {
        events.push('execute')
        const entry: ExecutedCommand = { request, parameters, attempt }
        executed.push(entry)
        const results = options.results ?? []
        const segments = typeof results === 'function' ? await results(entry) : results
        const cursorOptions: FakeCursorOptions = { events }
        if (options.recordsAffected !== undefined) cursorOptions.recordsAffected = options.recordsAffected
        if (options.onRow !== undefined) cursorOptions.onRow = options.onRow
        const cursor = fakeCursor(segments, cursorOptions)
        if (options.failCursorDispose === undefined) return cursor
        const failure = options.failCursorDispose
        return {
          ...cursor,
          dispose: async () => {
            events.push('dispose:cursor')
            throw failure
          },
        }
      },
      outputValues: () => new Map(Object.entries(options.outputs ?? {})),
      dispose: async () => {
        events.push('dispose:command')
      },
    }
  }

  const connection = (): DriverConnection => ({
    beginTransaction: async (level) => {
      events.push(`begin:${level}`)
      return transaction(level)
    },
    prepareCommand: (request) => command(request),
    dispose: async () => {
      events.push('dispose:connection')
    },
  })

  const driver: Driver = {
    name: 'fake',
    capabilities,
    openConnection: async () => {
      opens++
      attempt = opens
      events.push('open')
      if (opens <= (options.openFailures ?? 0)) {
        throw (options.openError ?? (() => new Error('open failed')))()
      }
      return connection()
    },
    ping: async () => {},
    close: async () => {
      events.push('close')
    },
  }

  return { driver, events, executed }
}
