import type { DbJobError } from '@dbjob/core'
import { CommandExecutionError, TransientConnectionError } from '@dbjob/core'

export const DRIVER_NAME = 'postgres'

// Class 08 (connection exception) plus shutdown and too-many-connections states
const TRANSIENT_STATES = new Set(['57P01', '57P02', '57P03', '53300'])
const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND'])
const QUERY_CANCELED = '57014'

export interface CommandContext {
  readonly text: string
  readonly parameters: readonly string[]
  readonly timeoutMs: number | undefined
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') return err.code
  return undefined
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

export function isConnectionFault(err: unknown): boolean {
  const code = errorCode(err)
  if (code === undefined) return false
  return code.startsWith('08') || TRANSIENT_STATES.has(code) || NETWORK_CODES.has(code)
}

function isReadTimeout(err: unknown): boolean {
  return err instanceof Error && err.message === 'Query read timeout'
}

/** Whether the client must be discarded instead of returned to the pool. */
export function breaksConnection(err: unknown): boolean {
  return isConnectionFault(err) || isReadTimeout(err)
}

/** Errors from `pool.connect()`. */
export function classifyConnectError(err: unknown): TransientConnectionError {
  const cause = toError(err)
  if (cause.message.includes('timeout exceeded when trying to connect')) {
    return new TransientConnectionError('POOL_EXHAUSTED', 'PostgreSQL pool exhausted', { driver: DRIVER_NAME }, cause)
  }
  return new TransientConnectionError(
    'CONNECTION_FAILED',
    `PostgreSQL connection failed: ${cause.message}`,
    { driver: DRIVER_NAME },
    cause,
  )
}

/** Errors from a statement run on a checked-out client. */
export function classifyCommandError(err: unknown, command: CommandContext, defaultTimeoutMs: number | undefined): DbJobError {
  const cause = toError(err)
  const code = errorCode(err)

  if (isConnectionFault(err)) {
    return new TransientConnectionError(
      'CONNECTION_LOST',
      `PostgreSQL connection lost: ${cause.message}`,
      { driver: DRIVER_NAME },
      cause,
    )
  }
  if (code === QUERY_CANCELED || isReadTimeout(err)) {
    return new CommandExecutionError(
      {
        code: 'COMMAND_TIMEOUT',
        driver: DRIVER_NAME,
        commandText: command.text,
        timeoutMs: command.timeoutMs ?? defaultTimeoutMs ?? 0,
      },
      cause,
    )
  }
  return new CommandExecutionError(
    {
      code: 'COMMAND_FAILED',
      driver: DRIVER_NAME,
      commandText: command.text,
      parameters: command.parameters,
      sqlState: code,
    },
    cause,
  )
}
