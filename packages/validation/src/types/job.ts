import type { CommandSource } from './command.js'

export type IsolationLevel = 'readUncommitted' | 'readCommitted' | 'repeatableRead' | 'serializable' | 'snapshot'

export type BufferingMode = 'buffered' | 'lazy'

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  readonly attempts: number
  readonly delayMs?: number | undefined
}

export interface JobSettings {
  readonly commandTimeoutMs?: number | undefined
  readonly buffering?: BufferingMode | undefined
  readonly retry?: RetryPolicy | undefined
  readonly debug?: boolean | undefined
  readonly parameterNamesCaseSensitive?: boolean | undefined
}

/** Snapshot of one job's configuration, taken when a run starts. */
export interface JobConfiguration {
  readonly command: CommandSource
  readonly isolationLevel?: IsolationLevel | undefined
  readonly commandTimeoutMs?: number | undefined
  readonly buffering: BufferingMode
  readonly retry: RetryPolicy
  readonly commitOnCancel: boolean
  readonly debug: boolean
  /** Number of result slots requested (multi-segment reads). */
  readonly arity?: number | undefined
}
