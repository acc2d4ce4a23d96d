import type { ConfigErrorEntry } from './errors.js'
import { ConfigError } from './errors.js'
import type { CommandSpec, CommandType } from './types/command.js'
import type { BufferingMode, IsolationLevel, JobConfiguration } from './types/job.js'

// --- Limits ---

export const MAX_RESULT_ARITY = 8
export const MAX_RETRY_ATTEMPTS = 10

const COMMAND_TYPES = new Set<CommandType>(['text', 'storedProcedure', 'tableDirect'])
const ISOLATION_LEVELS = new Set<IsolationLevel>([
  'readUncommitted',
  'readCommitted',
  'repeatableRead',
  'serializable',
  'snapshot',
])
const BUFFERING_MODES = new Set<BufferingMode>(['buffered', 'lazy'])

// --- Command Validation ---

export function validateCommandSpec(spec: CommandSpec): ConfigError | null {
  const errors: ConfigErrorEntry[] = []
  collectCommandErrors(spec, errors)
  return errors.length > 0 ? new ConfigError(errors) : null
}

function collectCommandErrors(spec: CommandSpec, errors: ConfigErrorEntry[]): void {
  if (spec.text.trim().length === 0) {
    errors.push({
      code: 'EMPTY_COMMAND',
      message: 'Command text must not be empty',
      details: { field: 'text' },
    })
  }

  if (spec.type !== undefined && !COMMAND_TYPES.has(spec.type)) {
    errors.push({
      code: 'INVALID_COMMAND_TYPE',
      message: `Unknown command type '${String(spec.type)}'`,
      details: { field: 'type', expected: [...COMMAND_TYPES].join(' | '), actual: String(spec.type) },
    })
  }

  if (spec.timeoutMs !== undefined) {
    const timeoutErr = validateTimeout(spec.timeoutMs)
    if (timeoutErr !== null) {
      errors.push({
        code: 'INVALID_TIMEOUT',
        message: `Command timeout: ${timeoutErr}`,
        details: { field: 'timeoutMs', actual: String(spec.timeoutMs) },
      })
    }
  }
}

// --- Job Validation ---

export function validateJobConfig(config: JobConfiguration): ConfigError | null {
  const errors: ConfigErrorEntry[] = []

  if (typeof config.command === 'string') {
    collectCommandErrors({ text: config.command }, errors)
  } else if (typeof config.command === 'object') {
    collectCommandErrors(config.command, errors)
  }

  if (config.commandTimeoutMs !== undefined) {
    const timeoutErr = validateTimeout(config.commandTimeoutMs)
    if (timeoutErr !== null) {
      errors.push({
        code: 'INVALID_TIMEOUT',
        message: `Job timeout: ${timeoutErr}`,
        details: { field: 'commandTimeoutMs', actual: String(config.commandTimeoutMs) },
      })
    }
  }

  const attempts = config.retry.attempts
  if (!Number.isInteger(attempts) || attempts < 1 || attempts > MAX_RETRY_ATTEMPTS) {
    errors.push({
      code: 'INVALID_RETRY',
      message: `Retry attempts must be an integer in 1–${MAX_RETRY_ATTEMPTS}, got ${attempts}`,
      details: { field: 'retry.attempts', expected: `1–${MAX_RETRY_ATTEMPTS}`, actual: String(attempts) },
    })
  }
  const delay = config.retry.delayMs
  if (delay !== undefined && (!Number.isFinite(delay) || delay < 0)) {
    errors.push({
      code: 'INVALID_RETRY',
      message: `Retry delay must be a non-negative number, got ${delay}`,
      details: { field: 'retry.delayMs', actual: String(delay) },
    })
  }

  if (config.isolationLevel !== undefined && !ISOLATION_LEVELS.has(config.isolationLevel)) {
    errors.push({
      code: 'INVALID_ISOLATION_LEVEL',
      message: `Unknown isolation level '${String(config.isolationLevel)}'`,
      details: {
        field: 'isolationLevel',
        expected: [...ISOLATION_LEVELS].join(' | '),
        actual: String(config.isolationLevel),
      },
    })
  }

  if (!BUFFERING_MODES.has(config.buffering)) {
    errors.push({
      code: 'INVALID_BUFFERING',
      message: `Unknown buffering mode '${String(config.buffering)}'`,
      details: { field: 'buffering', expected: 'buffered | lazy', actual: String(config.buffering) },
    })
  }

  if (config.arity !== undefined && (!Number.isInteger(config.arity) || config.arity < 1 || config.arity > MAX_RESULT_ARITY)) {
    errors.push({
      code: 'INVALID_ARITY',
      message: `Result arity must be an integer in 1–${MAX_RESULT_ARITY}, got ${config.arity}`,
      details: { field: 'arity', expected: `1–${MAX_RESULT_ARITY}`, actual: String(config.arity) },
    })
  }

  return errors.length > 0 ? new ConfigError(errors) : null
}

function validateTimeout(timeoutMs: number): string | null {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    return `must be a non-negative number of milliseconds, got ${timeoutMs}`
  }
  return null
}
