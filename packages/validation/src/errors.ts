// --- Taxonomy ---

export type ErrorKind =
  | 'configuration'
  | 'parameter-binding'
  | 'transient-connection'
  | 'command-execution'
  | 'mapping'
  | 'cardinality'
  | 'canceled'
  | 'cursor'
  | 'hook'

export type ErrorComponent =
  | 'job'
  | 'parameter-binder'
  | 'command-builder'
  | 'row-mapper'
  | 'materializer'
  | 'pipeline'
  | 'driver'

// --- Base Error ---

export class DbJobError extends Error {
  readonly code: string
  readonly kind: ErrorKind
  readonly component: ErrorComponent

  constructor(code: string, kind: ErrorKind, component: ErrorComponent, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DbJobError'
    this.code = code
    this.kind = kind
    this.component = component
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      kind: this.kind,
      component: this.component,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  code:
    | 'EMPTY_COMMAND'
    | 'INVALID_COMMAND_TYPE'
    | 'INVALID_TIMEOUT'
    | 'INVALID_RETRY'
    | 'INVALID_ISOLATION_LEVEL'
    | 'INVALID_BUFFERING'
    | 'INVALID_ARITY'
  message: string
  details: {
    field?: string | undefined
    expected?: string | undefined
    actual?: string | undefined
  }
}

export type ConfigErrorCode =
  | 'CONFIG_INVALID'
  | 'JOB_LOCKED'
  | 'TRANSACTIONS_UNSUPPORTED'
  | 'SCOPE_CLOSED'
  | 'SCOPE_ISOLATION_MISMATCH'
  | 'CONNECTOR_CLOSED'

export class ConfigError extends DbJobError {
  declare readonly code: ConfigErrorCode
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[])
  constructor(code: Exclude<ConfigErrorCode, 'CONFIG_INVALID'>, message: string, component: ErrorComponent)
  constructor(
    errorsOrCode: readonly ConfigErrorEntry[] | Exclude<ConfigErrorCode, 'CONFIG_INVALID'>,
    message?: string,
    component?: ErrorComponent,
  ) {
    if (typeof errorsOrCode === 'string') {
      super(errorsOrCode, 'configuration', component ?? 'job', message ?? errorsOrCode)
      this.errors = []
    } else {
      const count = errorsOrCode.length
      super('CONFIG_INVALID', 'configuration', 'job', `Job config invalid: ${count} error${count === 1 ? '' : 's'}`)
      this.errors = errorsOrCode
    }
    this.name = 'ConfigError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Parameter Binding Error ---

export type ParameterBindingErrorDetails =
  | { code: 'UNSUPPORTED_PARAMETER_SHAPE'; shape: string }
  | { code: 'DUPLICATE_PARAMETER_NAME'; name: string }

export class ParameterBindingError extends DbJobError {
  declare readonly code: 'UNSUPPORTED_PARAMETER_SHAPE' | 'DUPLICATE_PARAMETER_NAME'
  readonly details: ParameterBindingErrorDetails

  constructor(details: ParameterBindingErrorDetails) {
    super(details.code, 'parameter-binding', 'parameter-binder', defaultBindingMessage(details))
    this.name = 'ParameterBindingError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Transient Connection Error ---

export type TransientConnectionErrorCode = 'CONNECTION_FAILED' | 'POOL_EXHAUSTED' | 'CONNECTION_LOST' | 'COMMAND_TIMEOUT'

export interface TransientConnectionErrorDetails {
  driver: string
  timeoutMs?: number | undefined
}

export class TransientConnectionError extends DbJobError {
  declare readonly code: TransientConnectionErrorCode
  readonly details: TransientConnectionErrorDetails

  constructor(
    code: TransientConnectionErrorCode,
    message: string,
    details: TransientConnectionErrorDetails,
    cause?: Error | undefined,
  ) {
    super(code, 'transient-connection', 'driver', message, cause ? { cause } : undefined)
    this.name = 'TransientConnectionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Command Execution Error ---

export type CommandExecutionErrorDetails =
  | {
      code: 'COMMAND_FAILED'
      driver: string
      commandText: string
      parameters: readonly string[]
      sqlState?: string | undefined
    }
  | {
      code: 'COMMAND_TIMEOUT'
      driver: string
      commandText: string
      timeoutMs: number
    }

export class CommandExecutionError extends DbJobError {
  declare readonly code: 'COMMAND_FAILED' | 'COMMAND_TIMEOUT'
  readonly details: CommandExecutionErrorDetails

  constructor(details: CommandExecutionErrorDetails, cause?: Error | undefined, component: ErrorComponent = 'driver') {
    super(details.code, 'command-execution', component, defaultCommandMessage(details), cause ? { cause } : undefined)
    this.name = 'CommandExecutionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Mapping Error ---

export type MappingErrorDetails =
  | { code: 'COLUMN_TYPE_MISMATCH'; column: string; field: string; expected: string; actual: string }
  | { code: 'UNSUPPORTED_SHAPE'; shape: string }

export class MappingError extends DbJobError {
  declare readonly code: 'COLUMN_TYPE_MISMATCH' | 'UNSUPPORTED_SHAPE'
  readonly details: MappingErrorDetails

  constructor(details: MappingErrorDetails, cause?: Error | undefined) {
    super(details.code, 'mapping', 'row-mapper', defaultMappingMessage(details), cause ? { cause } : undefined)
    this.name = 'MappingError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Cardinality Error ---

export type CardinalityErrorCode = 'EMPTY_RESULT' | 'MULTIPLE_ROWS_FOUND' | 'MISSING_RESULT_SEGMENT'

export class CardinalityError extends DbJobError {
  declare readonly code: CardinalityErrorCode
  readonly segment: number

  constructor(code: CardinalityErrorCode, segment: number) {
    super(code, 'cardinality', 'materializer', defaultCardinalityMessage(code, segment))
    this.name = 'CardinalityError'
    this.segment = segment
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      segment: this.segment,
    }
  }
}

// --- Canceled Error ---

export class CanceledError extends DbJobError {
  declare readonly code: 'CANCELED'

  constructor(component: ErrorComponent = 'pipeline', reason?: unknown) {
    super(
      'CANCELED',
      'canceled',
      component,
      'Job run was canceled',
      reason instanceof Error ? { cause: reason } : undefined,
    )
    this.name = 'CanceledError'
  }
}

// --- Cursor Error ---

export class CursorError extends DbJobError {
  declare readonly code: 'CURSOR_DISPOSED' | 'CURSOR_CONSUMED'

  constructor(code: 'CURSOR_DISPOSED' | 'CURSOR_CONSUMED') {
    super(
      code,
      'cursor',
      'materializer',
      code === 'CURSOR_DISPOSED'
        ? 'Row cursor was disposed together with its run context'
        : 'Lazy result can only be iterated once',
    )
    this.name = 'CursorError'
  }
}

// --- Hook Error ---

export type JobHookName = 'onCompleted' | 'onFailed' | 'onError'

export class HookError extends DbJobError {
  declare readonly code: 'HOOK_FAILED'
  readonly hook: JobHookName

  constructor(hook: JobHookName, cause: unknown) {
    super(
      'HOOK_FAILED',
      'hook',
      'job',
      `Job hook ${hook} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    )
    this.name = 'HookError'
    this.hook = hook
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      hook: this.hook,
    }
  }
}

// --- Classification ---

export function isTransientError(err: unknown): err is TransientConnectionError {
  return err instanceof TransientConnectionError
}

// --- Helpers ---

export function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof DbJobError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function defaultBindingMessage(details: ParameterBindingErrorDetails): string {
  switch (details.code) {
    case 'UNSUPPORTED_PARAMETER_SHAPE':
      return `Unsupported parameter source: ${details.shape} cannot be decomposed into named parameters`
    case 'DUPLICATE_PARAMETER_NAME':
      return `Duplicate parameter name: ${details.name}`
  }
}

function defaultCommandMessage(details: CommandExecutionErrorDetails): string {
  switch (details.code) {
    case 'COMMAND_FAILED':
      return `Command failed on ${details.driver}${details.sqlState !== undefined ? ` (${details.sqlState})` : ''}`
    case 'COMMAND_TIMEOUT':
      return `Command timeout on ${details.driver} (${details.timeoutMs}ms)`
  }
}

function defaultMappingMessage(details: MappingErrorDetails): string {
  switch (details.code) {
    case 'COLUMN_TYPE_MISMATCH':
      return `Column '${details.column}' (${details.actual}) cannot be converted to ${details.expected} for field '${details.field}'`
    case 'UNSUPPORTED_SHAPE':
      return `Unsupported result shape: ${details.shape}`
  }
}

function defaultCardinalityMessage(code: CardinalityErrorCode, segment: number): string {
  switch (code) {
    case 'EMPTY_RESULT':
      return `Result segment ${segment} is empty`
    case 'MULTIPLE_ROWS_FOUND':
      return `Result segment ${segment} has more than one row`
    case 'MISSING_RESULT_SEGMENT':
      return `Result segment ${segment} is required but the command did not produce it`
  }
}
