// Config validation
export { MAX_RESULT_ARITY, MAX_RETRY_ATTEMPTS, validateCommandSpec, validateJobConfig } from './configValidation.js'

// Errors
export type {
  CardinalityErrorCode,
  CommandExecutionErrorDetails,
  ConfigErrorCode,
  ConfigErrorEntry,
  ErrorComponent,
  ErrorKind,
  JobHookName,
  MappingErrorDetails,
  ParameterBindingErrorDetails,
  TransientConnectionErrorCode,
  TransientConnectionErrorDetails,
} from './errors.js'
export {
  CanceledError,
  CardinalityError,
  CommandExecutionError,
  ConfigError,
  CursorError,
  DbJobError,
  HookError,
  isTransientError,
  MappingError,
  ParameterBindingError,
  serializeError,
  TransientConnectionError,
} from './errors.js'

// Types: command
export type {
  ColumnMapSettings,
  CommandBehavior,
  CommandDraft,
  CommandSource,
  CommandSpec,
  CommandType,
} from './types/command.js'
// Types: job
export type { BufferingMode, IsolationLevel, JobConfiguration, JobSettings, RetryPolicy } from './types/job.js'
// Types: parameters
export type {
  BindingRestrictions,
  ParameterDescriptor,
  ParameterDirection,
  ParameterTypeHint,
} from './types/parameters.js'
// Types: result
export type {
  DataSet,
  DataTable,
  DebugLogEntry,
  GenericRecord,
  HealthCheckResult,
  JobOutcome,
  JobStatus,
  KeyValuePairs,
} from './types/result.js'
// Types: values
export type { ColumnInfo, DbValue, FieldType } from './types/values.js'
