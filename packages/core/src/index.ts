// Re-export all types from validation package
export type {
  BindingRestrictions,
  BufferingMode,
  ColumnInfo,
  ColumnMapSettings,
  CommandBehavior,
  CommandDraft,
  CommandSource,
  CommandSpec,
  CommandType,
  DataSet,
  DataTable,
  DbValue,
  DebugLogEntry,
  FieldType,
  GenericRecord,
  HealthCheckResult,
  IsolationLevel,
  JobConfiguration,
  JobOutcome,
  JobSettings,
  JobStatus,
  KeyValuePairs,
  ParameterDescriptor,
  ParameterDirection,
  ParameterTypeHint,
  RetryPolicy,
} from '@dbjob/validation'
// Re-export validation functions and classes
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
  validateJobConfig,
} from '@dbjob/validation'
// Parameter Binder
export type { AddParameterOptions } from './binding/parameters.js'
export { bindParameters, inferTypeHint, mergeParameters, ParameterCollection } from './binding/parameters.js'
// Command Builder
export type { BuildCommandInput } from './command/builder.js'
export {
  buildCommand,
  effectiveTimeout,
  expandArrayParameters,
  resolveCommandSpec,
  rewriteNamedParameters,
} from './command/builder.js'
// Connector
export type { CreateDbConnectorOptions, DbConnector, DbScope, JobFactory, ScopeOptions } from './connector.js'
export { createDbConnector } from './connector.js'
// Driver helpers
export type { BufferedCursorOptions, BufferedSegment } from './driver/cursor.js'
export { bufferedCursor, columnsOf } from './driver/cursor.js'
// Debug
export type { Logger } from './debug/logger.js'
export { createModuleLogger, logError, logger } from './debug/logger.js'
// Job Handle
export type { DisposableResult, ExecuteOptions } from './job.js'
export { DbJob } from './job.js'
// Row Mapper
export { coerceValue, toDbValue, zeroValue } from './mapping/coercion.js'
export type { MappingPlan } from './mapping/plan.js'
export type { FieldDescriptor, FieldSpec, FieldValue, Mappable, RecordOf, RowShape } from './mapping/shapes.js'
export { custom, dictionary, fromClass, keyValuePairs, record, scalar } from './mapping/shapes.js'
// Result Materializer
export type {
  CursorState,
  MaterializerOptions,
  SlotResults,
  SlotSpec,
  SlotTuple,
} from './materialize/materializer.js'
export { ResultMaterializer } from './materialize/materializer.js'
export type { RowSequence } from './materialize/rows.js'
export { BufferedRows, LazyRows } from './materialize/rows.js'
// Pipeline
export type { JobBody, JobHooks, PipelineRuntime, RunOptions, RunResult, SharedScope } from './pipeline.js'
export { releaseContext, runJob } from './pipeline.js'
export type { PipelineState, ReleaseFailure } from './run/context.js'
export { RunContext } from './run/context.js'
// Driver interfaces
export type {
  Driver,
  DriverCapabilities,
  DriverCommand,
  DriverConnection,
  DriverTransaction,
  PrepareCommandRequest,
  RowCursor,
} from './types/interfaces.js'
