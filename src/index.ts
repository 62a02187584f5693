// =============================================================================
// parafold — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export {
  TaskEngine,
  createEngine,
  FutureHandle,
  isFutureHandle,
  isHandleOf,
  remote,
  isRemoteFunction,
  REMOTE_MARKER,
  FutureStore,
  DependencyTracker,
  WorkerPool,
  ReadyQueue,
} from "./engine/index.js";
export type {
  EngineOptions,
  TaskStatus,
  TaskLifecycle,
  Awaitable,
  RemoteArgs,
  RemoteFunction,
  RemoteOptions,
  Settlement,
  SettlementListener,
  TrackedTask,
  DependencyTrackerHooks,
  WorkerPoolHooks,
  JobInfo,
} from "./engine/index.js";

// ─────────────────────────────────────────────────────────────────────────────
// Parallel helpers
// ─────────────────────────────────────────────────────────────────────────────

export { mapParallel, reduceParallel, reduceParallelTree } from "./parallel/map-reduce.js";

// ─────────────────────────────────────────────────────────────────────────────
// Configuration, events & metrics
// ─────────────────────────────────────────────────────────────────────────────

export {
  EngineConfigSchema,
  FutureStateSchema,
  WorkerPoolMetricsSchema,
  EngineMetricsSchema,
} from "./domain/engine.schema.js";
export type {
  EngineConfig,
  EngineConfigInput,
  FutureState,
  WorkerPoolMetrics,
  EngineMetrics,
  EngineEvent,
  EngineEventType,
  EngineEventListener,
} from "./domain/engine.schema.js";

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export { createConsoleLogger, toLogEntry, describeError } from "./logging.js";
export type { LogEntry, LogLevel, Logger, ConsoleLoggerOptions } from "./logging.js";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  ParafoldError,
  InvalidSubmissionError,
  UnknownFutureError,
  EmptyInputError,
  TaskExecutionError,
  DoubleResolutionError,
  EngineClosedError,
  ValidationError,
  toTaskError,
} from "./errors.js";
