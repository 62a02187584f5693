/**
 * Structured error hierarchy for parafold.
 *
 * All engine errors extend {@link ParafoldError} to enable type-safe catch blocks:
 *
 * ```ts
 * try {
 *   await engine.get(handle);
 * } catch (e) {
 *   if (e instanceof TaskExecutionError) { ... }
 * }
 * ```
 *
 * Errors thrown by payloads are recorded as they are; only non-`Error` throw
 * values get wrapped in {@link TaskExecutionError}.
 *
 * @module errors
 */

/** Base error for all parafold errors. Includes an error code for programmatic matching. */
export class ParafoldError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "ParafoldError";
    this.code = code;
  }
}

/** Thrown synchronously by `submit` and the parallel helpers for malformed calls. */
export class InvalidSubmissionError extends ParafoldError {
  constructor(message: string, code = "INVALID_SUBMISSION") {
    super(code, message);
    this.name = "InvalidSubmissionError";
  }
}

/** A handle that was released, or that was issued by a different engine. */
export class UnknownFutureError extends InvalidSubmissionError {
  readonly futureId: string;
  constructor(futureId: string, reason: string) {
    super(`Unknown future "${futureId}": ${reason}`, "UNKNOWN_FUTURE");
    this.name = "UnknownFutureError";
    this.futureId = futureId;
  }
}

/** Reduce helpers have no neutral element to fall back on. */
export class EmptyInputError extends ParafoldError {
  readonly operation: string;
  constructor(operation: string) {
    super("EMPTY_INPUT", `${operation} requires at least one input`);
    this.name = "EmptyInputError";
    this.operation = operation;
  }
}

/** Wraps a non-Error value thrown or rejected by a payload. */
export class TaskExecutionError extends ParafoldError {
  readonly taskId: string;
  readonly payloadName: string;
  readonly thrown: unknown;
  constructor(taskId: string, payloadName: string, thrown: unknown) {
    super("TASK_EXECUTION_ERROR", `Task "${taskId}" (${payloadName}) failed: ${String(thrown)}`);
    this.name = "TaskExecutionError";
    this.taskId = taskId;
    this.payloadName = payloadName;
    this.thrown = thrown;
  }
}

/** A future was settled twice. Always an engine invariant violation. */
export class DoubleResolutionError extends ParafoldError {
  readonly futureId: string;
  constructor(futureId: string, currentState: string) {
    super("DOUBLE_RESOLUTION", `Future "${futureId}" is already ${currentState}`);
    this.name = "DoubleResolutionError";
    this.futureId = futureId;
  }
}

/** Thrown when work is submitted to an engine that is shutting down. */
export class EngineClosedError extends ParafoldError {
  readonly engineName: string;
  constructor(engineName: string) {
    super("ENGINE_CLOSED", `Engine "${engineName}" has been shut down. Create a new instance.`);
    this.name = "EngineClosedError";
    this.engineName = engineName;
  }
}

/** Thrown when configuration validation fails. */
export class ValidationError extends ParafoldError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("VALIDATION_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/** Normalises an unknown throw value into the error recorded on a failed future. */
export function toTaskError(taskId: string, payloadName: string, thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new TaskExecutionError(taskId, payloadName, thrown);
}
