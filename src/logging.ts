// =============================================================================
// Logging — Structured engine event logging
// =============================================================================

import type { EngineEvent } from "./domain/engine.schema.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  engine: string;
  data?: Record<string, unknown>;
}

export type Logger = (entry: LogEntry) => void;

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped (default: "info") */
  minLevel?: LogLevel;
  /** Sink for formatted lines (defaults to console.log) */
  write?: (line: string, data?: Record<string, unknown>) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = LEVEL_ORDER[options.minLevel ?? "info"];
  const write = options.write ?? ((line: string, data?: Record<string, unknown>) => {
    // eslint-disable-next-line no-console
    console.log(line, data ?? "");
  });

  return (entry: LogEntry) => {
    if (LEVEL_ORDER[entry.level] < minLevel) return;
    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}] [${entry.engine}]`;
    write(`${prefix} ${entry.event}`, entry.data);
  };
}

export function describeError(error: Error): Record<string, unknown> {
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  return { name: error.name, message: error.message, ...(code ? { code } : {}) };
}

/** Maps an engine event onto the log entry recorded for it. */
export function toLogEntry(engine: string, event: EngineEvent, now = Date.now()): LogEntry {
  const base = { timestamp: now, engine, event: event.type };

  switch (event.type) {
    case "task:submitted":
      return { ...base, level: "debug", data: { taskId: event.taskId, payload: event.payload, dependencies: event.dependencies } };
    case "task:ready":
      return { ...base, level: "debug", data: { taskId: event.taskId, queueDepth: event.queueDepth } };
    case "task:started":
      return { ...base, level: "debug", data: { taskId: event.taskId, payload: event.payload, workerId: event.workerId } };
    case "task:completed":
      return {
        ...base,
        level: "debug",
        data: { taskId: event.taskId, payload: event.payload, workerId: event.workerId, durationMs: event.durationMs },
      };
    case "task:failed":
      return {
        ...base,
        level: "warn",
        data: {
          taskId: event.taskId,
          payload: event.payload,
          workerId: event.workerId,
          durationMs: event.durationMs,
          error: describeError(event.error),
        },
      };
    case "task:skipped":
      return {
        ...base,
        level: "warn",
        data: { taskId: event.taskId, payload: event.payload, dependencyId: event.dependencyId, error: describeError(event.error) },
      };
    case "engine:shutdown":
      return { ...base, level: "info", data: { pendingTasks: event.pendingTasks } };
    case "engine:drained":
      return { ...base, level: "info", data: { totalCompleted: event.totalCompleted, totalFailed: event.totalFailed } };
  }
}
