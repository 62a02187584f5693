// =============================================================================
// Engine Schema — Configuration, future states & event types for TaskEngine
// =============================================================================

import { z } from "zod";

export const EngineConfigSchema = z.object({
  poolSize: z.number().int().min(1).default(4),
  name: z.string().min(1).default("engine"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const FutureStateSchema = z.enum(["pending", "ready", "failed"]);

export type FutureState = z.infer<typeof FutureStateSchema>;

export const WorkerPoolMetricsSchema = z.object({
  poolSize: z.number(),
  activeWorkers: z.number(),
  idleWorkers: z.number(),
  queueDepth: z.number(),
  totalCompleted: z.number(),
  totalFailed: z.number(),
  latencyP50Ms: z.number(),
  latencyP95Ms: z.number(),
  latencyP99Ms: z.number(),
  utilizationRatio: z.number(),
});

export type WorkerPoolMetrics = z.infer<typeof WorkerPoolMetricsSchema>;

export const EngineMetricsSchema = WorkerPoolMetricsSchema.extend({
  submittedTasks: z.number(),
  waitingTasks: z.number(),
  skippedTasks: z.number(),
});

export type EngineMetrics = z.infer<typeof EngineMetricsSchema>;

export type EngineEvent =
  | { type: "task:submitted"; taskId: string; payload: string; dependencies: number }
  | { type: "task:ready"; taskId: string; queueDepth: number }
  | { type: "task:started"; taskId: string; payload: string; workerId: number }
  | { type: "task:completed"; taskId: string; payload: string; workerId: number; durationMs: number }
  | { type: "task:failed"; taskId: string; payload: string; workerId: number; durationMs: number; error: Error }
  | { type: "task:skipped"; taskId: string; payload: string; dependencyId: string; error: Error }
  | { type: "engine:shutdown"; pendingTasks: number }
  | { type: "engine:drained"; totalCompleted: number; totalFailed: number };

export type EngineEventType = EngineEvent["type"];

export type EngineEventListener = (event: EngineEvent) => void;
