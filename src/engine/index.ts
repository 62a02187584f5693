// =============================================================================
// Engine — Public API
// =============================================================================

export { TaskEngine, createEngine } from "./task-engine.js";
export type { EngineOptions, TaskStatus, TaskLifecycle } from "./task-engine.js";
export { FutureHandle, isFutureHandle, isHandleOf } from "./future-handle.js";
export type { Awaitable, RemoteArgs } from "./future-handle.js";
export { remote, isRemoteFunction, REMOTE_MARKER } from "./remote-function.js";
export type { RemoteFunction, RemoteOptions } from "./remote-function.js";
export { FutureStore } from "./future-store.js";
export type { Settlement, SettlementListener } from "./future-store.js";
export { DependencyTracker } from "./dependency-tracker.js";
export type { TrackedTask, DependencyTrackerHooks } from "./dependency-tracker.js";
export { WorkerPool } from "./worker-pool.js";
export type { WorkerPoolHooks, JobInfo } from "./worker-pool.js";
export { ReadyQueue } from "./ready-queue.js";
