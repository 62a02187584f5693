// =============================================================================
// TaskEngine — Futures-based scheduler over a bounded worker pool
// Uses FutureStore (arena of results), DependencyTracker (push-based
// readiness) and WorkerPool (FIFO dispatch onto fixed slots).
// =============================================================================

import {
  EngineConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
  type EngineEvent,
  type EngineEventListener,
  type EngineMetrics,
  type FutureState,
} from "../domain/engine.schema.js";
import { EngineClosedError, InvalidSubmissionError, ParafoldError, ValidationError, toTaskError } from "../errors.js";
import { toLogEntry, type LogLevel, type Logger } from "../logging.js";
import { DependencyTracker } from "./dependency-tracker.js";
import { FutureHandle, type RemoteArgs } from "./future-handle.js";
import { FutureStore } from "./future-store.js";
import { isRemoteFunction, type RemoteFunction } from "./remote-function.js";
import { WorkerPool, type JobInfo } from "./worker-pool.js";

export type TaskStatus = "waiting" | "ready" | "executing";

/** Where a task is in `waiting → ready → executing → {resolved, failed}`. */
export type TaskLifecycle = TaskStatus | "resolved" | "failed";

interface EngineTask {
  readonly id: FutureHandle<unknown>;
  readonly payload: string;
  readonly args: readonly unknown[];
  readonly execute: () => unknown;
  status: TaskStatus;
}

export interface EngineOptions extends EngineConfigInput {
  /** Receives one structured entry per engine event (default: no logging) */
  logger?: Logger;
}

export class TaskEngine {
  readonly config: EngineConfig;

  private readonly store: FutureStore;
  private readonly tracker: DependencyTracker<EngineTask>;
  private readonly pool: WorkerPool<EngineTask, unknown>;
  private readonly logger?: Logger;
  private readonly listeners = new Set<EngineEventListener>();
  /** taskId → unsettled task */
  private readonly tasks = new Map<string, EngineTask>();

  private closed = false;
  private shutdownPromise?: Promise<void>;
  private fatalError?: unknown;
  private readonly fatalWaiters: Array<() => void> = [];
  private submittedTasks = 0;
  private skippedTasks = 0;

  constructor(options: EngineOptions = {}) {
    const { logger, ...config } = options;
    const parsed = EngineConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue.message, issue.path.join(".") || undefined);
    }
    this.config = parsed.data;
    this.logger = logger;

    this.store = new FutureStore(this.config.name);
    this.tracker = new DependencyTracker<EngineTask>(this.store, {
      onReady: (task) => this.onTaskReady(task),
      onDependencyFailed: (task, dependency, error) => this.onDependencyFailed(task, dependency, error),
    });
    this.pool = new WorkerPool<EngineTask, unknown>((task) => task.execute(), this.config.poolSize, {
      onStart: (task, workerId) => this.onTaskStarted(task, workerId),
      onComplete: (task, result, info) => this.onTaskCompleted(task, result, info),
      onError: (task, error, info) => this.onTaskFailed(task, error, info),
      onFatal: (error, workerId, job) => this.onFatal(error, workerId, job),
    });
  }

  get name(): string {
    return this.config.name;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ── Submission ─────────────────────────────────────────────────────────────

  /**
   * Schedules `payload(...args)` and returns the handle of its result without
   * waiting. Arguments that are handles are replaced by their values once
   * Ready; the task is failed without running if any of them Failed.
   *
   * @throws {InvalidSubmissionError} for a non-remote payload, non-array args,
   *   or a handle this engine did not issue.
   * @throws {EngineClosedError} once {@link shutdown} has been called.
   */
  submit<A extends readonly unknown[], R>(payload: RemoteFunction<A, R>, args: RemoteArgs<A>): FutureHandle<R> {
    this.assertSubmission(payload, args);
    const argList: readonly unknown[] = args;

    const id = this.store.allocate<R>();
    const task: EngineTask = {
      id,
      payload: payload.name,
      args: argList,
      execute: () => payload.fn(...this.resolveArgs<A>(argList)),
      status: "waiting",
    };
    this.tasks.set(id.id, task);

    const dependencies = this.tracker.dependenciesOf(argList).length;
    try {
      this.emit({ type: "task:submitted", taskId: id.id, payload: task.payload, dependencies });
    } catch (error) {
      // No handle escapes, so settle the future here.
      this.tasks.delete(id.id);
      this.store.fail(id, toTaskError(id.id, task.payload, error));
      throw error;
    }
    this.submittedTasks++;
    this.tracker.register(task);
    return id;
  }

  /**
   * Runs every check `submit` performs without scheduling anything. The
   * parallel helpers call it for all inputs before the first submission.
   */
  validateSubmission(payload: unknown, args: unknown): void {
    this.assertSubmission(payload, args);
  }

  private assertSubmission(payload: unknown, args: unknown): asserts args is readonly unknown[] {
    if (this.fatalError !== undefined) throw this.fatalError;
    if (this.closed) throw new EngineClosedError(this.name);
    if (!isRemoteFunction(payload)) {
      throw new InvalidSubmissionError("Payload must be created with remote()");
    }
    if (!Array.isArray(args)) {
      throw new InvalidSubmissionError(`Arguments for "${payload.name}" must be an array`);
    }
    this.tracker.dependenciesOf(args);
  }

  // ── Retrieval ──────────────────────────────────────────────────────────────

  /** Resolves with the task's value, or rejects with the error it failed with. */
  get<T>(handle: FutureHandle<T>): Promise<T> {
    return this.store.get(handle);
  }

  /** Values in input order; rejects as soon as any of the futures fails. */
  getMany<T>(handles: readonly FutureHandle<T>[]): Promise<T[]> {
    return this.store.getMany(handles);
  }

  state(handle: FutureHandle<unknown>): FutureState {
    return this.store.state(handle);
  }

  status(handle: FutureHandle<unknown>): TaskLifecycle {
    const state = this.store.state(handle);
    const task = this.tasks.get(handle.id);
    if (task) return task.status;
    return state === "ready" ? "resolved" : "failed";
  }

  /** Frees a settled future; later use of the handle throws `UnknownFutureError`. */
  release(handle: FutureHandle<unknown>): void {
    this.store.release(handle);
  }

  // ── Events & metrics ───────────────────────────────────────────────────────

  on(listener: EngineEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getMetrics(): EngineMetrics {
    return {
      ...this.pool.getMetrics(),
      submittedTasks: this.submittedTasks,
      waitingTasks: this.tracker.waitingCount,
      skippedTasks: this.skippedTasks,
    };
  }

  // ── Teardown ───────────────────────────────────────────────────────────────

  /**
   * Stops accepting submissions, waits for every submitted task to settle and
   * retires the workers. Safe to call more than once. After a fatal error it
   * stops waiting on outstanding tasks and rejects with that error once the
   * pool has drained.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) return this.shutdownPromise;
    this.closed = true;
    this.shutdownPromise = this.runShutdown();
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    this.emit({ type: "engine:shutdown", pendingTasks: this.store.pendingCount });
    await Promise.race([this.store.whenSettled(), this.whenFatal()]);
    await this.pool.drain();
    const metrics = this.pool.getMetrics();
    this.emit({ type: "engine:drained", totalCompleted: metrics.totalCompleted, totalFailed: metrics.totalFailed });
    if (this.fatalError !== undefined) throw this.fatalError;
  }

  private whenFatal(): Promise<void> {
    if (this.fatalError !== undefined) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.fatalWaiters.push(resolve);
    });
  }

  // ── Scheduler hooks ────────────────────────────────────────────────────────

  private onTaskReady(task: EngineTask): void {
    task.status = "ready";
    this.pool.enqueue(task);
    this.emit({ type: "task:ready", taskId: task.id.id, queueDepth: this.pool.queueDepth });
  }

  private onTaskStarted(task: EngineTask, workerId: number): void {
    this.emit({ type: "task:started", taskId: task.id.id, payload: task.payload, workerId });
    task.status = "executing";
  }

  private onTaskCompleted(task: EngineTask, result: unknown, info: JobInfo): void {
    this.tasks.delete(task.id.id);
    try {
      this.emit({ type: "task:completed", taskId: task.id.id, payload: task.payload, ...info });
    } finally {
      this.store.resolve(task.id, result);
    }
  }

  private onTaskFailed(task: EngineTask, thrown: unknown, info: JobInfo): void {
    const error = toTaskError(task.id.id, task.payload, thrown);
    this.tasks.delete(task.id.id);
    try {
      this.emit({ type: "task:failed", taskId: task.id.id, payload: task.payload, ...info, error });
    } finally {
      this.store.fail(task.id, error);
    }
  }

  private onDependencyFailed(task: EngineTask, dependency: FutureHandle<unknown>, error: Error): void {
    this.tasks.delete(task.id.id);
    this.skippedTasks++;
    try {
      this.emit({ type: "task:skipped", taskId: task.id.id, payload: task.payload, dependencyId: dependency.id, error });
    } finally {
      this.store.fail(task.id, error);
    }
  }

  /**
   * A worker died. Tasks that can no longer be guaranteed a slot (queued,
   * waiting, or stranded on the dead worker) are failed with the fatal error;
   * tasks already executing elsewhere finish normally.
   */
  private onFatal(error: unknown, workerId: number, stranded: EngineTask | null): void {
    const first = this.fatalError === undefined;
    this.fatalError ??= error;
    this.log("error", "engine:fatal", { workerId, error: describeThrown(error) });
    if (first) for (const resolve of this.fatalWaiters.splice(0)) resolve();

    const failure = error instanceof Error ? error : new ParafoldError("ENGINE_FATAL", String(error));
    const outstanding = [...(stranded ? [stranded] : []), ...this.pool.takeQueued(), ...this.tasks.values()];
    for (const task of outstanding) {
      if (!this.tasks.has(task.id.id) || (task.status === "executing" && task !== stranded)) continue;
      this.tasks.delete(task.id.id);
      this.tracker.cancel(task.id.id);
      try {
        this.store.fail(task.id, failure);
      } catch (secondary) {
        this.log("error", "engine:fatal", { taskId: task.id.id, error: describeThrown(secondary) });
      }
    }
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private resolveArgs<A extends readonly unknown[]>(args: readonly unknown[]): A {
    const values = args.map((arg) => (arg instanceof FutureHandle ? this.store.valueOf(arg) : arg));
    // args was accepted as RemoteArgs<A>: each handle stands at a position typed A[K] and is Ready by now.
    return values as unknown as A;
  }

  private log(level: LogLevel, event: string, data: Record<string, unknown>): void {
    this.logger?.({ timestamp: Date.now(), level, event, engine: this.name, data });
  }

  private emit(event: EngineEvent): void {
    if (this.logger) this.logger(toLogEntry(this.name, event));
    for (const listener of this.listeners) listener(event);
  }
}

function describeThrown(thrown: unknown): string {
  return thrown instanceof Error ? thrown.message : String(thrown);
}

export function createEngine(options?: EngineOptions): TaskEngine {
  return new TaskEngine(options);
}
