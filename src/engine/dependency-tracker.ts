// =============================================================================
// DependencyTracker — Incremental readiness over future arguments
// =============================================================================

import type { FutureStore, Settlement } from "./future-store.js";
import { FutureHandle } from "./future-handle.js";

export interface TrackedTask {
  readonly id: FutureHandle<unknown>;
  readonly args: readonly unknown[];
}

export interface DependencyTrackerHooks<T extends TrackedTask> {
  /** Invoked once, when every future argument of `task` is Ready. */
  onReady(task: T): void;
  /** Invoked once, instead of onReady, when a future argument of `task` Failed. */
  onDependencyFailed(task: T, dependency: FutureHandle<unknown>, error: Error): void;
}

interface WaitingTask<T> {
  readonly task: T;
  /** Number of distinct dependencies still pending */
  remaining: number;
}

export class DependencyTracker<T extends TrackedTask> {
  /** taskId → waiting entry */
  private readonly pendingDeps = new Map<string, WaitingTask<T>>();
  /** futureId → ids of tasks waiting on it (reverse edges) */
  private readonly successors = new Map<string, string[]>();

  constructor(
    private readonly store: FutureStore,
    private readonly hooks: DependencyTrackerHooks<T>,
  ) {}

  get waitingCount(): number {
    return this.pendingDeps.size;
  }

  isWaiting(taskId: string): boolean {
    return this.pendingDeps.has(taskId);
  }

  /**
   * Distinct future handles among `args`, in first-seen order. Throws
   * `UnknownFutureError` for handles this store did not mint or has released.
   */
  dependenciesOf(args: readonly unknown[]): FutureHandle<unknown>[] {
    const seen = new Set<string>();
    const deps: FutureHandle<unknown>[] = [];
    for (const arg of args) {
      if (!(arg instanceof FutureHandle)) continue;
      this.store.assertKnown(arg);
      if (seen.has(arg.id)) continue;
      seen.add(arg.id);
      deps.push(arg);
    }
    return deps;
  }

  /** Returns the number of dependencies the task waits on after registration. */
  register(task: T): number {
    const deps = this.dependenciesOf(task.args);

    for (const dep of deps) {
      const error = this.store.errorOf(dep);
      if (error) {
        this.hooks.onDependencyFailed(task, dep, error);
        return 0;
      }
    }

    const pending = deps.filter((dep) => this.store.state(dep) === "pending");
    if (pending.length === 0) {
      this.hooks.onReady(task);
      return 0;
    }

    this.pendingDeps.set(task.id.id, { task, remaining: pending.length });
    for (const dep of pending) {
      let succ = this.successors.get(dep.id);
      if (!succ) {
        succ = [];
        this.successors.set(dep.id, succ);
        this.store.subscribe(dep, (handle, settlement) => this.onSettled(handle, settlement));
      }
      succ.push(task.id.id);
    }
    return pending.length;
  }

  /**
   * Stops tracking a waiting task without calling either hook. Returns false
   * when the task was not waiting.
   */
  cancel(taskId: string): boolean {
    return this.pendingDeps.delete(taskId);
  }

  /** Applies a settlement to every waiting successor. */
  private onSettled(handle: FutureHandle<unknown>, settlement: Settlement): void {
    const succs = this.successors.get(handle.id) ?? [];
    this.successors.delete(handle.id);

    for (const taskId of succs) {
      const waiting = this.pendingDeps.get(taskId);
      // Already failed through another dependency.
      if (!waiting) continue;

      if (settlement.state === "failed") {
        this.pendingDeps.delete(taskId);
        this.hooks.onDependencyFailed(waiting.task, handle, settlement.error);
        continue;
      }

      waiting.remaining--;
      if (waiting.remaining === 0) {
        this.pendingDeps.delete(taskId);
        this.hooks.onReady(waiting.task);
      }
    }
  }
}
