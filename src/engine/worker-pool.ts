// =============================================================================
// WorkerPool<T, R> — Fixed-size async pool pulling jobs from a FIFO ready queue
// =============================================================================

import type { WorkerPoolMetrics } from "../domain/engine.schema.js";
import { ReadyQueue } from "./ready-queue.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface JobInfo {
  workerId: number;
  durationMs: number;
}

export interface WorkerPoolHooks<T, R> {
  onStart?(job: T, workerId: number): void;
  onComplete(job: T, result: R, info: JobInfo): void;
  onError(job: T, error: unknown, info: JobInfo): void;
  /**
   * A hook threw. The throwing worker is retired; the pool keeps running on
   * the remaining slots. `job` is set when the worker died before running it.
   */
  onFatal(error: unknown, workerId: number, job: T | null): void;
}

type WorkerState = "idle" | "busy" | "dead";

interface WorkerSlot<T> {
  readonly id: number;
  state: WorkerState;
  currentJob: T | null;
  wakeResolve: (() => void) | null;
}

type Outcome<R> = { ok: true; result: R } | { ok: false; error: unknown };

// ── Implementation ───────────────────────────────────────────────────────────

export class WorkerPool<T, R> {
  private static readonly MAX_METRICS_ENTRIES = 1000;

  private readonly queue = new ReadyQueue<T>();
  private readonly workers = new Map<number, WorkerSlot<T>>();
  private readonly loops: Promise<void>[] = [];
  private readonly latencies: number[] = [];

  private draining = false;
  private retired = false;
  private drainWaiters: Array<() => void> = [];
  private totalCompleted = 0;
  private totalFailed = 0;

  constructor(
    private readonly executor: (job: T) => R | PromiseLike<R>,
    readonly size: number,
    private readonly hooks: WorkerPoolHooks<T, R>,
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${size}`);
    }
    for (let id = 0; id < size; id++) {
      this.spawnWorker(id);
    }
  }

  // ── Public API ─────────────────────────────────────────────────────────────

  get queueDepth(): number {
    return this.queue.size;
  }

  /** Appends a runnable job; returns immediately. */
  enqueue(job: T): void {
    if (this.retired) throw new Error("Pool has been drained, cannot enqueue");
    this.queue.push(job);
    this.wakeOneIdleWorker();
  }

  /** Removes every job still waiting for a slot and hands them back. */
  takeQueued(): T[] {
    const jobs = this.queue.clear();
    this.checkDrained();
    return jobs;
  }

  /** Waits for the queue to empty and every slot to go idle, then retires the workers. */
  async drain(): Promise<void> {
    this.draining = true;

    if (!this.retired && !(this.allIdle() && this.queue.size === 0)) {
      await new Promise<void>((resolve) => {
        this.drainWaiters.push(resolve);
      });
    }

    this.retire();
    await Promise.all(this.loops);
  }

  getMetrics(): WorkerPoolMetrics {
    let active = 0;
    let idle = 0;
    for (const slot of this.workers.values()) {
      if (slot.state === "busy") active++;
      else if (slot.state === "idle") idle++;
    }

    const sorted = [...this.latencies].sort((a, b) => a - b);
    const p = (pct: number) => {
      if (sorted.length === 0) return 0;
      const idx = Math.min(Math.floor((pct / 100) * sorted.length), sorted.length - 1);
      return sorted[idx];
    };

    return {
      poolSize: this.size,
      activeWorkers: active,
      idleWorkers: idle,
      queueDepth: this.queue.size,
      totalCompleted: this.totalCompleted,
      totalFailed: this.totalFailed,
      latencyP50Ms: p(50),
      latencyP95Ms: p(95),
      latencyP99Ms: p(99),
      utilizationRatio: this.size > 0 ? active / this.size : 0,
    };
  }

  // ── Worker lifecycle ───────────────────────────────────────────────────────

  private spawnWorker(id: number): void {
    const slot: WorkerSlot<T> = { id, state: "idle", currentJob: null, wakeResolve: null };
    this.workers.set(id, slot);
    this.loops.push(
      this.workerLoop(slot).catch((error: unknown) => {
        const stranded = slot.currentJob;
        slot.state = "dead";
        slot.currentJob = null;
        this.hooks.onFatal(error, id, stranded);
        this.checkDrained();
      }),
    );
  }

  private async workerLoop(slot: WorkerSlot<T>): Promise<void> {
    while (slot.state !== "dead") {
      const job = this.queue.shift();

      if (job === undefined) {
        slot.state = "idle";
        this.checkDrained();

        // Park until woken
        await new Promise<void>((resolve) => {
          slot.wakeResolve = resolve;
        });
        continue;
      }

      slot.state = "busy";
      slot.currentJob = job;
      this.hooks.onStart?.(job, slot.id);

      const startMs = performance.now();
      const outcome = await this.run(job);
      const info: JobInfo = { workerId: slot.id, durationMs: performance.now() - startMs };

      this.recordLatency(info.durationMs);
      slot.currentJob = null;

      if (outcome.ok) {
        this.totalCompleted++;
        this.hooks.onComplete(job, outcome.result, info);
      } else {
        this.totalFailed++;
        this.hooks.onError(job, outcome.error, info);
      }
    }
  }

  /** Runs one job; a synchronous throw and a rejection are both captured. */
  private async run(job: T): Promise<Outcome<R>> {
    try {
      return { ok: true, result: await this.executor(job) };
    } catch (error) {
      return { ok: false, error };
    }
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private recordLatency(durationMs: number): void {
    this.latencies.push(durationMs);
    if (this.latencies.length > WorkerPool.MAX_METRICS_ENTRIES) {
      this.latencies.splice(0, this.latencies.length - WorkerPool.MAX_METRICS_ENTRIES);
    }
  }

  private wakeOneIdleWorker(): void {
    for (const slot of this.workers.values()) {
      if (slot.state === "idle" && slot.wakeResolve) {
        const wake = slot.wakeResolve;
        slot.wakeResolve = null;
        wake();
        return;
      }
    }
  }

  private allIdle(): boolean {
    for (const slot of this.workers.values()) {
      if (slot.state === "busy") return false;
    }
    return true;
  }

  private checkDrained(): void {
    if (!this.draining || this.queue.size > 0 || !this.allIdle()) return;
    for (const resolve of this.drainWaiters.splice(0)) resolve();
  }

  private retire(): void {
    this.retired = true;
    for (const slot of this.workers.values()) {
      slot.state = "dead";
      if (slot.wakeResolve) {
        const wake = slot.wakeResolve;
        slot.wakeResolve = null;
        wake();
      }
    }
  }
}
