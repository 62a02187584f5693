// =============================================================================
// FutureStore — Arena of future records addressed by generation-checked handles
// =============================================================================

import type { FutureState } from "../domain/engine.schema.js";
import { DoubleResolutionError, InvalidSubmissionError, UnknownFutureError } from "../errors.js";
import { FutureHandle } from "./future-handle.js";

// ── Types ────────────────────────────────────────────────────────────────────

export type Settlement =
  | { readonly state: "ready"; readonly value: unknown }
  | { readonly state: "failed"; readonly error: Error };

export type SettlementListener = (handle: FutureHandle<unknown>, settlement: Settlement) => void;

interface Waiter {
  readonly resolve: (value: unknown) => void;
  readonly reject: (error: Error) => void;
}

type FutureRecord =
  | { state: "pending"; waiters: Waiter[]; listeners: SettlementListener[] }
  | Settlement;

interface Slot {
  generation: number;
  record: FutureRecord | null;
}

interface Notification {
  readonly handle: FutureHandle<unknown>;
  readonly settlement: Settlement;
  readonly listeners: readonly SettlementListener[];
}

// ── Implementation ───────────────────────────────────────────────────────────

export class FutureStore {
  readonly token: symbol;
  private readonly slots: Slot[] = [];
  private readonly freeSlots: number[] = [];
  private readonly notifications: Notification[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private notifying = false;
  private pending = 0;

  constructor(name = "futures") {
    this.token = Symbol(name);
  }

  get pendingCount(): number {
    return this.pending;
  }

  allocate<T>(): FutureHandle<T> {
    const record: FutureRecord = { state: "pending", waiters: [], listeners: [] };
    this.pending++;

    const reused = this.freeSlots.pop();
    if (reused !== undefined) {
      const slot = this.slots[reused];
      slot.record = record;
      return new FutureHandle<T>(this.token, reused, slot.generation);
    }

    this.slots.push({ generation: 0, record });
    return new FutureHandle<T>(this.token, this.slots.length - 1, 0);
  }

  resolve<T>(handle: FutureHandle<T>, value: T): void {
    this.settle(handle, { state: "ready", value });
  }

  fail(handle: FutureHandle<unknown>, error: Error): void {
    this.settle(handle, { state: "failed", error });
  }

  state(handle: FutureHandle<unknown>): FutureState {
    return this.lookup(handle).state;
  }

  /** Synchronous read of a Ready future. */
  valueOf<T>(handle: FutureHandle<T>): T {
    const record = this.lookup(handle);
    if (record.state !== "ready") {
      throw new InvalidSubmissionError(`Future "${handle.id}" is ${record.state}, not ready`);
    }
    // Handles are only minted by allocate<T>(), so a ready slot holds a T.
    return record.value as T;
  }

  errorOf(handle: FutureHandle<unknown>): Error | undefined {
    const record = this.lookup(handle);
    return record.state === "failed" ? record.error : undefined;
  }

  async get<T>(handle: FutureHandle<T>): Promise<T> {
    const record = this.lookup(handle);
    if (record.state === "ready") return this.valueOf(handle);
    if (record.state === "failed") throw record.error;

    const value = await new Promise<unknown>((resolve, reject) => {
      record.waiters.push({ resolve, reject });
    });
    // Same invariant as valueOf: the waiter was registered on a slot allocated as T.
    return value as T;
  }

  getMany<T>(handles: readonly FutureHandle<T>[]): Promise<T[]> {
    return Promise.all(handles.map((handle) => this.get(handle)));
  }

  /**
   * Registers a listener for the settlement of `handle`. Listeners run inside
   * the store's notification loop, never re-entrantly. A listener subscribed to
   * an already-settled future is notified on the next drain, which starts
   * immediately when no drain is in progress.
   */
  subscribe(handle: FutureHandle<unknown>, listener: SettlementListener): void {
    const record = this.lookup(handle);
    if (record.state === "pending") {
      record.listeners.push(listener);
      return;
    }
    this.notifications.push({ handle, settlement: record, listeners: [listener] });
    this.drainNotifications();
  }

  /** Frees the slot of a settled future; the handle and its copies become stale. */
  release(handle: FutureHandle<unknown>): void {
    const record = this.lookup(handle);
    if (record.state === "pending") {
      throw new InvalidSubmissionError(`Cannot release pending future "${handle.id}"`);
    }
    const slot = this.slots[handle.index];
    slot.record = null;
    slot.generation++;
    this.freeSlots.push(handle.index);
  }

  /** Resolves once no future is pending. */
  whenSettled(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Throws {@link UnknownFutureError} for foreign or released handles. */
  assertKnown(handle: FutureHandle<unknown>): void {
    this.lookup(handle);
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private lookup(handle: FutureHandle<unknown>): FutureRecord {
    if (handle.owner !== this.token) {
      throw new UnknownFutureError(handle.id, "handle belongs to another engine");
    }
    const slot = this.slots[handle.index];
    if (!slot || slot.generation !== handle.generation || slot.record === null) {
      throw new UnknownFutureError(handle.id, "handle has been released");
    }
    return slot.record;
  }

  private settle(handle: FutureHandle<unknown>, settlement: Settlement): void {
    const record = this.lookup(handle);
    if (record.state !== "pending") {
      throw new DoubleResolutionError(handle.id, record.state);
    }

    this.slots[handle.index].record = settlement;
    this.pending--;

    for (const waiter of record.waiters) {
      if (settlement.state === "ready") waiter.resolve(settlement.value);
      else waiter.reject(settlement.error);
    }

    if (record.listeners.length > 0) {
      this.notifications.push({ handle, settlement, listeners: record.listeners });
    }
    this.drainNotifications();
  }

  /**
   * Delivers queued notifications in FIFO order. Settlements made by listeners
   * are appended to the same queue, so transitive propagation runs iteratively.
   * A throwing listener does not stop delivery to the rest; the first error is
   * rethrown once the queue is empty.
   */
  private drainNotifications(): void {
    if (this.notifying) return;
    this.notifying = true;
    let failure: { error: unknown } | undefined;

    let next = this.notifications.shift();
    while (next) {
      for (const listener of next.listeners) {
        try {
          listener(next.handle, next.settlement);
        } catch (error) {
          failure ??= { error };
        }
      }
      next = this.notifications.shift();
    }
    this.notifying = false;

    if (this.pending === 0) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
    if (failure) throw failure.error;
  }
}
