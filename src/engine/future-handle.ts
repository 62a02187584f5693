// =============================================================================
// FutureHandle<T> — Opaque, generation-checked reference into a FutureStore
// =============================================================================

/**
 * Reference to the eventual result of one submitted task.
 *
 * A handle is an `(index, generation)` pair into the slot table of the store
 * that minted it, plus that store's owner token. It holds no reference to the
 * task or to the value, so tasks and the futures they depend on never form
 * object cycles. The type parameter is phantom and only flows into `get`.
 */
export class FutureHandle<T> {
  /** Phantom marker for the value type; never assigned at runtime. */
  declare readonly __value?: T;

  constructor(
    readonly owner: symbol,
    readonly index: number,
    readonly generation: number,
  ) {
    Object.freeze(this);
  }

  get id(): string {
    return `${this.index}:${this.generation}`;
  }

  toString(): string {
    return `Future(${this.id})`;
  }
}

export function isFutureHandle(value: unknown): value is FutureHandle<unknown> {
  return value instanceof FutureHandle;
}

export function isHandleOf<T>(value: Awaitable<T>): value is FutureHandle<T> {
  return value instanceof FutureHandle;
}

/** An argument slot: either the literal value or a future that resolves to it. */
export type Awaitable<T> = T | FutureHandle<T>;

/** Maps a payload's parameter tuple onto what `submit` accepts for it. */
export type RemoteArgs<A extends readonly unknown[]> = {
  [K in keyof A]: Awaitable<A[K]>;
};
