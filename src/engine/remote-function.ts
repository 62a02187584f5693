// =============================================================================
// RemoteFunction — Payload references accepted by TaskEngine.submit
// =============================================================================

export const REMOTE_MARKER: unique symbol = Symbol("parafold.remote");

/**
 * A function registered for execution on an engine's worker pool.
 *
 * Plain callables are not accepted by `submit`; wrap them with {@link remote}.
 * The marker keeps the two apart for the type checker, and `submit` checks it
 * again at runtime for untyped callers.
 */
export interface RemoteFunction<A extends readonly unknown[], R> {
  readonly [REMOTE_MARKER]: true;
  readonly name: string;
  readonly fn: (...args: A) => R | PromiseLike<R>;
}

export interface RemoteOptions {
  /** Name used in events, logs and error messages (default: the function's own name). */
  name?: string;
}

/**
 * Wraps a payload so it can be submitted to a {@link TaskEngine}.
 *
 * @example
 * ```ts
 * const add = remote(async (a: number, b: number) => a + b);
 * const sum = engine.submit(add, [1, 2]);
 * await engine.get(sum); // 3
 * ```
 */
export function remote<A extends readonly unknown[], R>(
  fn: (...args: A) => R | PromiseLike<R>,
  options: RemoteOptions = {},
): RemoteFunction<A, R> {
  if (typeof fn !== "function") {
    throw new TypeError("remote() expects a function");
  }
  return Object.freeze({
    [REMOTE_MARKER]: true as const,
    name: options.name ?? (fn.name || "anonymous"),
    fn,
  });
}

export function isRemoteFunction(value: unknown): value is RemoteFunction<readonly unknown[], unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    REMOTE_MARKER in value &&
    value[REMOTE_MARKER] === true &&
    "fn" in value &&
    typeof value.fn === "function"
  );
}
