// =============================================================================
// Parallel map / reduce — Fan-out and fan-in built on TaskEngine.submit
// =============================================================================

import { EmptyInputError, InvalidSubmissionError } from "../errors.js";
import type { Awaitable, FutureHandle } from "../engine/future-handle.js";
import { isHandleOf } from "../engine/future-handle.js";
import { remote, type RemoteFunction } from "../engine/remote-function.js";
import type { TaskEngine } from "../engine/task-engine.js";

function assertInputs(operation: string, inputs: unknown): asserts inputs is readonly unknown[] {
  if (!Array.isArray(inputs)) {
    throw new InvalidSubmissionError(`${operation} expects an array of inputs`);
  }
}

function toHandle<T>(engine: TaskEngine, value: Awaitable<T>): FutureHandle<T> {
  if (isHandleOf(value)) return value;
  const identity = remote((v: T) => v, { name: "identity" });
  return engine.submit(identity, [value]);
}

/**
 * Submits one task per input and returns their handles in input order.
 * Does not wait for any of them.
 *
 * @example
 * ```ts
 * const increment = remote((x: number) => x + 1);
 * const handles = mapParallel(engine, increment, [1, 2, 3]);
 * await engine.getMany(handles); // [2, 3, 4]
 * ```
 */
export function mapParallel<T, R>(
  engine: TaskEngine,
  payload: RemoteFunction<[T], R>,
  inputs: readonly Awaitable<T>[],
): FutureHandle<R>[] {
  assertInputs("mapParallel", inputs);
  engine.validateSubmission(payload, inputs);
  return inputs.map((input) => engine.submit(payload, [input]));
}

/**
 * Left fold as a chain of tasks: each combine depends on the previous one,
 * so n inputs take n - 1 sequential executions.
 *
 * @throws {EmptyInputError} when `inputs` is empty.
 */
export function reduceParallel<T>(
  engine: TaskEngine,
  combine: RemoteFunction<[T, T], T>,
  inputs: readonly Awaitable<T>[],
): FutureHandle<T> {
  assertInputs("reduceParallel", inputs);
  if (inputs.length === 0) throw new EmptyInputError("reduceParallel");
  engine.validateSubmission(combine, inputs);

  const [first, ...rest] = inputs;
  if (rest.length === 0) return toHandle(engine, first);

  let acc: Awaitable<T> = first;
  for (const next of rest) {
    acc = engine.submit(combine, [acc, next]);
  }
  return toHandle(engine, acc);
}

/**
 * Balanced pairwise fold: each level combines adjacent pairs, carrying an odd
 * last element up unchanged, so n inputs take ⌈log2 n⌉ levels. `combine` must
 * be associative and commutative.
 *
 * @throws {EmptyInputError} when `inputs` is empty.
 */
export function reduceParallelTree<T>(
  engine: TaskEngine,
  combine: RemoteFunction<[T, T], T>,
  inputs: readonly Awaitable<T>[],
): FutureHandle<T> {
  assertInputs("reduceParallelTree", inputs);
  if (inputs.length === 0) throw new EmptyInputError("reduceParallelTree");
  engine.validateSubmission(combine, inputs);

  let level: Awaitable<T>[] = [...inputs];
  while (level.length > 1) {
    const next: Awaitable<T>[] = [];
    for (let i = 0; i + 1 < level.length; i += 2) {
      next.push(engine.submit(combine, [level[i], level[i + 1]]));
    }
    if (level.length % 2 === 1) next.push(level[level.length - 1]);
    level = next;
  }
  return toHandle(engine, level[0]);
}
