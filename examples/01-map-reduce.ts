// =============================================================================
// 01 — Parallel map, chain reduce and tree reduce on one engine
// =============================================================================
//
// Fans out an increment over a list, then folds 1..8 with a slow `add` both
// as a chain (7 sequential steps) and as a tree (3 levels), printing timings.
//
// Usage: npx tsx examples/01-map-reduce.ts

import {
  TaskEngine,
  createConsoleLogger,
  mapParallel,
  reduceParallel,
  reduceParallelTree,
  remote,
} from "../src/index.js";

const LATENCY_MS = 100;

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const increment = remote(async (x: number) => {
  await sleep(LATENCY_MS);
  return x + 1;
}, { name: "increment" });

const add = remote(async (a: number, b: number) => {
  await sleep(LATENCY_MS);
  return a + b;
}, { name: "add" });

async function timed<T>(label: string, run: () => Promise<T>): Promise<T> {
  const start = performance.now();
  const value = await run();
  console.log(`${label}: ${JSON.stringify(value)} in ${Math.round(performance.now() - start)}ms`);
  return value;
}

async function main(): Promise<void> {
  const engine = new TaskEngine({
    poolSize: 4,
    name: "example",
    logger: createConsoleLogger({ minLevel: "info" }),
  });

  const inputs = [1, 2, 3, 4, 5, 6, 7, 8];

  await timed("map increment", () => engine.getMany(mapParallel(engine, increment, inputs.slice(0, 5))));
  await timed("chain reduce", () => engine.get(reduceParallel(engine, add, inputs)));
  await timed("tree reduce", () => engine.get(reduceParallelTree(engine, add, inputs)));

  console.log(engine.getMetrics());
  await engine.shutdown();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
