import { describe, it, expect, vi, afterEach } from 'vitest';
import { TaskEngine, createEngine } from '../task-engine.js';
import { remote } from '../remote-function.js';
import {
  EngineClosedError,
  InvalidSubmissionError,
  TaskExecutionError,
  UnknownFutureError,
  ValidationError,
} from '../../errors.js';
import type { LogEntry } from '../../logging.js';
import { EngineMetricsSchema, FutureStateSchema, type EngineEvent } from '../../domain/engine.schema.js';
import { createGate, delay, recordEvents } from '../../__tests__/helpers/test-utils.js';

const engines: TaskEngine[] = [];

function engine(poolSize = 4): TaskEngine {
  const e = new TaskEngine({ poolSize, name: 'test' });
  engines.push(e);
  return e;
}

afterEach(async () => {
  await Promise.all(engines.splice(0).map((e) => e.shutdown()));
});

const add = remote((a: number, b: number) => a + b, { name: 'add' });
const increment = remote((x: number) => x + 1, { name: 'increment' });

describe('TaskEngine configuration', () => {
  it('applies schema defaults', async () => {
    const e = createEngine();
    expect(e.config).toEqual({ poolSize: 4, name: 'engine' });
    expect(e.getMetrics().poolSize).toBe(4);
    await e.shutdown();
  });

  it('rejects an invalid pool size', () => {
    expect(() => new TaskEngine({ poolSize: 0 })).toThrow(ValidationError);
    try {
      new TaskEngine({ poolSize: 1.5 });
    } catch (e) {
      expect(e).toBeInstanceOf(ValidationError);
      if (e instanceof ValidationError) {
        expect(e.field).toBe('poolSize');
        expect(e.code).toBe('VALIDATION_ERROR');
      }
    }
  });
});

describe('TaskEngine submission', () => {
  it('returns a pending handle without running the payload', async () => {
    const e = engine();
    const fn = vi.fn((x: number) => x * 2);
    const double = remote(fn, { name: 'double' });

    const h = e.submit(double, [21]);

    expect(e.state(h)).toBe('pending');
    expect(fn).not.toHaveBeenCalled();
    await expect(e.get(h)).resolves.toBe(42);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('does not block on a saturated pool or deep dependencies', async () => {
    const e = engine(1);
    const gate = createGate();
    const blocker = remote(async () => {
      await gate.promise;
      return 0;
    });

    let h = e.submit(blocker, []);
    for (let i = 0; i < 500; i++) h = e.submit(increment, [h]);

    expect(e.state(h)).toBe('pending');
    expect(e.getMetrics().waitingTasks).toBe(500);

    gate.open();
    await expect(e.get(h)).resolves.toBe(500);
  });

  it('passes literal and future arguments positionally', async () => {
    const e = engine();
    const concat = remote((a: string, b: number, c: string) => `${a}-${b}-${c}`);

    const n = e.submit(add, [40, 2]);
    const out = e.submit(concat, ['x', n, 'y']);

    await expect(e.get(out)).resolves.toBe('x-42-y');
  });

  it('rejects payloads that are not remote functions', () => {
    const e = engine();
    const plain = (x: number) => x;

    expect(() => e.validateSubmission(plain, [1])).toThrow(InvalidSubmissionError);
    expect(() => e.validateSubmission({ name: 'fake', fn: plain }, [1])).toThrow('Payload must be created with remote()');
  });

  it('rejects arguments that are not an array', () => {
    const e = engine();

    expect(() => e.validateSubmission(increment, 1)).toThrow('Arguments for "increment" must be an array');
  });

  it('rejects handles from another engine before allocating anything', () => {
    const e = engine();
    const other = engine();
    const foreign = other.submit(increment, [1]);

    expect(() => e.submit(increment, [foreign])).toThrow(UnknownFutureError);
    expect(e.getMetrics().submittedTasks).toBe(0);
  });

  it('rejects released handles', async () => {
    const e = engine();
    const h = e.submit(increment, [1]);
    await e.get(h);
    e.release(h);

    expect(() => e.submit(increment, [h])).toThrow(UnknownFutureError);
    await expect(e.get(h)).rejects.toBeInstanceOf(UnknownFutureError);
  });

  it('refuses submissions once shut down', async () => {
    const e = engine();
    await e.shutdown();

    expect(e.isClosed).toBe(true);
    expect(() => e.submit(increment, [1])).toThrow(EngineClosedError);
  });
});

describe('TaskEngine execution', () => {
  it('never starts a task before its dependencies complete', async () => {
    const e = engine();
    const { events } = recordEvents(e);
    const slow = remote(async (x: number) => {
      await delay(30);
      return x;
    }, { name: 'slow' });

    const a = e.submit(slow, [1]);
    const b = e.submit(slow, [2]);
    const sum = e.submit(add, [a, b]);
    await e.get(sum);

    const seq = events.flatMap((ev) =>
      ev.type === 'task:started' || ev.type === 'task:completed' ? [`${ev.type}:${ev.taskId}`] : [],
    );
    const sumStarted = seq.indexOf(`task:started:${sum.id}`);
    expect(seq.indexOf(`task:completed:${a.id}`)).toBeLessThan(sumStarted);
    expect(seq.indexOf(`task:completed:${b.id}`)).toBeLessThan(sumStarted);
  });

  it('dispatches independent tasks in submission order', async () => {
    const e = engine(1);
    const { ofType } = recordEvents(e);
    const handles = [1, 2, 3, 4, 5].map((x) => e.submit(increment, [x]));

    await e.getMany(handles);

    expect(ofType('task:started').map((ev) => ev.taskId)).toEqual(handles.map((h) => h.id));
  });

  it('caps concurrent execution at the pool size', async () => {
    const e = engine(3);
    let active = 0;
    let maxActive = 0;
    const work = remote(async (x: number) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await delay(10);
      active--;
      return x;
    });

    const handles = Array.from({ length: 12 }, (_, i) => e.submit(work, [i]));
    await e.getMany(handles);

    expect(maxActive).toBe(3);
  });

  it('reports the lifecycle of a task', async () => {
    const e = engine(1);
    const gate = createGate();
    const held = remote(async () => {
      await gate.promise;
      return 1;
    });

    const first = e.submit(held, []);
    const second = e.submit(increment, [first]);
    await delay(0);

    expect(e.status(first)).toBe('executing');
    expect(e.status(second)).toBe('waiting');

    gate.open();
    await e.get(second);
    expect(e.status(first)).toBe('resolved');
    expect(e.status(second)).toBe('resolved');
  });
});

describe('TaskEngine failures', () => {
  it('records a thrown Error on the future, surfaced only at get', async () => {
    const e = engine();
    const error = new Error('payload exploded');
    const explode = remote((_: number): number => {
      throw error;
    });

    const bad = e.submit(explode, [1]);
    const good = e.submit(increment, [1]);

    await expect(e.get(bad)).rejects.toBe(error);
    await expect(e.get(good)).resolves.toBe(2);
    expect(e.state(bad)).toBe('failed');
  });

  it('wraps non-Error rejections in TaskExecutionError', async () => {
    const e = engine();
    const reject = remote(async (): Promise<number> => {
      throw 'plain string';
    }, { name: 'reject' });

    const h = e.submit(reject, []);
    const error = await e.get(h).then(
      () => undefined,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(TaskExecutionError);
    if (error instanceof TaskExecutionError) {
      expect(error.code).toBe('TASK_EXECUTION_ERROR');
      expect(error.thrown).toBe('plain string');
      expect(error.payloadName).toBe('reject');
      expect(error.message).toBe(`Task "${h.id}" (reject) failed: plain string`);
    }
  });

  it('fails transitive dependents with the original error without running them', async () => {
    const e = engine();
    const { ofType } = recordEvents(e);
    const error = new Error('root cause');
    const root = remote(async (): Promise<number> => {
      await delay(5);
      throw error;
    });
    const spy = vi.fn((x: number) => x + 1);
    const step = remote(spy, { name: 'step' });

    const a = e.submit(root, []);
    const b = e.submit(step, [a]);
    const c = e.submit(step, [b]);
    const d = e.submit(add, [c, 1]);

    await expect(e.get(d)).rejects.toBe(error);
    await expect(e.get(b)).rejects.toBe(error);
    expect(spy).not.toHaveBeenCalled();
    expect(e.status(c)).toBe('failed');
    expect(ofType('task:skipped').map((ev) => ev.taskId)).toEqual([b.id, c.id, d.id]);
    expect(e.getMetrics().skippedTasks).toBe(3);
  });

  it('fails a submission on an already-failed future immediately', async () => {
    const e = engine();
    const error = new Error('early');
    const fail = remote((): number => {
      throw error;
    });
    const a = e.submit(fail, []);
    await e.get(a).catch(() => undefined);

    const b = e.submit(increment, [a]);

    expect(e.state(b)).toBe('failed');
    await expect(e.get(b)).rejects.toBe(error);
  });
});

describe('TaskEngine teardown', () => {
  it('shutdown waits for every submitted task', async () => {
    const e = new TaskEngine({ poolSize: 2 });
    const { ofType } = recordEvents(e);
    const slow = remote(async (x: number) => {
      await delay(20);
      return x;
    });

    const a = e.submit(slow, [1]);
    const b = e.submit(add, [a, 1]);
    const first = e.shutdown();
    const second = e.shutdown();

    expect(second).toBe(first);
    await first;
    expect(e.state(b)).toBe('ready');
    await expect(e.get(b)).resolves.toBe(2);
    expect(ofType('engine:shutdown')).toEqual([{ type: 'engine:shutdown', pendingTasks: 2 }]);
    expect(ofType('engine:drained')).toEqual([{ type: 'engine:drained', totalCompleted: 2, totalFailed: 0 }]);
  });

  it('stops delivering events to unsubscribed listeners', async () => {
    const e = engine();
    const listener = vi.fn();
    const stop = e.on(listener);
    stop();

    await e.get(e.submit(increment, [1]));
    expect(listener).not.toHaveBeenCalled();
  });
});

describe('TaskEngine logging', () => {
  it('logs one entry per event through the injected logger', async () => {
    const entries: LogEntry[] = [];
    const e = new TaskEngine({ poolSize: 1, name: 'logged', logger: (entry) => entries.push(entry) });

    const h = e.submit(increment, [1]);
    await e.get(h);
    await e.shutdown();

    expect(entries.map((entry) => [entry.level, entry.event])).toEqual([
      ['debug', 'task:submitted'],
      ['debug', 'task:ready'],
      ['debug', 'task:started'],
      ['debug', 'task:completed'],
      ['info', 'engine:shutdown'],
      ['info', 'engine:drained'],
    ]);
    expect(entries.every((entry) => entry.engine === 'logged')).toBe(true);
    expect(entries[0].data).toEqual({ taskId: h.id, payload: 'increment', dependencies: 0 });
  });

  it('logs failures at warn level', async () => {
    const entries: LogEntry[] = [];
    const e = new TaskEngine({ poolSize: 1, logger: (entry) => entries.push(entry) });
    const fail = remote((): number => {
      throw new Error('nope');
    }, { name: 'fail' });

    const a = e.submit(fail, []);
    const b = e.submit(increment, [a]);
    await e.get(b).catch(() => undefined);
    await e.shutdown();

    const warnings = entries.filter((entry) => entry.level === 'warn');
    expect(warnings.map((entry) => entry.event)).toEqual(['task:failed', 'task:skipped']);
    expect(warnings[1].data).toEqual({
      taskId: b.id,
      payload: 'increment',
      dependencyId: a.id,
      error: { name: 'Error', message: 'nope' },
    });
  });
});

describe('TaskEngine metrics', () => {
  it('reports state and metrics in the published shapes', async () => {
    const e = engine(2);
    const h = e.submit(increment, [1]);

    expect(FutureStateSchema.parse(e.state(h))).toBe('pending');
    await e.get(h);

    const metrics = EngineMetricsSchema.strict().parse(e.getMetrics());
    expect(metrics.submittedTasks).toBe(1);
    expect(metrics.totalCompleted).toBe(1);
    expect(metrics.waitingTasks).toBe(0);
  });
});

describe('TaskEngine listener failures', () => {
  it('a listener throwing on submission leaves no future pending', async () => {
    const e = new TaskEngine({ poolSize: 1 });
    const error = new Error('listener');
    const stop = e.on((event) => {
      if (event.type === 'task:submitted') throw error;
    });

    expect(() => e.submit(increment, [1])).toThrow(error);
    stop();

    expect(e.getMetrics().submittedTasks).toBe(0);
    await expect(e.shutdown()).resolves.toBeUndefined();
  });

  it('a listener throwing on completion fails the tasks left behind', async () => {
    const e = new TaskEngine({ poolSize: 1 });
    const error = new Error('listener');
    let thrown = false;
    e.on((event) => {
      if (event.type === 'task:completed' && !thrown) {
        thrown = true;
        throw error;
      }
    });

    const a = e.submit(increment, [1]);
    const b = e.submit(increment, [2]);
    const c = e.submit(add, [b, 1]);

    await expect(e.get(a)).resolves.toBe(2);
    await expect(e.get(b)).rejects.toBe(error);
    await expect(e.get(c)).rejects.toBe(error);
    await expect(e.shutdown()).rejects.toBe(error);
    expect(() => e.submit(increment, [3])).toThrow(error);
  });

  it('fails a task whose worker died before running it', async () => {
    const e = new TaskEngine({ poolSize: 1 });
    const error = new Error('listener');
    e.on((event) => {
      if (event.type === 'task:started') throw error;
    });

    const a = e.submit(increment, [1]);

    await expect(e.get(a)).rejects.toBe(error);
    expect(e.status(a)).toBe('failed');
    await expect(e.shutdown()).rejects.toBe(error);
  });

  it('logs the fatal error', async () => {
    const entries: LogEntry[] = [];
    const e = new TaskEngine({ poolSize: 1, name: 'fatal', logger: (entry) => entries.push(entry) });
    const error = new Error('listener');
    e.on((event) => {
      if (event.type === 'task:started') throw error;
    });

    await e.get(e.submit(increment, [1])).catch(() => undefined);
    await e.shutdown().catch(() => undefined);

    const fatal = entries.filter((entry) => entry.event === 'engine:fatal');
    expect(fatal).toHaveLength(1);
    expect(fatal[0]).toMatchObject({ level: 'error', engine: 'fatal', data: { workerId: 0, error: 'listener' } });
  });

  it('announces shutdown once even when a listener throws on it', async () => {
    const e = new TaskEngine({ poolSize: 1 });
    const error = new Error('listener');
    const listener = vi.fn((event: EngineEvent) => {
      if (event.type === 'engine:shutdown') throw error;
    });
    e.on(listener);

    const first = e.shutdown();
    const second = e.shutdown();

    expect(second).toBe(first);
    await expect(first).rejects.toBe(error);
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
