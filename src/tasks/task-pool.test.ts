import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TaskPool, ALL_TASKS } from './task-pool.js';
import { MicrotaskScheduler, type Operation } from './scheduler.js';
import { Logger } from '../resiliency/logger.js';
import { InvalidLimitError, PoolLimitError } from '../utils/errors.js';

/** Let every queued microtask run */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** An operation that runs until release() is called */
function gate(): { operation: Operation<string>; release: (value: string) => void } {
  let release: (value: string) => void = () => undefined;
  const done = new Promise<string>((resolve) => {
    release = resolve;
  });
  return { operation: () => done, release: (value) => release(value) };
}

describe('TaskPool', () => {
  let logger: Logger;
  let scheduler: MicrotaskScheduler;

  beforeEach(() => {
    logger = new Logger('task-pool', { level: 'debug', console: false });
    scheduler = new MicrotaskScheduler({ logger });
  });

  function createPool(maxTasks: number | null = null, defaultLimit: number | null = null): TaskPool {
    return new TaskPool({ maxTasks, defaultLimit, scheduler, logger });
  }

  describe('limits', () => {
    it('starts without limits', () => {
      const pool = createPool();
      expect(pool.getLimit(ALL_TASKS)).toBeUndefined();
      expect(pool.getLimit('uploads')).toBeUndefined();
    });

    it('uses maxTasks as the limit on all tasks', () => {
      const pool = createPool(8);
      expect(pool.getLimit(ALL_TASKS)).toBe(8);
      expect(pool.getLimit('uploads')).toBeUndefined();
    });

    it('applies the default limit to groups without their own', () => {
      const pool = createPool(null, 2);
      pool.setLimit('uploads', 5);

      expect(pool.getLimit('uploads')).toBe(5);
      expect(pool.getLimit('downloads')).toBe(2);
      expect(pool.getLimit(ALL_TASKS)).toBeUndefined();
      expect(pool.defaultLimit).toBe(2);
    });

    it('clears a limit with clearLimit or null', () => {
      const pool = createPool();
      pool.setLimit('uploads', 1);
      pool.clearLimit('uploads');
      expect(pool.getLimit('uploads')).toBeUndefined();

      pool.setLimit('uploads', 1);
      pool.setLimit('uploads', null);
      expect(pool.getLimit('uploads')).toBeUndefined();
    });

    it('rejects negative and fractional limits', () => {
      const pool = createPool();
      expect(() => pool.setLimit('uploads', -1)).toThrow(InvalidLimitError);
      expect(() => pool.setLimit('uploads', 1.5)).toThrow(InvalidLimitError);
      expect(() => createPool(-2)).toThrow('Invalid task limit for group "all tasks": -2');
      expect(() => createPool(null, -1)).toThrow('Invalid task limit for group "default": -1');
    });

    it('takes limits from the environment when not given', () => {
      vi.stubEnv('SESSION_SERVICES_MAX_TASKS', '3');
      vi.stubEnv('SESSION_SERVICES_DEFAULT_GROUP_LIMIT', '1');
      try {
        const pool = new TaskPool({ scheduler, logger });
        expect(pool.getLimit(ALL_TASKS)).toBe(3);
        expect(pool.getLimit('uploads')).toBe(1);
      } finally {
        vi.unstubAllEnvs();
      }
    });
  });

  describe('spawn', () => {
    it('counts running operations per group until they settle', async () => {
      const pool = createPool();
      const upload = gate();

      const handle = pool.spawn(['uploads', 'user:alice'], upload.operation, 'upload-1');

      expect(pool.getTaskCount('uploads')).toBe(1);
      expect(pool.getTaskCount('user:alice')).toBe(1);
      expect(pool.getTaskCount(ALL_TASKS)).toBe(1);
      expect(pool.size).toBe(1);

      upload.release('stored');
      await expect(handle.result()).resolves.toBe('stored');

      expect(pool.getTaskCount('uploads')).toBe(0);
      expect(pool.getTaskCount('user:alice')).toBe(0);
      expect(pool.size).toBe(0);
    });

    it('refuses an operation when a group is full and never starts it', async () => {
      const pool = createPool();
      pool.setLimit('uploads', 1);
      const first = gate();
      const second = vi.fn(async () => 'never');

      pool.spawn(['uploads'], first.operation);

      expect(() => pool.spawn(['uploads'], second)).toThrow(PoolLimitError);
      expect(() => pool.spawn(['uploads'], second)).toThrow('Task limit reached for group "uploads" (limit 1)');
      await flush();
      expect(second).not.toHaveBeenCalled();
      expect(pool.getTaskCount('uploads')).toBe(1);
    });

    it('refuses when the pool as a whole is full', () => {
      const pool = createPool(1);
      pool.spawn(['a'], gate().operation);

      try {
        pool.spawn(['b'], gate().operation);
        expect.fail('expected PoolLimitError');
      } catch (err) {
        expect(err).toBeInstanceOf(PoolLimitError);
        if (err instanceof PoolLimitError) {
          expect(err.group).toBe('all tasks');
        }
      }
    });

    it('frees a slot when an operation settles', async () => {
      const pool = createPool();
      pool.setLimit('uploads', 1);
      const first = gate();

      const handle = pool.spawn(['uploads'], first.operation);
      first.release('done');
      await handle.settled;

      expect(() => pool.spawn(['uploads'], async () => 'next')).not.toThrow();
    });

    it('frees a slot when an operation fails or is cancelled', async () => {
      const pool = createPool(1);

      const failing = pool.spawn([], async () => {
        throw new Error('boom');
      });
      await failing.settled;
      expect(pool.size).toBe(0);

      const cancelled = pool.spawn([], gate().operation);
      cancelled.cancel();
      expect(pool.size).toBe(0);
    });

    it('blocks every new operation at a limit of zero', () => {
      const pool = createPool();
      pool.setLimit('frozen', 0);
      expect(() => pool.spawn(['frozen'], async () => 'x')).toThrow(PoolLimitError);
      expect(pool.size).toBe(0);
    });

    it('lets running operations continue when a limit is lowered', async () => {
      const pool = createPool();
      const a = gate();
      const b = gate();
      const first = pool.spawn(['uploads'], a.operation);
      pool.spawn(['uploads'], b.operation);

      pool.setLimit('uploads', 1);
      expect(pool.getTaskCount('uploads')).toBe(2);
      expect(() => pool.spawn(['uploads'], async () => 'x')).toThrow(PoolLimitError);

      a.release('a');
      await first.settled;
      expect(() => pool.spawn(['uploads'], async () => 'x')).toThrow(PoolLimitError);

      b.release('b');
      await flush();
      expect(pool.getTaskCount('uploads')).toBe(0);
      expect(() => pool.spawn(['uploads'], async () => 'x')).not.toThrow();
    });
  });

  describe('add', () => {
    it('admits an already scheduled handle', async () => {
      const pool = createPool();
      const work = gate();
      const handle = scheduler.schedule(work.operation);

      expect(pool.add(['imports'], handle)).toBe(handle);
      expect(pool.getTaskCount('imports')).toBe(1);

      work.release('ok');
      await handle.settled;
      expect(pool.getTaskCount('imports')).toBe(0);
    });

    it('checks limits before admitting', () => {
      const pool = createPool();
      pool.setLimit('imports', 0);
      const handle = scheduler.schedule(gate().operation);

      expect(() => pool.add(['imports'], handle)).toThrow(PoolLimitError);
      expect(handle.state).toBe('pending');
    });

    it('does not count a handle that already settled', async () => {
      const pool = createPool(0);
      const handle = scheduler.schedule(async () => 'done');
      await handle.settled;

      expect(pool.add(['imports'], handle)).toBe(handle);
      expect(pool.size).toBe(0);
    });
  });

  it('requests cancellation of everything with cancelAll', async () => {
    const pool = createPool();
    const untilCancelled: Operation<string> = (signal) =>
      new Promise<string>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason));
      });
    const a = pool.spawn(['x'], untilCancelled);
    const b = pool.spawn(['y'], untilCancelled);
    await flush();

    expect(pool.cancelAll()).toBe(2);
    expect(a.cancelRequested).toBe(true);
    expect(pool.cancelAll()).toBe(0);

    await Promise.all([a.settled, b.settled]);
    expect(a.state).toBe('cancelled');
    expect(b.state).toBe('cancelled');
    expect(pool.size).toBe(0);
  });

  it('holds the slot of an operation that ignores cancellation', async () => {
    const pool = createPool(1);
    const stubborn = gate();
    const handle = pool.spawn(['x'], stubborn.operation);
    await flush();

    pool.cancelAll();
    expect(pool.size).toBe(1);
    expect(() => pool.spawn(['y'], async () => 'x')).toThrow(PoolLimitError);

    stubborn.release('finished anyway');
    await handle.settled;
    expect(handle.state).toBe('succeeded');
    expect(pool.size).toBe(0);
  });
});
