/**
 * Task Pool
 *
 * Runs operations in named groups with optional limits on how many may run
 * at once. Every operation also belongs to the implicit ALL_TASKS group,
 * whose limit caps the pool as a whole. Groups are created on demand.
 *
 * Limits only gate admission: lowering a limit below the current count lets
 * running operations finish but refuses new ones until the group drains.
 */

import { Logger, loggers } from '../resiliency/logger.js';
import { loadPoolConfig } from '../config/service-config.js';
import { InvalidLimitError, PoolLimitError } from '../utils/errors.js';
import { getDefaultScheduler, type Operation, type Scheduler, type TaskHandle } from './scheduler.js';

export const ALL_TASKS: unique symbol = Symbol('all-tasks');

export type GroupKey = string | typeof ALL_TASKS;

export interface TaskPoolOptions {
  /** Limit on ALL_TASKS; null for none. Defaults to SESSION_SERVICES_MAX_TASKS. */
  maxTasks?: number | null;
  /** Limit for groups without their own; null for none. Defaults to SESSION_SERVICES_DEFAULT_GROUP_LIMIT. */
  defaultLimit?: number | null;
  scheduler?: Scheduler;
  logger?: Logger;
}

function describeGroup(group: GroupKey): string {
  return group === ALL_TASKS ? 'all tasks' : group;
}

function validateLimit(group: GroupKey, limit: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidLimitError(describeGroup(group), limit);
  }
}

export class TaskPool {
  readonly defaultLimit: number | undefined;
  private readonly limits = new Map<GroupKey, number>();
  private readonly running = new Map<GroupKey, Set<TaskHandle<unknown>>>();
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;

  constructor(options: TaskPoolOptions = {}) {
    const configured = loadPoolConfig();
    this.scheduler = options.scheduler ?? getDefaultScheduler();
    this.logger = options.logger ?? loggers.pool();

    const defaultLimit = options.defaultLimit === undefined ? configured.defaultLimit : options.defaultLimit;
    if (defaultLimit !== null && defaultLimit !== undefined) {
      validateLimit('default', defaultLimit);
    }
    this.defaultLimit = defaultLimit ?? undefined;

    const maxTasks = options.maxTasks === undefined ? configured.maxTasks : options.maxTasks;
    this.setLimit(ALL_TASKS, maxTasks ?? null);
  }

  /**
   * Set the limit for a group. Zero inhibits new operations entirely;
   * null behaves like clearLimit().
   */
  setLimit(group: GroupKey, limit: number | null): void {
    if (limit === null) {
      this.clearLimit(group);
      return;
    }
    validateLimit(group, limit);
    this.limits.set(group, limit);
  }

  clearLimit(group: GroupKey): void {
    this.limits.delete(group);
  }

  /** Effective limit: the group's own, else the default (never for ALL_TASKS) */
  getLimit(group: GroupKey): number | undefined {
    const own = this.limits.get(group);
    if (own !== undefined) return own;
    return group === ALL_TASKS ? undefined : this.defaultLimit;
  }

  getTaskCount(group: GroupKey): number {
    return this.running.get(group)?.size ?? 0;
  }

  get size(): number {
    return this.getTaskCount(ALL_TASKS);
  }

  /**
   * Start an operation in the given groups. If any of them (or the pool)
   * is full, PoolLimitError is thrown and the operation is never started.
   */
  spawn<T>(groups: Iterable<string>, operation: Operation<T>, name?: string): TaskHandle<T> {
    const keys = this.keysFor(groups);
    this.ensureCapacity(keys);

    const handle = this.scheduler.schedule(operation, { name });
    this.track(keys, handle);
    return handle;
  }

  /**
   * Admit an operation that is already scheduled. A handle that has already
   * settled occupies no slot and is returned untracked.
   */
  add<T>(groups: Iterable<string>, handle: TaskHandle<T>): TaskHandle<T> {
    if (handle.done()) return handle;

    const keys = this.keysFor(groups);
    this.ensureCapacity(keys);
    this.track(keys, handle);
    return handle;
  }

  /**
   * Request cancellation of every running operation and return how many
   * requests were made. Slots free as the operations settle.
   */
  cancelAll(reason?: unknown): number {
    let cancelled = 0;
    for (const handle of Array.from(this.running.get(ALL_TASKS) ?? [])) {
      if (handle.cancel(reason)) cancelled++;
    }
    return cancelled;
  }

  private keysFor(groups: Iterable<string>): Set<GroupKey> {
    const keys = new Set<GroupKey>(groups);
    keys.add(ALL_TASKS);
    return keys;
  }

  private ensureCapacity(keys: Set<GroupKey>): void {
    for (const key of keys) {
      const limit = this.getLimit(key);
      if (limit !== undefined && this.getTaskCount(key) >= limit) {
        this.logger.debug('Task limit reached', { group: describeGroup(key), limit });
        throw new PoolLimitError(describeGroup(key), limit);
      }
    }
  }

  private track(keys: Set<GroupKey>, handle: TaskHandle<unknown>): void {
    for (const key of keys) {
      let members = this.running.get(key);
      if (!members) {
        members = new Set();
        this.running.set(key, members);
      }
      members.add(handle);
    }

    handle.onSettled(() => {
      for (const key of keys) {
        const members = this.running.get(key);
        if (!members) continue;
        members.delete(handle);
        if (members.size === 0) this.running.delete(key);
      }
    });
  }
}
