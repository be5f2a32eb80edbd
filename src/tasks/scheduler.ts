/**
 * Task scheduling
 *
 * A Scheduler starts units of asynchronous work and hands back a TaskHandle
 * that reports the terminal state of that work and accepts cooperative
 * cancellation. Services and pools receive a Scheduler explicitly, so tests
 * and independent sessions never share hidden state.
 *
 * Cancellation is cooperative: cancel() aborts the AbortSignal passed to the
 * operation, and the operation decides how it ends. Rejecting with a
 * cancellation error settles the handle as 'cancelled'; any other rejection
 * is a failure and a returned value is a success. Only a task cancelled
 * before it started settles as 'cancelled' at once.
 */

import { Logger, loggers } from '../resiliency/logger.js';
import { TaskCancelledError, isCancellation, toError } from '../utils/errors.js';
import { createDeferred } from '../utils/deferred.js';

export type TaskState = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export type TaskOutcome<T> =
  | { status: 'succeeded'; value: T }
  | { status: 'failed'; failure: unknown }
  | { status: 'cancelled'; reason: unknown };

export type Operation<T> = (signal: AbortSignal) => PromiseLike<T> | T;

export type SettleListener<T> = (handle: TaskHandle<T>, outcome: TaskOutcome<T>) => void;

export interface TaskHandle<T = unknown> {
  readonly id: number;
  readonly name: string;
  readonly state: TaskState;
  /** Signal handed to the operation; aborted on cancel() */
  readonly signal: AbortSignal;
  readonly cancelRequested: boolean;
  readonly outcome: TaskOutcome<T> | undefined;
  /** Terminal outcome of the handle. Never rejects. */
  readonly settled: Promise<TaskOutcome<T>>;
  /** Resolves once the operation itself has returned or thrown (or never started). */
  readonly finished: Promise<void>;
  done(): boolean;
  /**
   * Request cancellation. Returns false if the handle is already terminal or
   * cancellation was already requested.
   */
  cancel(reason?: unknown): boolean;
  result(): Promise<T>;
  /**
   * Register a completion listener. Listeners run synchronously at the
   * terminal transition, or on the next microtask if the handle is already
   * terminal.
   */
  onSettled(listener: SettleListener<T>): void;
}

export interface ScheduleOptions {
  name?: string;
  /** External signal; aborting it cancels the task */
  signal?: AbortSignal;
}

export interface Scheduler {
  schedule<T>(operation: Operation<T>, options?: ScheduleOptions): TaskHandle<T>;
}

type ListenerErrorReporter = (error: unknown, handle: TaskHandle<unknown>) => void;

export class Task<T> implements TaskHandle<T> {
  private _state: TaskState = 'pending';
  private _outcome?: TaskOutcome<T>;
  private readonly controller = new AbortController();
  private listeners: SettleListener<T>[] = [];
  private readonly settledDeferred = createDeferred<TaskOutcome<T>>();
  private readonly finishedDeferred = createDeferred<void>();

  constructor(
    readonly id: number,
    readonly name: string,
    private readonly operation: Operation<T>,
    private readonly reportListenerError: ListenerErrorReporter
  ) {}

  get state(): TaskState {
    return this._state;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelRequested(): boolean {
    return this.controller.signal.aborted;
  }

  get outcome(): TaskOutcome<T> | undefined {
    return this._outcome;
  }

  get settled(): Promise<TaskOutcome<T>> {
    return this.settledDeferred.promise;
  }

  get finished(): Promise<void> {
    return this.finishedDeferred.promise;
  }

  done(): boolean {
    return this._outcome !== undefined;
  }

  /**
   * Run the operation. Called once by the scheduler; a task cancelled
   * before this point never runs its operation.
   */
  start(): void {
    if (this._state !== 'pending') {
      this.finishedDeferred.resolve();
      return;
    }

    this._state = 'running';

    // A synchronous throw from the operation rejects this promise
    const pending = new Promise<T>((resolve) => {
      resolve(this.operation(this.controller.signal));
    });

    pending
      .then(
        (value) => this.settle({ status: 'succeeded', value }),
        (failure: unknown) => this.settle(this.classifyFailure(failure))
      )
      .finally(() => this.finishedDeferred.resolve())
      .catch((err: unknown) => this.reportListenerError(err, this));
  }

  cancel(reason?: unknown): boolean {
    if (this.done() || this.cancelRequested) return false;

    const cancelReason = reason ?? new TaskCancelledError(this.name);
    this.controller.abort(cancelReason);

    // Not started yet: the operation will never run
    if (this._state === 'pending') {
      this.settle({ status: 'cancelled', reason: cancelReason });
    }
    return true;
  }

  async result(): Promise<T> {
    const outcome = await this.settled;
    switch (outcome.status) {
      case 'succeeded':
        return outcome.value;
      case 'failed':
        throw outcome.failure;
      case 'cancelled':
        throw isCancellation(outcome.reason) ? outcome.reason : new TaskCancelledError(this.name);
    }
  }

  onSettled(listener: SettleListener<T>): void {
    const outcome = this._outcome;
    if (outcome === undefined) {
      this.listeners.push(listener);
      return;
    }
    queueMicrotask(() => this.invoke(listener, outcome));
  }

  toString(): string {
    return `Task#${this.id}(${this.name}, ${this._state})`;
  }

  private classifyFailure(failure: unknown): TaskOutcome<T> {
    const signal = this.controller.signal;
    if (isCancellation(failure) || (signal.aborted && failure === signal.reason)) {
      return { status: 'cancelled', reason: failure };
    }
    return { status: 'failed', failure };
  }

  private settle(outcome: TaskOutcome<T>): void {
    if (this._outcome !== undefined) return;

    this._outcome = outcome;
    this._state = outcome.status;
    this.settledDeferred.resolve(outcome);

    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) {
      this.invoke(listener, outcome);
    }
  }

  private invoke(listener: SettleListener<T>, outcome: TaskOutcome<T>): void {
    try {
      listener(this, outcome);
    } catch (err) {
      this.reportListenerError(err, this);
    }
  }
}

export interface MicrotaskSchedulerOptions {
  logger?: Logger;
}

/**
 * Default scheduler: starts each operation on the next microtask of the
 * current event loop.
 */
export class MicrotaskScheduler implements Scheduler {
  private nextId = 1;
  private readonly logger: Logger;

  constructor(options: MicrotaskSchedulerOptions = {}) {
    this.logger = options.logger ?? loggers.scheduler();
  }

  schedule<T>(operation: Operation<T>, options: ScheduleOptions = {}): TaskHandle<T> {
    const id = this.nextId++;
    const task = new Task<T>(id, options.name ?? `task-${id}`, operation, (err, handle) => {
      this.logger.logError(toError(err), 'Task settle listener threw', {
        taskId: handle.id,
        taskName: handle.name,
      });
    });

    const external = options.signal;
    if (external) {
      if (external.aborted) {
        task.cancel(external.reason);
      } else {
        const onAbort = () => task.cancel(external.reason);
        external.addEventListener('abort', onAbort, { once: true });
        task.onSettled(() => external.removeEventListener('abort', onAbort));
      }
    }

    queueMicrotask(() => task.start());
    return task;
  }
}

let defaultScheduler: MicrotaskScheduler | null = null;

export function getDefaultScheduler(): Scheduler {
  if (!defaultScheduler) {
    defaultScheduler = new MicrotaskScheduler();
  }
  return defaultScheduler;
}
