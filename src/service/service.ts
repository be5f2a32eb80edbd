/**
 * Supervised Service
 *
 * Base class for features bound to one session ("node"). A service runs its
 * background work through spawn(); the base class observes every spawned
 * operation exactly once, keeps failures away from the rest of the process,
 * and cancels whatever is still running when the service is closed.
 *
 * Usage:
 *
 * ```ts
 * class PresenceTracker extends SupervisedService<Session> {
 *   watch(peer: string) {
 *     return this.spawn((signal) => this.poll(peer, signal), `poll:${peer}`);
 *   }
 *
 *   protected onOperationFailed(handle: TaskHandle, failure: unknown) {
 *     this.retryLater(handle.name, failure);
 *   }
 * }
 *
 * const presence = new PresenceTracker(session, { logger, metrics });
 * presence.watch('peer-1');
 * presence.close(); // aborts poll:peer-1's signal, detaches from session
 * ```
 */

import { Logger, loggers } from '../resiliency/logger.js';
import type { TaskMetrics } from '../resiliency/metrics.js';
import {
  getDefaultScheduler,
  type Operation,
  type Scheduler,
  type TaskHandle,
  type TaskOutcome,
} from '../tasks/scheduler.js';
import { toError } from '../utils/errors.js';

/**
 * Receives the result of every spawned operation that was not cancelled.
 * Implementations must not throw.
 */
export interface OperationHooks {
  onOperationFailed(handle: TaskHandle<unknown>, failure: unknown): void;
  onOperationSucceeded(handle: TaskHandle<unknown>, result: unknown): void;
}

/** Default hooks: failures at error level, unclaimed results at info level */
export class LoggingOperationHooks implements OperationHooks {
  constructor(private readonly logger: Logger) {}

  onOperationFailed(handle: TaskHandle<unknown>, failure: unknown): void {
    const context = { taskId: handle.id, taskName: handle.name };
    if (failure instanceof Error) {
      this.logger.logError(failure, `Task ${handle.name} failed`, context);
    } else {
      this.logger.error(`Task ${handle.name} failed`, { ...context, failure: String(failure) });
    }
  }

  onOperationSucceeded(handle: TaskHandle<unknown>, result: unknown): void {
    this.logger.info(`Unhandled result of task ${handle.name}`, {
      taskId: handle.id,
      taskName: handle.name,
      result,
    });
  }
}

export interface ServiceOptions {
  /** Identity used in diagnostics and metrics; defaults to the class name */
  name?: string;
  /** Parent logger; the service logs through a child tagged with its name */
  logger?: Logger;
  scheduler?: Scheduler;
  metrics?: TaskMetrics;
  /** Replace either default hook without subclassing */
  hooks?: Partial<OperationHooks>;
}

export class SupervisedService<TNode extends object = object> {
  readonly name: string;
  protected readonly logger: Logger;
  private _node: TNode | null;
  private readonly tasks = new Set<TaskHandle<unknown>>();
  private readonly unwinding = new Set<TaskHandle<unknown>>();
  private readonly scheduler: Scheduler;
  private readonly metrics?: TaskMetrics;
  private readonly hooks: Partial<OperationHooks>;
  private readonly defaultHooks: LoggingOperationHooks;
  private shutdownPromise?: Promise<void>;

  constructor(node: TNode, options: ServiceOptions = {}) {
    this.name = options.name ?? this.constructor.name;
    this.logger = options.logger ? options.logger.child({ service: this.name }) : loggers.service(this.name);
    this._node = node;
    this.scheduler = options.scheduler ?? getDefaultScheduler();
    this.metrics = options.metrics;
    this.hooks = options.hooks ?? {};
    this.defaultHooks = new LoggingOperationHooks(this.logger);
  }

  /** The bound session, or null once the service is closed */
  get node(): TNode | null {
    return this._node;
  }

  get closed(): boolean {
    return this._node === null;
  }

  /** Number of tracked operations that have not been observed terminal */
  get pendingOperations(): number {
    return this.tasks.size;
  }

  get operations(): ReadonlyArray<TaskHandle<unknown>> {
    return Array.from(this.tasks);
  }

  /**
   * Schedule an operation and track it until it settles. The handle is
   * tracked before the operation can start.
   */
  protected spawn<T>(operation: Operation<T>, name?: string): TaskHandle<T> {
    if (this._node === null) {
      this.logger.warn('Spawning an operation on a closed service', { taskName: name });
    }

    const handle = this.scheduler.schedule(operation, { name });
    this.tasks.add(handle);
    this.metrics?.recordSpawn(this.name);
    handle.onSettled((settled, outcome) => this.handleSettled(settled, outcome));
    return handle;
  }

  /**
   * Called with the failure of an operation. Override to react; the default
   * delegates to options.hooks or logs at error level. Must not throw.
   */
  protected onOperationFailed(handle: TaskHandle<unknown>, failure: unknown): void {
    if (this.hooks.onOperationFailed) {
      this.hooks.onOperationFailed(handle, failure);
    } else {
      this.defaultHooks.onOperationFailed(handle, failure);
    }
  }

  /**
   * Called with the result of an operation. Override to consume results;
   * the default delegates to options.hooks or logs at info level.
   */
  protected onOperationSucceeded(handle: TaskHandle<unknown>, result: unknown): void {
    if (this.hooks.onOperationSucceeded) {
      this.hooks.onOperationSucceeded(handle, result);
    } else {
      this.defaultHooks.onOperationSucceeded(handle, result);
    }
  }

  /**
   * Teardown run by shutdown() before the service is closed. Subclasses
   * release their own resources here.
   */
  protected async onShutdown(): Promise<void> {}

  /**
   * Request cancellation of every tracked operation, stop tracking them and
   * detach from the node. Does not wait for them to unwind. An operation
   * that fails or returns a value while unwinding still reaches the hooks;
   * one that ends with its cancellation is dropped. Safe to call more than
   * once.
   */
  close(): void {
    this.cancelTracked();
    if (this._node !== null) {
      this._node = null;
      this.logger.debug('Service closed');
    }
  }

  /**
   * Run onShutdown(), close the service, then wait until every operation it
   * cancelled has unwound. Concurrent calls share one run.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    try {
      await this.onShutdown();
    } finally {
      this.close();
      await Promise.all(Array.from(this.unwinding, (handle) => handle.finished));
    }
  }

  private cancelTracked(): void {
    const running = Array.from(this.tasks);
    this.tasks.clear();

    for (const handle of running) {
      handle.cancel();
      if (!handle.done()) {
        this.unwinding.add(handle);
        void handle.finished.then(() => this.unwinding.delete(handle));
      }
    }
  }

  private handleSettled<T>(handle: TaskHandle<T>, outcome: TaskOutcome<T>): void {
    this.tasks.delete(handle);

    switch (outcome.status) {
      case 'cancelled':
        this.metrics?.recordOutcome(this.name, 'cancelled');
        this.logger.debug('Task cancelled', { taskId: handle.id, taskName: handle.name });
        return;
      case 'failed':
        this.metrics?.recordOutcome(this.name, 'failed', toError(outcome.failure).message);
        this.runHook('onOperationFailed', handle, () => this.onOperationFailed(handle, outcome.failure));
        return;
      case 'succeeded':
        this.metrics?.recordOutcome(this.name, 'succeeded');
        this.runHook('onOperationSucceeded', handle, () => this.onOperationSucceeded(handle, outcome.value));
        return;
    }
  }

  private runHook(hook: keyof OperationHooks, handle: TaskHandle<unknown>, call: () => void): void {
    try {
      call();
    } catch (err) {
      this.logger.logError(toError(err), `${hook} hook threw`, {
        taskId: handle.id,
        taskName: handle.name,
      });
    }
  }
}
