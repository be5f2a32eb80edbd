/**
 * ResultEvent
 *
 * Single-assignment, multi-waiter hand-off of one result: exactly one
 * producer resolves it with a value or a failure, and any number of
 * consumers wait for that outcome, before or after it is set.
 *
 * ```ts
 * const ready = new ResultEvent<string>('bind');
 * service.spawn(async () => ready.resolve(await negotiate()));
 * const resource = await ready.wait();
 * ```
 */

import { AlreadyResolvedError, NotResolvedError } from '../utils/errors.js';
import { createDeferred, type Deferred } from '../utils/deferred.js';

export type EventOutcome<T> =
  | { status: 'value'; value: T }
  | { status: 'failure'; failure: unknown };

export interface WaitOptions {
  /** Withdraw this waiter when the signal aborts */
  signal?: AbortSignal;
}

export class ResultEvent<T> {
  private _outcome?: EventOutcome<T>;
  /** Each waiter with the function that unhooks it from its AbortSignal */
  private waiters = new Map<Deferred<T>, () => void>();

  constructor(private readonly label = 'ResultEvent') {}

  get outcome(): EventOutcome<T> | undefined {
    return this._outcome;
  }

  /** Number of consumers currently suspended in wait() */
  get waiterCount(): number {
    return this.waiters.size;
  }

  isResolved(): boolean {
    return this._outcome !== undefined;
  }

  resolve(value: T): void {
    this.settle({ status: 'value', value });
  }

  resolveWithFailure(failure: unknown): void {
    this.settle({ status: 'failure', failure });
  }

  /**
   * Wait for the outcome of the current cycle. Fulfils with the value or
   * rejects with the stored failure.
   */
  wait(options: WaitOptions = {}): Promise<T> {
    const outcome = this._outcome;
    if (outcome !== undefined) {
      return outcome.status === 'value' ? Promise.resolve(outcome.value) : Promise.reject(outcome.failure);
    }

    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const waiter = createDeferred<T>();
    if (!signal) {
      this.waiters.set(waiter, () => undefined);
      return waiter.promise;
    }

    const onAbort = () => {
      if (this.waiters.delete(waiter)) {
        waiter.reject(signal.reason);
      }
    };
    signal.addEventListener('abort', onAbort, { once: true });
    this.waiters.set(waiter, () => signal.removeEventListener('abort', onAbort));

    return waiter.promise;
  }

  /**
   * Read the outcome without waiting: the value, or the stored failure
   * thrown. Throws NotResolvedError while unset.
   */
  peek(): T {
    const outcome = this._outcome;
    if (outcome === undefined) {
      throw new NotResolvedError(this.label);
    }
    if (outcome.status === 'failure') {
      throw outcome.failure;
    }
    return outcome.value;
  }

  /**
   * Start a new cycle. Waiters from before the reset are detached and never
   * see a later outcome.
   */
  reset(): void {
    this._outcome = undefined;
    for (const detach of this.waiters.values()) {
      detach();
    }
    this.waiters = new Map();
  }

  toString(): string {
    const outcome = this._outcome;
    if (outcome === undefined) return `<${this.label} unset>`;
    return outcome.status === 'value'
      ? `<${this.label} value=${String(outcome.value)}>`
      : `<${this.label} failure=${String(outcome.failure)}>`;
  }

  private settle(outcome: EventOutcome<T>): void {
    if (this._outcome !== undefined) {
      throw new AlreadyResolvedError(this.label);
    }

    this._outcome = outcome;

    const waiters = this.waiters;
    this.waiters = new Map();
    for (const [waiter, detach] of waiters) {
      detach();
      if (outcome.status === 'value') {
        waiter.resolve(outcome.value);
      } else {
        waiter.reject(outcome.failure);
      }
    }
  }
}
