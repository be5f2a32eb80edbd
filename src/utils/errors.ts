/**
 * Error Types for session-services
 *
 * Usage errors (resolving twice, peeking too early, exceeding a pool limit)
 * are thrown synchronously to the caller. Failures of spawned operations are
 * never thrown from here; they reach the service's failure hook instead.
 */

export class SessionServicesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionServicesError';
  }
}

export class AlreadyResolvedError extends SessionServicesError {
  constructor(description: string) {
    super(`${description} is already resolved`);
    this.name = 'AlreadyResolvedError';
  }
}

export class NotResolvedError extends SessionServicesError {
  constructor(description: string) {
    super(`${description} is not resolved`);
    this.name = 'NotResolvedError';
  }
}

export class TaskCancelledError extends SessionServicesError {
  constructor(taskName?: string) {
    super(taskName ? `Task cancelled: ${taskName}` : 'Task cancelled');
    this.name = 'TaskCancelledError';
  }
}

export class PoolLimitError extends SessionServicesError {
  readonly group: string;

  constructor(group: string, limit: number) {
    super(`Task limit reached for group "${group}" (limit ${limit})`);
    this.name = 'PoolLimitError';
    this.group = group;
  }
}

export class InvalidLimitError extends SessionServicesError {
  constructor(group: string, limit: number) {
    super(`Invalid task limit for group "${group}": ${limit}`);
    this.name = 'InvalidLimitError';
  }
}

export class DependencyCycleError extends SessionServicesError {
  readonly chain: string[];

  constructor(chain: string[]) {
    super(`Service dependency cycle: ${chain.join(' -> ')}`);
    this.name = 'DependencyCycleError';
    this.chain = chain;
  }
}

export class ServiceClosedError extends SessionServicesError {
  constructor(what: string) {
    super(`${what} has been shut down`);
    this.name = 'ServiceClosedError';
  }
}

export class ConfigError extends SessionServicesError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * True for the reasons an operation ends with when it was cancelled:
 * our own TaskCancelledError, or a DOM-style AbortError raised by
 * AbortSignal-aware APIs (fetch, timers/promises, events.once).
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof TaskCancelledError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
