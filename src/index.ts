/**
 * session-services
 *
 * Building blocks for features that live alongside a long-lived session:
 * supervised services that own their background operations, one-shot
 * result events, a grouped task pool, and a container that brings services
 * up and down in dependency order.
 *
 * Usage:
 *
 * ```ts
 * import { ServiceContainer, SupervisedService, ResultEvent, metrics } from 'session-services';
 *
 * class Roster extends SupervisedService<Session> {
 *   readonly loaded = new ResultEvent<number>('roster loaded');
 *
 *   load() {
 *     return this.spawn(async (signal) => {
 *       const count = await this.node?.fetchRoster(signal);
 *       this.loaded.resolve(count ?? 0);
 *     }, 'load-roster');
 *   }
 * }
 *
 * const container = new ServiceContainer(session, { metrics });
 * container.summon(Roster).load();
 * await container.shutdown();
 * ```
 */

export {
  SupervisedService,
  LoggingOperationHooks,
  type OperationHooks,
  type ServiceOptions,
} from './service/service.js';

export {
  ServiceContainer,
  type ServiceClass,
  type ServiceContainerOptions,
} from './service/container.js';

export { ResultEvent, type EventOutcome, type WaitOptions } from './sync/result-event.js';

export {
  Task,
  MicrotaskScheduler,
  getDefaultScheduler,
  type MicrotaskSchedulerOptions,
  type Operation,
  type ScheduleOptions,
  type Scheduler,
  type SettleListener,
  type TaskHandle,
  type TaskOutcome,
  type TaskState,
} from './tasks/scheduler.js';

export { TaskPool, ALL_TASKS, type GroupKey, type TaskPoolOptions } from './tasks/task-pool.js';

export {
  Logger,
  createLogger,
  configure as configureLogging,
  loggers,
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
} from './resiliency/logger.js';

export {
  TaskMetrics,
  metrics,
  type MetricPoint,
  type ServiceTaskMetrics,
  type TaskOutcomeKind,
  type TaskTotals,
} from './resiliency/metrics.js';

export {
  loadServiceConfig,
  loadLoggingConfig,
  loadPoolConfig,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_SERVICE_CONFIG,
  ENV_KEYS,
} from './config/service-config.js';
export {
  LogLevelSchema,
  LoggingConfigSchema,
  PoolConfigSchema,
  ServiceConfigSchema,
  type LoggingConfig,
  type PoolConfig,
  type ServiceConfig,
} from './config/schemas.js';

export {
  SessionServicesError,
  AlreadyResolvedError,
  NotResolvedError,
  TaskCancelledError,
  PoolLimitError,
  InvalidLimitError,
  DependencyCycleError,
  ServiceClosedError,
  ConfigError,
  isCancellation,
  toError,
} from './utils/errors.js';
