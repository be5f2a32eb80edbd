/**
 * Service Container
 *
 * Owns the services bound to one node. summon() creates a service on first
 * request, after the services it depends on; shutdown() takes them down
 * again in reverse order, so no service outlives one it depends on.
 *
 * ```ts
 * class Roster extends SupervisedService<Session> {}
 * class Presence extends SupervisedService<Session> {
 *   static dependencies = [Roster];
 * }
 *
 * const container = new ServiceContainer(session, { logger, metrics });
 * container.summon(Presence); // creates Roster, then Presence
 * await container.shutdown(); // Presence, then Roster
 * ```
 */

import { Logger, loggers } from '../resiliency/logger.js';
import { DependencyCycleError, ServiceClosedError, toError } from '../utils/errors.js';
import { SupervisedService, type ServiceOptions } from './service.js';

/**
 * A service class the container can construct. Dependencies must be
 * constructible the same way.
 */
export interface ServiceClass<TNode extends object, S extends SupervisedService<TNode> = SupervisedService<TNode>> {
  new (node: TNode, options?: ServiceOptions): S;
  readonly name: string;
  readonly dependencies?: ReadonlyArray<ServiceClass<TNode>>;
}

/** Options handed to every service the container creates */
export type ServiceContainerOptions = Pick<ServiceOptions, 'logger' | 'scheduler' | 'metrics'>;

export class ServiceContainer<TNode extends object> {
  private readonly instances = new Map<ServiceClass<TNode>, SupervisedService<TNode>>();
  private readonly order: SupervisedService<TNode>[] = [];
  private readonly logger: Logger;
  private shutdownPromise?: Promise<void>;

  constructor(
    readonly node: TNode,
    private readonly options: ServiceContainerOptions = {}
  ) {
    this.logger = options.logger ?? loggers.container();
  }

  /** Services in the order they were created */
  get services(): ReadonlyArray<SupervisedService<TNode>> {
    return [...this.order];
  }

  get closed(): boolean {
    return this.shutdownPromise !== undefined;
  }

  /**
   * Return the instance of `cls` for this node, creating it and its
   * dependencies on first request.
   */
  summon<S extends SupervisedService<TNode>>(cls: ServiceClass<TNode, S>): S {
    if (this.closed) {
      throw new ServiceClosedError('ServiceContainer');
    }
    return this.instantiate(cls, []);
  }

  get<S extends SupervisedService<TNode>>(cls: ServiceClass<TNode, S>): S | undefined {
    const existing = this.instances.get(cls);
    return existing instanceof cls ? existing : undefined;
  }

  has(cls: ServiceClass<TNode>): boolean {
    return this.instances.has(cls);
  }

  /**
   * Shut every service down, last created first. A failing teardown does
   * not stop the others; the first failure is rethrown at the end.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    const failures: Error[] = [];

    for (const service of [...this.order].reverse()) {
      try {
        await service.shutdown();
      } catch (err) {
        const error = toError(err);
        this.logger.logError(error, 'Service shutdown failed', { service: service.name });
        failures.push(error);
      }
    }

    this.logger.debug('Service container shut down', { services: this.order.length });

    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private instantiate<S extends SupervisedService<TNode>>(
    cls: ServiceClass<TNode, S>,
    chain: ReadonlyArray<ServiceClass<TNode>>
  ): S {
    const existing = this.instances.get(cls);
    if (existing instanceof cls) {
      return existing;
    }

    const cycleStart = chain.indexOf(cls);
    if (cycleStart !== -1) {
      throw new DependencyCycleError([...chain.slice(cycleStart), cls].map((c) => c.name));
    }

    const path = [...chain, cls];
    for (const dependency of cls.dependencies ?? []) {
      this.instantiate(dependency, path);
    }

    const instance = new cls(this.node, { ...this.options });
    this.instances.set(cls, instance);
    this.order.push(instance);
    this.logger.debug('Service created', { service: instance.name });
    return instance;
  }
}
