/**
 * Task Metrics
 *
 * Counts what supervised services do with their background operations.
 * - Per-service counters and in-flight gauge
 * - Prometheus-compatible text export
 * - In-memory history of recent points
 */

export type TaskOutcomeKind = 'succeeded' | 'failed' | 'cancelled';

export interface ServiceTaskMetrics {
  service: string;
  spawned: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  inFlight: number;
  lastFailureAt?: Date;
  lastFailureReason?: string;
}

export interface TaskTotals {
  services: number;
  spawned: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  inFlight: number;
}

export interface MetricPoint {
  name: string;
  value: number;
  labels: Record<string, string>;
  timestamp: number;
}

export class TaskMetrics {
  private services = new Map<string, ServiceTaskMetrics>();
  private history: MetricPoint[] = [];

  constructor(private readonly maxHistorySize = 10000) {}

  recordSpawn(service: string): void {
    const m = this.getOrCreate(service);
    m.spawned++;
    m.inFlight++;
    this.record('tasks_spawned_total', 1, { service });
  }

  recordOutcome(service: string, outcome: TaskOutcomeKind, reason?: string): void {
    const m = this.getOrCreate(service);
    m[outcome]++;
    m.inFlight = Math.max(0, m.inFlight - 1);

    if (outcome === 'failed') {
      m.lastFailureAt = new Date();
      m.lastFailureReason = reason;
    }

    this.record(`tasks_${outcome}_total`, 1, { service });
  }

  getServiceMetrics(service: string): ServiceTaskMetrics | undefined {
    return this.services.get(service);
  }

  getAll(): ServiceTaskMetrics[] {
    return Array.from(this.services.values());
  }

  getTotals(): TaskTotals {
    const all = this.getAll();
    return {
      services: all.length,
      spawned: all.reduce((sum, m) => sum + m.spawned, 0),
      succeeded: all.reduce((sum, m) => sum + m.succeeded, 0),
      failed: all.reduce((sum, m) => sum + m.failed, 0),
      cancelled: all.reduce((sum, m) => sum + m.cancelled, 0),
      inFlight: all.reduce((sum, m) => sum + m.inFlight, 0),
    };
  }

  /**
   * Export metrics in Prometheus format
   */
  toPrometheus(): string {
    const lines: string[] = [];
    const all = this.getAll();

    const counter = (name: string, help: string, pick: (m: ServiceTaskMetrics) => number) => {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const m of all) {
        lines.push(`${name}{service="${m.service}"} ${pick(m)}`);
      }
    };

    counter('session_services_tasks_spawned_total', 'Operations spawned per service', (m) => m.spawned);
    counter('session_services_tasks_succeeded_total', 'Operations that completed with a result', (m) => m.succeeded);
    counter('session_services_tasks_failed_total', 'Operations that ended with a failure', (m) => m.failed);
    counter('session_services_tasks_cancelled_total', 'Operations that were cancelled', (m) => m.cancelled);

    lines.push('# HELP session_services_tasks_in_flight Operations currently running per service');
    lines.push('# TYPE session_services_tasks_in_flight gauge');
    for (const m of all) {
      lines.push(`session_services_tasks_in_flight{service="${m.service}"} ${m.inFlight}`);
    }

    return lines.join('\n');
  }

  toJSON(): { totals: TaskTotals; services: ServiceTaskMetrics[] } {
    return {
      totals: this.getTotals(),
      services: this.getAll(),
    };
  }

  getHistory(service?: string, since?: Date): MetricPoint[] {
    let points = this.history;

    if (since) {
      const sinceTs = since.getTime();
      points = points.filter((p) => p.timestamp >= sinceTs);
    }

    if (service) {
      points = points.filter((p) => p.labels.service === service);
    }

    return points;
  }

  reset(): void {
    this.services.clear();
    this.history = [];
  }

  private getOrCreate(service: string): ServiceTaskMetrics {
    let m = this.services.get(service);
    if (!m) {
      m = {
        service,
        spawned: 0,
        succeeded: 0,
        failed: 0,
        cancelled: 0,
        inFlight: 0,
      };
      this.services.set(service, m);
    }
    return m;
  }

  private record(name: string, value: number, labels: Record<string, string>): void {
    this.history.push({ name, value, labels, timestamp: Date.now() });

    if (this.history.length > this.maxHistorySize) {
      this.history = this.history.slice(-Math.floor(this.maxHistorySize / 2));
    }
  }
}

/** Shared collector for callers that do not keep their own */
export const metrics = new TaskMetrics();
