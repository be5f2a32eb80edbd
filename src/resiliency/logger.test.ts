import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Logger, createLogger, configure, loggers, type LogEntry } from './logger.js';

function capture(logger: Logger): LogEntry[] {
  const entries: LogEntry[] = [];
  logger.on('log', (entry: LogEntry) => entries.push(entry));
  return entries;
}

describe('Logger', () => {
  afterEach(async () => {
    await configure({});
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('emits structured entries with component and context', () => {
    const logger = new Logger('roster', { level: 'debug', console: false });
    const entries = capture(logger);

    logger.setContext({ session: 's-1' });
    logger.info('roster loaded', { items: 3 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'info',
      component: 'roster',
      message: 'roster loaded',
      session: 's-1',
      items: 3,
    });
    expect(typeof entries[0].timestamp).toBe('string');
  });

  it('drops entries below the configured level', () => {
    const logger = new Logger('roster', { level: 'warn', console: false });
    const entries = capture(logger);

    logger.debug('noise');
    logger.info('noise');
    logger.warn('careful');
    logger.error('broken');
    logger.fatal('gone');

    expect(entries.map((e) => e.level)).toEqual(['warn', 'error', 'fatal']);
  });

  it('attaches error details in logError', () => {
    const logger = new Logger('roster', { level: 'debug', console: false });
    const entries = capture(logger);
    const err = new TypeError('bad item');

    logger.logError(err);
    logger.logError(err, 'push failed', { item: 'a' });

    expect(entries[0].message).toBe('bad item');
    expect(entries[0].error).toEqual({ name: 'TypeError', message: 'bad item', stack: err.stack });
    expect(entries[1]).toMatchObject({ message: 'push failed', item: 'a' });
  });

  it('child loggers merge context and forward to parent listeners', () => {
    const parent = new Logger('service', { level: 'debug', console: false });
    const parentEntries = capture(parent);
    const child = parent.child({ service: 'presence' });
    const childEntries = capture(child);

    child.warn('slow peer', { peer: 'p-1' });

    expect(childEntries).toHaveLength(1);
    expect(parentEntries).toEqual(childEntries);
    expect(parentEntries[0]).toMatchObject({ service: 'presence', peer: 'p-1', component: 'service' });
  });

  it('reports durations through time()', () => {
    const logger = new Logger('roster', { level: 'debug', console: false });
    const entries = capture(logger);

    const done = logger.time('sync finished', { batch: 1 });
    done();

    expect(entries[0].message).toBe('sync finished');
    expect(entries[0].batch).toBe(1);
    expect(typeof entries[0].duration).toBe('number');
  });

  it('writes text lines to the console unless json is set', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger('roster', { level: 'info', console: true, json: false }).info('hello');
    new Logger('roster', { level: 'info', console: true, json: true }).info('hello', { n: 1 });

    expect(log).toHaveBeenCalledTimes(2);
    expect(String(log.mock.calls[0][0])).toMatch(/ \[roster\] hello$/);
    const json = JSON.parse(String(log.mock.calls[1][0]));
    expect(json).toMatchObject({ level: 'info', component: 'roster', message: 'hello', n: 1 });
  });

  it('shows service and task ahead of the message in text lines', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const service = new Logger('service', { level: 'info', console: true, json: false }).child({
      service: 'presence',
    });

    service.info('sync done', { taskId: 3, taskName: 'sync', peers: 2 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toContain('[service:presence] <sync#3> sync done {"peers":2}');
  });

  it('puts the error stack on its own line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = new Error('denied');
    err.stack = 'Error: denied\n    at negotiate';

    new Logger('service', { level: 'info', console: true, json: false }).logError(err, 'bind failed');

    const line = String(log.mock.calls[0][0]);
    expect(line).toContain('[service] bind failed\n  Error: denied\n    at negotiate');
    expect(line).not.toContain('"error"');
  });

  it('appends JSON lines to a log file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'session-services-log-'));
    try {
      const file = join(dir, 'nested', 'services.log');
      const logger = new Logger('roster', { level: 'info', console: false, file });

      logger.info('first');
      logger.error('second');
      await logger.close();

      const lines = readFileSync(file, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(JSON.parse(lines[0])).toMatchObject({ level: 'info', message: 'first' });
      expect(JSON.parse(lines[1])).toMatchObject({ level: 'error', message: 'second' });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('writes entries from child loggers into the root file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'session-services-log-'));
    try {
      const file = join(dir, 'services.log');
      const root = new Logger('root', { level: 'info', console: false, file });
      const child = root.child({ service: 'roster' }, 'service');

      root.info('root line');
      child.warn('child line');
      await child.close();
      child.info('still open');
      await root.close();

      const lines = readFileSync(file, 'utf-8').trim().split('\n');
      expect(lines.map((line) => JSON.parse(line).message)).toEqual(['root line', 'child line', 'still open']);
      expect(JSON.parse(lines[1])).toMatchObject({ component: 'service', service: 'roster', level: 'warn' });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('rotates the file once it would exceed maxFileSize', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'session-services-log-'));
    try {
      const file = join(dir, 'services.log');
      const logger = new Logger('roster', { level: 'info', console: false, file, maxFileSize: 10, maxFiles: 2 });

      logger.info('first');
      logger.info('second');
      logger.info('third');
      await logger.close();

      expect(JSON.parse(readFileSync(file, 'utf-8')).message).toBe('third');
      expect(JSON.parse(readFileSync(`${file}.1`, 'utf-8')).message).toBe('second');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('children reuse the resolved config instead of reading the environment', () => {
    const root = new Logger('root', { level: 'warn', console: false });
    vi.stubEnv('SESSION_SERVICES_LOG_LEVEL', 'loud');

    const child = root.child({ service: 'roster' });

    expect(child.level).toBe('warn');
    expect(() => new Logger('fresh', { console: false })).toThrow('logging.level');
  });

  it('ignores malformed pool variables', () => {
    vi.stubEnv('SESSION_SERVICES_MAX_TASKS', 'many');

    expect(new Logger('roster', { console: false }).level).toBe('info');
  });

  it('routes every package logger into one shared file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'session-services-log-'));
    try {
      const file = join(dir, 'services.log');
      await configure({ level: 'info', console: false, file });

      loggers.service('roster').info('from service');
      loggers.pool().info('from pool');
      await configure({});

      const entries = readFileSync(file, 'utf-8')
        .trim()
        .split('\n')
        .map((line) => JSON.parse(line));
      expect(entries.map((e) => [e.component, e.message])).toEqual([
        ['service', 'from service'],
        ['task-pool', 'from pool'],
      ]);
      expect(entries[0].service).toBe('roster');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('createLogger applies global configuration', async () => {
    await configure({ level: 'error', console: false });
    const logger = createLogger('pool');
    expect(logger.level).toBe('error');

    const overridden = createLogger('pool', { level: 'debug', console: false });
    expect(overridden.level).toBe('debug');
  });
});
