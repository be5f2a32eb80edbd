/**
 * Structured Logger
 *
 * Diagnostics sink for services, pools and containers.
 * - JSON or coloured text on the console, with service and task in view
 * - Log levels with filtering
 * - Context propagation (service name, task id)
 * - Optional file output with size-based rotation, shared by a logger and
 *   all of its children
 *
 * Every accepted entry is emitted as a 'log' event before it is written,
 * so callers can observe diagnostics without scraping the console.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import type { LoggingConfig } from '../config/schemas.js';
import { loadLoggingConfig } from '../config/service-config.js';

export type LogLevel = LoggingConfig['level'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  service?: string;
  taskId?: number;
  taskName?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

export type LoggerConfig = LoggingConfig;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // gray
  info: '\x1b[36m', // cyan
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
  fatal: '\x1b[35m', // magenta
};

const RESET = '\x1b[0m';

/**
 * Append-only JSON lines file. When a write would grow it past maxSize the
 * file is rotated: services.log becomes services.log.1, .1 becomes .2, and
 * so on, keeping at most maxFiles files in total. Writes are synchronous so
 * rotation always sees every line written before it.
 */
class LogFile {
  private size: number;
  private closed = false;

  constructor(
    private readonly filePath: string,
    private readonly maxSize: number,
    private readonly maxFiles: number
  ) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.size = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
  }

  write(entry: LogEntry): void {
    if (this.closed) return;

    const line = `${JSON.stringify(entry)}\n`;
    const bytes = Buffer.byteLength(line);
    if (this.size > 0 && this.size + bytes > this.maxSize) {
      this.rotate();
    }

    fs.appendFileSync(this.filePath, line);
    this.size += bytes;
  }

  close(): void {
    this.closed = true;
  }

  private rotate(): void {
    const oldest = this.maxFiles - 1;
    for (let generation = oldest; generation >= 1; generation--) {
      const from = `${this.filePath}.${generation}`;
      if (!fs.existsSync(from)) continue;
      if (generation === oldest) {
        fs.rmSync(from);
      } else {
        fs.renameSync(from, `${this.filePath}.${generation + 1}`);
      }
    }

    if (oldest < 1) {
      fs.rmSync(this.filePath, { force: true });
    } else if (fs.existsSync(this.filePath)) {
      fs.renameSync(this.filePath, `${this.filePath}.1`);
    }

    this.size = 0;
  }
}

export class Logger extends EventEmitter {
  private readonly config: LoggerConfig;
  private readonly component: string;
  private context: Record<string, unknown> = {};
  private readonly parent?: Logger;
  private readonly file?: LogFile;

  /**
   * @param parent - set by child(). A logger with a parent takes the
   *   parent's resolved config and writes into the parent's file instead of
   *   reading the environment and opening its own.
   */
  constructor(component: string, config: Partial<LoggerConfig> = {}, parent?: Logger) {
    super();
    this.component = component;
    this.parent = parent;

    if (parent) {
      this.config = { ...parent.config, ...config };
      this.file = parent.file;
    } else {
      this.config = { ...loadLoggingConfig(), ...config };
      this.file = this.config.file
        ? new LogFile(this.config.file, this.config.maxFileSize, this.config.maxFiles)
        : undefined;
    }
  }

  get level(): LogLevel {
    return this.config.level;
  }

  /**
   * Create a child logger with additional context, optionally under another
   * component name. The child forwards its entries to this logger's 'log'
   * listeners and shares its file.
   */
  child(context: Record<string, unknown>, component: string = this.component): Logger {
    const child = new Logger(component, {}, this);
    child.context = { ...this.context, ...context };
    return child;
  }

  /**
   * Set context that will be included in all log entries
   */
  setContext(context: Record<string, unknown>): void {
    this.context = { ...this.context, ...context };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  fatal(message: string, context?: Record<string, unknown>): void {
    this.log('fatal', message, context);
  }

  /**
   * Log with timing (returns function to end timing)
   */
  time(message: string, context?: Record<string, unknown>): () => void {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.info(message, { ...context, duration });
    };
  }

  /**
   * Log an error with stack trace
   */
  logError(error: Error, message?: string, context?: Record<string, unknown>): void {
    this.log('error', message || error.message, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
    });
  }

  /**
   * Stop writing to the log file. Only the logger that opened the file
   * closes it; on a child this does nothing.
   */
  async close(): Promise<void> {
    if (!this.parent) {
      this.file?.close();
    }
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...this.context,
      ...context,
    };

    this.publish(entry);

    if (this.config.console) {
      this.writeConsole(entry);
    }

    this.file?.write(entry);
  }

  private publish(entry: LogEntry): void {
    this.emit('log', entry);
    this.parent?.publish(entry);
  }

  /**
   * Text format: `<time> <LEVEL> [component:service] <task#id> message {fields}`
   * with the error stack, if any, on the following line.
   */
  private writeConsole(entry: LogEntry): void {
    if (this.config.json) {
      console.log(JSON.stringify(entry));
      return;
    }

    const { timestamp, level, component, message, service, taskId, taskName, error, ...fields } = entry;
    const scope = service ? `${component}:${service}` : component;
    const task = taskName === undefined ? '' : ` <${taskName}${taskId === undefined ? '' : `#${taskId}`}>`;

    let line = `${timestamp} ${LEVEL_COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET} [${scope}]${task} ${message}`;
    if (Object.keys(fields).length > 0) {
      line += ` ${JSON.stringify(fields)}`;
    }
    if (error) {
      line += `\n  ${error.stack ?? `${error.name}: ${error.message}`}`;
    }

    console.log(line);
  }
}

// Logger factory with global configuration
let globalConfig: Partial<LoggerConfig> = {};
let sharedRoot: Logger | undefined;

/**
 * Set process-wide defaults for createLogger and the package loggers. The
 * shared root behind `loggers` is replaced; its file is closed.
 */
export function configure(config: Partial<LoggerConfig>): Promise<void> {
  globalConfig = config;
  const previous = sharedRoot;
  sharedRoot = undefined;
  return previous ? previous.close() : Promise.resolve();
}

export function createLogger(component: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(component, { ...globalConfig, ...config });
}

/** One root per process, so every package logger writes to the same file */
function rootLogger(): Logger {
  if (!sharedRoot) {
    sharedRoot = createLogger('session-services');
  }
  return sharedRoot;
}

// Pre-configured loggers for the package's components
export const loggers = {
  service: (name: string) => rootLogger().child({ service: name }, 'service'),
  pool: () => rootLogger().child({}, 'task-pool'),
  container: () => rootLogger().child({}, 'service-container'),
  scheduler: () => rootLogger().child({}, 'scheduler'),
};
