import type { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import {
  LoggingConfigSchema,
  PoolConfigSchema,
  ServiceConfigSchema,
  type LoggingConfig,
  type PoolConfig,
  type ServiceConfig,
} from './schemas.js';

export const DEFAULT_LOGGING_CONFIG = {
  level: 'info',
  json: false,
  console: true,
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
} as const;

export const DEFAULT_SERVICE_CONFIG: ServiceConfig = {
  logging: { ...DEFAULT_LOGGING_CONFIG },
  pool: {},
};

/** Environment variables read by loadServiceConfig */
export const ENV_KEYS = {
  logLevel: 'SESSION_SERVICES_LOG_LEVEL',
  logJson: 'SESSION_SERVICES_LOG_JSON',
  logConsole: 'SESSION_SERVICES_LOG_CONSOLE',
  logFile: 'SESSION_SERVICES_LOG_FILE',
  maxTasks: 'SESSION_SERVICES_MAX_TASKS',
  defaultGroupLimit: 'SESSION_SERVICES_DEFAULT_GROUP_LIMIT',
} as const;

type Env = Record<string, string | undefined>;

function readFlag(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') return undefined;
  if (value === '1' || value === 'true') return true;
  if (value === '0' || value === 'false') return false;
  return value;
}

function readInt(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}

function definedOnly(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, v]) => v !== undefined));
}

function loggingCandidate(env: Env): Record<string, unknown> {
  // NODE_ENV=production switches console output to JSON unless overridden
  return {
    ...DEFAULT_SERVICE_CONFIG.logging,
    json: env.NODE_ENV === 'production',
    ...definedOnly({
      level: env[ENV_KEYS.logLevel]?.toLowerCase() || undefined,
      json: readFlag(env[ENV_KEYS.logJson]),
      console: readFlag(env[ENV_KEYS.logConsole]),
      file: env[ENV_KEYS.logFile] || undefined,
    }),
  };
}

function poolCandidate(env: Env): Record<string, unknown> {
  return {
    ...DEFAULT_SERVICE_CONFIG.pool,
    ...definedOnly({
      maxTasks: readInt(env[ENV_KEYS.maxTasks]),
      defaultLimit: readInt(env[ENV_KEYS.defaultGroupLimit]),
    }),
  };
}

function validate<T>(schema: z.ZodType<T>, section: string[], candidate: unknown): T {
  const result = schema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${[...section, ...issue.path].join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Build the effective configuration from defaults and the environment.
 * Values are validated after overlaying; a malformed variable is reported
 * against its config path.
 */
export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  return validate(ServiceConfigSchema, [], { logging: loggingCandidate(env), pool: poolCandidate(env) });
}

/** The logging section alone; pool variables are not read */
export function loadLoggingConfig(env: Env = process.env): LoggingConfig {
  return validate(LoggingConfigSchema, ['logging'], loggingCandidate(env));
}

/** The pool section alone; logging variables are not read */
export function loadPoolConfig(env: Env = process.env): PoolConfig {
  return validate(PoolConfigSchema, ['pool'], poolCandidate(env));
}
