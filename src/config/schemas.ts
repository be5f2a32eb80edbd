import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
  json: z.boolean(),
  console: z.boolean(),
  file: z.string().min(1).optional(),
  maxFileSize: z.number().int().positive(),
  maxFiles: z.number().int().positive(),
});

export const PoolConfigSchema = z.object({
  maxTasks: z.number().int().nonnegative().optional(),
  defaultLimit: z.number().int().nonnegative().optional(),
});

export const ServiceConfigSchema = z.object({
  logging: LoggingConfigSchema,
  pool: PoolConfigSchema,
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type PoolConfig = z.infer<typeof PoolConfigSchema>;
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
