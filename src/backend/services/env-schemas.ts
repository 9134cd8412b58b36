import { z } from 'zod';

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
const NodeEnvSchema = z.enum(['development', 'production', 'test']);

function parseInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function toLowerString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim().toLowerCase();
  return trimmed.length > 0 ? trimmed : undefined;
}

const PositiveIntEnvSchema = z.preprocess(parseInteger, z.number().int().positive());

export const LoggerEnvSchema = z.object({
  LOG_LEVEL: z.preprocess(toLowerString, LogLevelSchema).catch('info'),
  SERVICE_NAME: z.preprocess(toTrimmedString, z.string().min(1)).catch('crewline'),
  NODE_ENV: z.preprocess(toLowerString, NodeEnvSchema).catch('development'),
  BASE_DIR: z.preprocess(toTrimmedString, z.string()).optional(),
});

export const ConfigEnvSchema = z.object({
  NODE_ENV: z.preprocess(toLowerString, NodeEnvSchema).catch('development'),
  BACKEND_PORT: PositiveIntEnvSchema.catch(3001),
  BASE_DIR: z.preprocess(toTrimmedString, z.string()).optional(),
  DATABASE_PATH: z.preprocess(toTrimmedString, z.string()).optional(),
  MIGRATIONS_PATH: z.preprocess(toTrimmedString, z.string()).optional(),
  CORS_ALLOWED_ORIGINS: z.preprocess(toTrimmedString, z.string()).optional(),
  WS_WRITE_TIMEOUT_MS: PositiveIntEnvSchema.catch(5000),
  WS_HEARTBEAT_INTERVAL_MS: PositiveIntEnvSchema.catch(30_000),
  THREAD_PAGE_SIZE_MAX: PositiveIntEnvSchema.catch(100),
  npm_package_version: z.preprocess(toTrimmedString, z.string()).optional(),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type NodeEnv = z.infer<typeof NodeEnvSchema>;
