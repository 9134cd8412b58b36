/**
 * Configuration Service
 *
 * Centralized configuration for the Crewline backend. Environment variables
 * are parsed once through ConfigEnvSchema; malformed values fall back to
 * their defaults.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import { ConfigEnvSchema, type NodeEnv } from './env-schemas';
import { createLogger } from './logger.service';

const logger = createLogger('config');

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:3001'];

/**
 * Expand environment variables in a string.
 * Handles $VAR and ${VAR} syntax.
 */
function expandEnvVars(value: string): string {
  let result = value.replace(/\$USER|\$\{USER\}/g, homedir().split('/').pop() || 'user');

  result = result.replace(/\$\{?([A-Z_][A-Z0-9_]*)\}?/gi, (match, varName: string) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return expandEnvVars(envValue);
    }
    return match;
  });

  return result;
}

interface SystemConfig {
  baseDir: string;

  backendPort: number;
  nodeEnv: NodeEnv;
  appVersion: string;

  // Database (SQLite)
  databasePath: string;
  migrationsPath: string;

  corsAllowedOrigins: string[];

  // Real-time delivery
  wsWriteTimeoutMs: number;
  wsHeartbeatIntervalMs: number;

  maxPageSize: number;
}

function getDefaultBaseDir(): string {
  return join(homedir(), 'crewline');
}

function loadSystemConfig(): SystemConfig {
  const env = ConfigEnvSchema.parse(process.env);

  const baseDir = env.BASE_DIR ? expandEnvVars(env.BASE_DIR) : getDefaultBaseDir();
  const rawMigrationsPath = env.MIGRATIONS_PATH ? expandEnvVars(env.MIGRATIONS_PATH) : 'migrations';

  return {
    baseDir,
    backendPort: env.BACKEND_PORT,
    nodeEnv: env.NODE_ENV,
    appVersion: env.npm_package_version ?? '0.1.0',
    databasePath: env.DATABASE_PATH
      ? expandEnvVars(env.DATABASE_PATH)
      : join(baseDir, 'data.db'),
    migrationsPath: isAbsolute(rawMigrationsPath)
      ? rawMigrationsPath
      : resolve(process.cwd(), rawMigrationsPath),
    corsAllowedOrigins: env.CORS_ALLOWED_ORIGINS
      ? env.CORS_ALLOWED_ORIGINS.split(',')
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0)
      : [...DEFAULT_CORS_ORIGINS],
    wsWriteTimeoutMs: env.WS_WRITE_TIMEOUT_MS,
    wsHeartbeatIntervalMs: env.WS_HEARTBEAT_INTERVAL_MS,
    maxPageSize: env.THREAD_PAGE_SIZE_MAX,
  };
}

class ConfigService {
  private readonly config: SystemConfig;

  constructor() {
    this.config = loadSystemConfig();
    this.validateConfig();
  }

  private validateConfig(): void {
    if (this.config.nodeEnv === 'production' && this.config.wsWriteTimeoutMs > 60_000) {
      logger.warn('WS_WRITE_TIMEOUT_MS above one minute lets slow peers hold broadcasts', {
        wsWriteTimeoutMs: this.config.wsWriteTimeoutMs,
      });
    }
  }

  getSystemConfig(): SystemConfig {
    return { ...this.config, corsAllowedOrigins: [...this.config.corsAllowedOrigins] };
  }

  getEnvironment(): NodeEnv {
    return this.config.nodeEnv;
  }

  isDevelopment(): boolean {
    return this.config.nodeEnv === 'development';
  }

  getAppVersion(): string {
    return this.config.appVersion;
  }

  getBackendPort(): number {
    return this.config.backendPort;
  }

  /**
   * Get database file path (SQLite)
   */
  getDatabasePath(): string {
    return this.config.databasePath;
  }

  getMigrationsPath(): string {
    return this.config.migrationsPath;
  }

  getCorsConfig(): { allowedOrigins: string[] } {
    return { allowedOrigins: [...this.config.corsAllowedOrigins] };
  }

  getRealtimeConfig(): { writeTimeoutMs: number; heartbeatIntervalMs: number } {
    return {
      writeTimeoutMs: this.config.wsWriteTimeoutMs,
      heartbeatIntervalMs: this.config.wsHeartbeatIntervalMs,
    };
  }

  getMaxPageSize(): number {
    return this.config.maxPageSize;
  }
}

export type AppSystemConfig = SystemConfig;

export const configService = new ConfigService();
