/**
 * Structured Logging Service
 *
 * Structured, levelled logging in a format log aggregators can ingest.
 *
 * Development pretty-prints to the console and mirrors JSON lines into
 * $BASE_DIR/logs/server.log. Production writes only the JSON file and echoes
 * errors to stderr. Test runs never touch the file system.
 */

import { createWriteStream, existsSync, mkdirSync, type WriteStream } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { LoggerEnvSchema, type LogLevel } from './env-schemas';

interface LogEntry {
  level: LogLevel;
  timestamp: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  writeFile: boolean;
  serviceName: string;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Safely stringify an object, replacing circular references and honouring
 * toJSON() on nested values.
 */
function safeStringify(obj: unknown): string {
  try {
    const ancestors = new WeakSet<object>();

    function preprocessValue(value: unknown): unknown {
      if (typeof value !== 'object' || value === null) {
        return value;
      }

      if (ancestors.has(value)) {
        return '[Circular]';
      }

      if (value instanceof Date) {
        return value.toISOString();
      }

      if (value instanceof Error) {
        return { name: value.name, message: value.message };
      }

      ancestors.add(value);

      try {
        if (Array.isArray(value)) {
          return value.map((item) => preprocessValue(item));
        }

        const result: Record<string, unknown> = {};
        for (const [key, val] of Object.entries(value)) {
          result[key] = preprocessValue(val);
        }
        return result;
      } finally {
        ancestors.delete(value);
      }
    }

    return JSON.stringify(preprocessValue(obj));
  } catch {
    return String(obj);
  }
}

let _logFileStream: WriteStream | null = null;
let _logFilePath: string | null = null;

function resolveLogDir(): string {
  const { BASE_DIR } = LoggerEnvSchema.parse(process.env);
  return join(BASE_DIR ?? join(homedir(), 'crewline'), 'logs');
}

function initLogFileStream(): WriteStream | null {
  try {
    const logsDir = resolveLogDir();
    if (!existsSync(logsDir)) {
      mkdirSync(logsDir, { recursive: true });
    }
    _logFilePath = join(logsDir, 'server.log');
    const stream = createWriteStream(_logFilePath, { flags: 'a' });
    stream.on('error', () => {
      _logFileStream = null;
    });
    return stream;
  } catch {
    return null;
  }
}

function getLogFileStream(): WriteStream | null {
  if (!_logFileStream) {
    _logFileStream = initLogFileStream();
  }
  return _logFileStream;
}

/**
 * Get the path of the log file (for display in startup messages).
 */
export function getLogFilePath(): string {
  return _logFilePath ?? join(resolveLogDir(), 'server.log');
}

function getDefaultConfig(): LoggerConfig {
  const env = LoggerEnvSchema.parse(process.env);
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.NODE_ENV !== 'production',
    writeFile: env.NODE_ENV !== 'test',
    serviceName: env.SERVICE_NAME,
  };
}

export class Logger {
  private config: LoggerConfig;
  private component: string;

  constructor(component: string, config?: Partial<LoggerConfig>) {
    this.component = component;
    this.config = {
      ...getDefaultConfig(),
      ...config,
    };
  }

  /**
   * Create a child logger scoped to a sub-component
   */
  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.config);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.config.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      message,
      context: {
        ...context,
        service: this.config.serviceName,
        component: this.component,
      },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    if (this.config.prettyPrint) {
      this.prettyOutput(entry);
    } else {
      this.jsonOutput(entry);
    }
  }

  private writeToLogFile(entry: LogEntry): void {
    if (!this.config.writeFile) {
      return;
    }
    const stream = getLogFileStream();
    if (stream) {
      stream.write(`${safeStringify(entry)}\n`);
    }
  }

  private jsonOutput(entry: LogEntry): void {
    this.writeToLogFile(entry);

    if (entry.level === 'error') {
      console.error(safeStringify(entry));
    }
  }

  private prettyOutput(entry: LogEntry): void {
    this.writeToLogFile(entry);

    const levelColors: Record<LogLevel, string> = {
      error: '\x1b[31m',
      warn: '\x1b[33m',
      info: '\x1b[36m',
      debug: '\x1b[37m',
    };
    const reset = '\x1b[0m';

    let output = `${levelColors[entry.level]}[${entry.level.toUpperCase()}]${reset}`;
    output += ` ${entry.timestamp} [${this.component}] ${entry.message}`;

    if (entry.context) {
      const { service: _service, component: _component, ...rest } = entry.context;
      if (Object.keys(rest).length > 0) {
        output += ` ${safeStringify(rest)}`;
      }
    }

    if (entry.level === 'error') {
      console.error(output);
      if (entry.error?.stack) {
        console.error(entry.error.stack);
      }
    } else if (entry.level === 'warn') {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: Error, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log('error', message, context, errorOrContext);
    } else {
      this.log('error', message, errorOrContext);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /**
   * Log job lifecycle events
   */
  jobEvent(
    event: 'created' | 'transitioned',
    jobId: string,
    context?: Record<string, unknown>
  ): void {
    this.info(`Job ${event}`, {
      event,
      jobId,
      ...context,
    });
  }

  /**
   * Log conversation thread events
   */
  threadEvent(
    event: 'created' | 'closed' | 'message_persisted',
    threadId: string,
    context?: Record<string, unknown>
  ): void {
    this.info(`Thread ${event.replace('_', ' ')}`, {
      event,
      threadId,
      ...context,
    });
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
