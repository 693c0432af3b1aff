/**
 * Structured Logging
 *
 * JSON-structured logging with levels and context. The default logger
 * follows LOG_LEVEL and NODE_ENV until `setLogger` replaces it, usually
 * with `Logger.fromConfig(config)` once configuration is loaded.
 */

import type { Config } from '../config/config.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private format: 'json' | 'pretty';
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  /**
   * Build a logger from the `logLevel` and `env` configuration keys
   */
  static fromConfig(config: Config, options: Omit<LoggerOptions, 'level' | 'format'> = {}): Logger {
    const level = config.get('logLevel');
    return new Logger({
      ...options,
      level: isLogLevel(level) ? level : 'info',
      format: config.get('env') === 'production' ? 'json' : 'pretty',
    });
  }

  /**
   * Log at debug level
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /**
   * Log at info level
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Log at warn level
   */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log at error level
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  /**
   * Set the log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Check if a level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Core logging method
   */
  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.output(entry);
  }

  /**
   * Default output handler
   */
  private defaultOutput(entry: LogEntry): void {
    if (this.format === 'json') {
      console.log(JSON.stringify(entry));
    } else {
      this.prettyPrint(entry);
    }
  }

  /**
   * Pretty print for development
   */
  private prettyPrint(entry: LogEntry): void {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',
      info: '\x1b[32m',
      warn: '\x1b[33m',
      error: '\x1b[31m',
    };
    const reset = '\x1b[0m';
    const dim = '\x1b[2m';

    let line = `${dim}${entry.timestamp}${reset} ${colors[entry.level]}${entry.level.toUpperCase().padEnd(5)}${reset} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${dim}${JSON.stringify(entry.context)}${reset}`;
    }

    console.log(line);

    if (entry.error?.stack) {
      console.log(dim + entry.error.stack + reset);
    }
  }
}

/**
 * Create a logger scoped to one request
 */
export function createRequestLogger(
  baseLogger: Logger,
  request: { method: string; path: string; turboFrame: string | null }
): Logger {
  return baseLogger.child({
    method: request.method,
    path: request.path,
    turboFrame: request.turboFrame ?? undefined,
  });
}

let defaultLogger: Logger | null = null;

/**
 * Get the default logger
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const level = process.env.LOG_LEVEL;
    defaultLogger = new Logger({
      level: isLogLevel(level) ? level : 'info',
      format: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

/**
 * Replace the default logger
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
