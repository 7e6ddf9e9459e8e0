/**
 * @fileoverview Centralized logging infrastructure
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output to stderr by default
 * - Pretty printing for development
 * - Component child loggers
 * - AsyncLocalStorage request context on every line
 */

import pino from 'pino';
import { getLoggingContext } from './log-context.js';

// =============================================================================
// Types
// =============================================================================

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  sessionId?: string;
  [key: string]: unknown;
}

type LogData = Record<string, unknown>;

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// Logger Factory
// =============================================================================

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  const fromEnv = process.env.WAYFARER_LOG_LEVEL ?? process.env.LOG_LEVEL;
  // Default to 'warn' so library consumers are not flooded with INFO lines
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const pretty = options.pretty ?? process.env.NODE_ENV === 'development';

  const pinoOptions: pino.LoggerOptions = {
    level: resolveLevel(options),
    name: options.name ?? 'wayfarer',
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin: () => ({ ...getLoggingContext() }),
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class WayfarerLogger {
  private readonly pino: pino.Logger;
  private readonly context: LogContext;

  constructor(options: LoggerOptions | pino.Logger = {}, context: LogContext = {}) {
    this.pino = isPinoLogger(options) ? options : createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context.
   * Reuses the parent's pino destination.
   */
  child(context: LogContext): WayfarerLogger {
    return new WayfarerLogger(this.pino.child(context), { ...this.context, ...context });
  }

  get level(): string {
    return this.pino.level;
  }

  /**
   * Supports: (msg), (msg, data), and (data, msg) signatures
   */
  trace(msgOrData: string | LogData, second?: string | LogData): void {
    this.write('trace', msgOrData, second);
  }

  debug(msgOrData: string | LogData, second?: string | LogData): void {
    this.write('debug', msgOrData, second);
  }

  info(msgOrData: string | LogData, second?: string | LogData): void {
    this.write('info', msgOrData, second);
  }

  warn(msgOrData: string | LogData, second?: string | LogData): void {
    this.write('warn', msgOrData, second);
  }

  /**
   * Supports: (msg), (msg, data), (msg, error), and (data, msg) signatures
   */
  error(msgOrData: string | LogData, second?: string | Error | LogData): void {
    this.write('error', msgOrData, second);
  }

  fatal(msgOrData: string | LogData, second?: string | Error | LogData): void {
    this.write('fatal', msgOrData, second);
  }

  /**
   * Start a timer for performance tracking
   */
  startTimer(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug({ durationMs: duration.toFixed(2) }, `${label} completed`);
    };
  }

  /**
   * Log with timing wrapper
   */
  async timed<T>(label: string, fn: () => Promise<T>, level: LogLevel = 'debug'): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.write(level, { durationMs: (performance.now() - start).toFixed(2) }, `${label} completed`);
      return result;
    } catch (error) {
      this.error(`${label} failed`, {
        durationMs: (performance.now() - start).toFixed(2),
        err: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
  }

  private write(level: LogLevel, msgOrData: string | LogData, second?: string | Error | LogData): void {
    if (typeof msgOrData === 'string') {
      if (second instanceof Error) {
        this.pino[level]({ err: second }, msgOrData);
      } else if (typeof second === 'object') {
        this.pino[level](second, msgOrData);
      } else {
        this.pino[level](msgOrData);
      }
      return;
    }
    this.pino[level](msgOrData, typeof second === 'string' ? second : '');
  }
}

function isPinoLogger(value: LoggerOptions | pino.Logger): value is pino.Logger {
  return typeof value === 'object' && 'child' in value && typeof value.child === 'function';
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: WayfarerLogger | null = null;

/**
 * Get the default logger instance. Options only apply on first call.
 */
export function getLogger(options?: LoggerOptions): WayfarerLogger {
  if (!defaultLogger) {
    defaultLogger = new WayfarerLogger(options);
  }
  return defaultLogger;
}

/**
 * Replace the default logger (e.g. after settings are loaded)
 */
export function configureLogger(options: LoggerOptions): WayfarerLogger {
  defaultLogger = new WayfarerLogger(options);
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): WayfarerLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
