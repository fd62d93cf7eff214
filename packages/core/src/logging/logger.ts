/**
 * @fileoverview Logging infrastructure for tickit
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output by default, pretty printing on request
 * - Context-aware child loggers
 *
 * All output goes to stderr; stdout belongs to whatever renders tasks.
 */

import { pino } from 'pino';
import { PinoPretty } from 'pino-pretty';

// =============================================================================
// Types
// =============================================================================

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
  /**
   * Alternate sink, mainly for tests. With `pretty` it receives the
   * formatted lines, so it must be a real writable stream.
   */
  destination?: pino.DestinationStream;
}

export interface LogContext {
  component?: string;
  [key: string]: unknown;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// Logger Factory
// =============================================================================

function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  // Quiet by default; LOG_LEVEL=debug shows every task operation
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');
  const pretty = options.pretty ?? process.env.NODE_ENV === 'development';

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'tickit',
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (pretty && options.destination) {
    return pino(
      pinoOptions,
      PinoPretty({
        colorize: false,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        destination: options.destination,
      })
    );
  }

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

  return pino(pinoOptions, options.destination ?? pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

type LogData = Record<string, unknown>;

export class TickitLogger {
  private readonly pino: pino.Logger;
  private readonly context: LogContext;

  constructor(options: LoggerOptions = {}, context: LogContext = {}, instance?: pino.Logger) {
    this.pino = instance ?? createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context.
   * Shares the parent's pino destination.
   */
  child(context: LogContext): TickitLogger {
    return new TickitLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  /** Context bound to this logger */
  get bindings(): LogContext {
    return { ...this.context };
  }

  /**
   * Log at debug level
   * Supports: (msg), (msg, data), and (data, msg) signatures
   */
  debug(msgOrData: string | LogData, msgOrDataSecond?: string | LogData): void {
    this.write('debug', msgOrData, msgOrDataSecond);
  }

  /**
   * Log at info level
   */
  info(msgOrData: string | LogData, msgOrDataSecond?: string | LogData): void {
    this.write('info', msgOrData, msgOrDataSecond);
  }

  /**
   * Log at warn level
   */
  warn(msgOrData: string | LogData, msgOrDataSecond?: string | LogData): void {
    this.write('warn', msgOrData, msgOrDataSecond);
  }

  /**
   * Log at error level
   * Also accepts (msg, error)
   */
  error(msgOrData: string | LogData, msgOrDataOrError?: string | Error | LogData): void {
    if (typeof msgOrData === 'string' && msgOrDataOrError instanceof Error) {
      this.pino.error({ err: msgOrDataOrError }, msgOrData);
      return;
    }
    this.write('error', msgOrData, msgOrDataOrError instanceof Error ? undefined : msgOrDataOrError);
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

  private write(
    level: 'debug' | 'info' | 'warn' | 'error',
    msgOrData: string | LogData,
    msgOrDataSecond?: string | LogData
  ): void {
    if (typeof msgOrData === 'string') {
      if (typeof msgOrDataSecond === 'object') {
        this.pino[level](msgOrDataSecond, msgOrData);
      } else {
        this.pino[level](msgOrData);
      }
      return;
    }
    const msg = typeof msgOrDataSecond === 'string' ? msgOrDataSecond : '';
    this.pino[level](msgOrData, msg);
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: TickitLogger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(options?: LoggerOptions): TickitLogger {
  if (!defaultLogger) {
    defaultLogger = new TickitLogger(options);
  }
  return defaultLogger;
}

/**
 * Replace the default logger. Loggers created afterwards use the new one.
 */
export function configureLogger(options: LoggerOptions): TickitLogger {
  defaultLogger = new TickitLogger(options);
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): TickitLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
