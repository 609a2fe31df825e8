/**
 * Structured logging utility with log levels
 *
 * Usage:
 *   import { createLogger } from '@/lib/logger';
 *   const log = createLogger('HoleMatcher');
 *   log.debug('Clusters converged', { iterations });
 *   log.warn('Attribute only present on one side');
 *
 * Environment:
 *   LOG_LEVEL   debug | info | warn | error | silent
 *   LOG_FORMAT  text (default) | json, one JSON object per line on stderr
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogRecord {
  level: LogLevel;
  /** Colon-joined module chain, empty for the root logger */
  module: string;
  message: string;
  args: readonly unknown[];
}

export type LogSink = (record: LogRecord) => void;

/** Level and sink shared by a logger and every child created from it */
interface LoggerSettings {
  level: LogLevel;
  sink: LogSink;
}

const LEVEL_NAMES = new Map<string, LogLevel>([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
  ['silent', LogLevel.SILENT],
]);

/**
 * Pick the starting level from the process environment.
 * LOG_LEVEL wins; otherwise tests are silent, production shows warnings and errors.
 */
export function resolveDefaultLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const named = env.LOG_LEVEL ? LEVEL_NAMES.get(env.LOG_LEVEL.toLowerCase()) : undefined;
  if (named !== undefined) return named;
  if (env.NODE_ENV === 'test') return LogLevel.SILENT;
  if (env.NODE_ENV === 'production') return LogLevel.WARN;
  return LogLevel.DEBUG;
}

/**
 * Writes `[module] message` through the console method matching the level
 */
export const consoleSink: LogSink = ({ level, module, message, args }) => {
  const text = module ? `[${module}] ${message}` : message;
  switch (level) {
    case LogLevel.DEBUG:
      console.log(text, ...args);
      break;
    case LogLevel.INFO:
      console.info(text, ...args);
      break;
    case LogLevel.WARN:
      console.warn(text, ...args);
      break;
    default:
      console.error(text, ...args);
  }
};

function toJsonValue(value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

/**
 * Formats a record as one JSON line
 */
export function formatJsonRecord(record: LogRecord, time: Date = new Date()): string {
  return JSON.stringify({
    time: time.toISOString(),
    level: LogLevel[record.level].toLowerCase(),
    module: record.module || undefined,
    message: record.message,
    context: record.args.length > 0 ? record.args.map(toJsonValue) : undefined,
  });
}

export const jsonSink: LogSink = (record) => {
  process.stderr.write(`${formatJsonRecord(record)}\n`);
};

export function resolveDefaultSink(env: NodeJS.ProcessEnv = process.env): LogSink {
  return env.LOG_FORMAT?.toLowerCase() === 'json' ? jsonSink : consoleSink;
}

export class Logger {
  private readonly settings: LoggerSettings;
  private readonly prefix: string;

  constructor(config?: Partial<LoggerSettings & { prefix: string }>, shared?: LoggerSettings) {
    this.settings = shared ?? {
      level: config?.level ?? resolveDefaultLevel(),
      sink: config?.sink ?? resolveDefaultSink(),
    };
    this.prefix = config?.prefix ?? '';
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.settings.level;
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) return;
    this.settings.sink({ level, module: this.prefix, message, args });
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, message, args);
  }

  /**
   * Create a child logger with a specific prefix. The child shares this
   * logger's level and sink.
   */
  child(prefix: string): Logger {
    return new Logger({ prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix }, this.settings);
  }

  /**
   * Set the log level at runtime, for this logger and its whole family
   */
  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  setSink(sink: LogSink): void {
    this.settings.sink = sink;
  }
}

// Root logger instance
const logger = new Logger();

/**
 * Factory for creating module-specific loggers
 *
 * @example
 * const log = createLogger('InterpolationEngine');
 * log.debug('Segment resolved');
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}

/**
 * Change the level of every module logger
 */
export function setLogLevel(level: LogLevel): void {
  logger.setLevel(level);
}

/**
 * Route every module logger to `sink`
 */
export function setLogSink(sink: LogSink): void {
  logger.setSink(sink);
}
