/**
 * Structured Logging Module
 *
 * Structured logging with trace IDs, log levels, JSON output, async context
 * propagation and configurable sinks.
 *
 * @packageDocumentation
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

import { ENV_VARS } from '../constants.js';

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Log levels supported by the structured logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric log level values for comparison
 */
export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Type guard for log level names
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

/**
 * Compare two log levels
 * @returns negative if a < b, positive if a > b, 0 if equal
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVEL_VALUES[a] - LOG_LEVEL_VALUES[b];
}

/**
 * Get log level from the LOG_LEVEL environment variable, `info` when unset
 * or unrecognised
 */
export function getLogLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env[ENV_VARS.LOG_LEVEL]?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Trace ID for correlating entries of one operation */
  traceId: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Custom log sink interface
 */
export interface LogSink {
  write(entry: LogEntry): void;
  flush?(): void | Promise<void>;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  sink?: LogSink;
  /** Used when the primary sink throws */
  fallbackSink?: LogSink;
  includeStackTraces?: boolean;
  /** Context merged into every entry */
  defaultContext?: Record<string, unknown>;
  traceId?: string;
}

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string | (() => string), context?: Record<string, unknown>): void;
  info(message: string | (() => string), context?: Record<string, unknown>): void;
  warn(message: string | (() => string), context?: Record<string, unknown>): void;
  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): StructuredLogger;

  getTraceId(): string;
  setTraceId(traceId: string): void;

  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;

  isLevelEnabled(level: LogLevel): boolean;

  /** Flush any buffered log entries */
  flush(): Promise<void>;
}

// =============================================================================
// Trace Context Propagation
// =============================================================================

interface TraceContextData {
  traceId: string;
}

/**
 * AsyncLocalStorage for trace context propagation
 */
export const LoggerAsyncStorage = new AsyncLocalStorage<TraceContextData>();

/**
 * Run a function with a specific trace context
 */
export async function withTraceContext<T>(
  traceId: string,
  fn: () => T | Promise<T>
): Promise<T> {
  return LoggerAsyncStorage.run({ traceId }, fn);
}

function getTraceIdFromContext(): string | undefined {
  return LoggerAsyncStorage.getStore()?.traceId;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Copy a value into a JSON-safe shape: circular references are replaced and
 * bigints become decimal strings
 */
function toSerializable(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map(item => toSerializable(item, seen));
  }
  return serializeRecord(value, seen);
}

function serializeRecord(obj: object, seen: WeakSet<object> = new WeakSet()): Record<string, unknown> {
  seen.add(obj);
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = toSerializable(value, seen);
  }
  return result;
}

/**
 * Format message with placeholder substitution
 * Template syntax: {fieldName}
 */
export function formatMessage(template: string, context?: Record<string, unknown>): string {
  if (!context) return template;

  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    if (key in context) {
      return String(context[key]);
    }
    return match;
  });
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// =============================================================================
// Logger Implementation
// =============================================================================

class Logger implements StructuredLogger {
  private level: LogLevel;
  private sink: LogSink;
  private fallbackSink?: LogSink;
  private defaultContext: Record<string, unknown>;
  private includeStackTraces: boolean;
  private _traceId: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getLogLevelFromEnv();
    this.sink = config.sink ?? new ConsoleSink();
    this.fallbackSink = config.fallbackSink;
    this.defaultContext = config.defaultContext ?? {};
    this.includeStackTraces = config.includeStackTraces ?? true;
    this._traceId = config.traceId ?? randomUUID();
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private getActiveTraceId(): string {
    return getTraceIdFromContext() ?? this._traceId;
  }

  private log(
    level: LogLevel,
    messageOrFn: string | (() => string),
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const rawMessage = typeof messageOrFn === 'function' ? messageOrFn() : messageOrFn;

    const mergedContext = context
      ? { ...this.defaultContext, ...context }
      : this.defaultContext;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(rawMessage, mergedContext),
      traceId: this.getActiveTraceId(),
    };

    if (Object.keys(mergedContext).length > 0) {
      entry.context = serializeRecord(mergedContext);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
      };
      const code = errorCode(error);
      if (code) {
        entry.error.code = code;
      }
      if (this.includeStackTraces && error.stack) {
        entry.error.stack = error.stack;
      }
    }

    try {
      this.sink.write(entry);
    } catch (sinkError) {
      if (!this.fallbackSink) {
        throw sinkError;
      }
      this.fallbackSink.write(entry);
    }
  }

  debug(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      fallbackSink: this.fallbackSink,
      defaultContext: { ...this.defaultContext, ...context },
      includeStackTraces: this.includeStackTraces,
      traceId: this._traceId,
    });
  }

  getTraceId(): string {
    return this.getActiveTraceId();
  }

  setTraceId(traceId: string): void {
    this._traceId = traceId;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  async flush(): Promise<void> {
    if (this.sink.flush) {
      await this.sink.flush();
    }
  }
}

/**
 * Create a new structured logger
 */
export function createLogger(config?: LoggerConfig): StructuredLogger {
  return new Logger(config);
}

// =============================================================================
// Built-in Sinks
// =============================================================================

export interface ConsoleSinkOptions {
  /** Enable colorized output */
  colorize?: boolean;
  prettyPrint?: boolean;
}

/**
 * Console sink for development. Entries go to stderr so they never mix with
 * a command's output.
 */
export class ConsoleSink implements LogSink {
  private colorize: boolean;
  private prettyPrint: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colorize = options.colorize ?? false;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    const output = this.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    if (this.colorize) {
      const colors: Record<LogLevel, string> = {
        debug: '\x1b[36m',
        info: '\x1b[32m',
        warn: '\x1b[33m',
        error: '\x1b[31m',
      };
      console.error(`${colors[entry.level]}${output}\x1b[0m`);
    } else {
      console.error(output);
    }
  }
}

export interface JsonSinkOptions {
  /** Write function for output */
  write: (json: string) => void;
  prettyPrint?: boolean;
}

/**
 * JSON sink for structured output
 */
export class JsonSink implements LogSink {
  private writeFn: (json: string) => void;
  private prettyPrint: boolean;

  constructor(options: JsonSinkOptions) {
    this.writeFn = options.write;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    const json = this.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);
    this.writeFn(json);
  }
}

/**
 * Discards every entry
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {}
}

/**
 * Keeps entries in memory, mostly for tests
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter(entry => level === undefined || entry.level === level)
      .map(entry => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * Fan-out to multiple destinations. Every sink receives the entry even if an
 * earlier one throws; failures are rethrown together afterwards.
 */
export class MultiSink implements LogSink {
  private sinks: LogSink[];

  constructor(sinks: LogSink[]) {
    this.sinks = sinks;
  }

  write(entry: LogEntry): void {
    const failures: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} log sink(s) failed`);
    }
  }

  async flush(): Promise<void> {
    await Promise.all(
      this.sinks.map(async sink => {
        if (sink.flush) {
          await sink.flush();
        }
      })
    );
  }
}
