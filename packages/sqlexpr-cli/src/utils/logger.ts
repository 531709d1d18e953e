/**
 * Shared logging utilities for consistent CLI output.
 */

/**
 * Log levels for filtering output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Output function for command results.
   * @default console.log
   */
  stdout?: (message: string) => void;

  /**
   * Output function for errors and warnings.
   * @default console.error
   */
  stderr?: (message: string) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Logger instance for CLI output.
 */
export class Logger {
  private level: LogLevel;
  private stdout: (message: string) => void;
  private stderr: (message: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.stdout = options.stdout ?? ((message) => console.log(message));
    this.stderr = options.stderr ?? ((message) => console.error(message));
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      this.stderr(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      this.stdout(message);
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      this.stderr(`Warning: ${message}`);
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      this.stderr(`Error: ${message}`);
    }
  }

  /**
   * Logs each line of a multi-line result.
   */
  lines(lines: string[]): void {
    lines.forEach(line => this.info(line));
  }
}

/**
 * Creates a new logger instance with custom options.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
