/**
 * sqlexpr Error Hierarchy
 *
 * All errors raised by the lexer, parser and evaluator extend
 * ExpressionError, which provides:
 * - Required error codes
 * - Timestamps
 * - Context preservation
 * - JSON serialization
 * - Structured logging support
 *
 * @packageDocumentation
 */

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** Expression source text that caused the error */
  expression?: string;
  /** Column name involved */
  column?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  /** Error class name */
  name: string;
  /** Machine-readable error code */
  code: string;
  /** Human-readable error message */
  message: string;
  /** Timestamp when error occurred */
  timestamp: number;
  /** Error context */
  context?: ErrorContext;
  /** Stack trace (optional) */
  stack?: string;
  /** Serialized cause error */
  cause?: SerializedError;
}

/**
 * Log entry format for structured logging
 */
export interface ErrorLogEntry {
  /** Log level */
  level: 'error' | 'warn';
  /** ISO timestamp */
  timestamp: string;
  /** Error details */
  error: {
    name: string;
    code: string;
    message: string;
    stack?: string;
  };
  /** Additional metadata */
  metadata: Record<string, unknown>;
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories
 */
export enum ErrorCategory {
  /** Malformed expression text (lexing and parsing) */
  VALIDATION = 'VALIDATION',
  /** Evaluation failures (type mismatch, overflow, division by zero) */
  EXECUTION = 'EXECUTION',
  /** Row or column could not be resolved */
  RESOURCE = 'RESOURCE',
}

// =============================================================================
// Base Expression Error
// =============================================================================

/**
 * Base error class for all sqlexpr errors
 *
 * @example
 * ```typescript
 * try {
 *   evaluateExpression('1 / 0');
 * } catch (error) {
 *   if (error instanceof ExpressionError) {
 *     console.log(error.code);    // 'VALUE_DIVIDE_BY_ZERO'
 *     console.log(error.message); // "Can't divide by zero"
 *     logger.log(error.toLogEntry());
 *   }
 * }
 * ```
 */
export abstract class ExpressionError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Error category for consistent handling */
  abstract readonly category: ErrorCategory;

  /** Timestamp when error occurred */
  readonly timestamp: number;

  /** Error context */
  context?: ErrorContext;

  constructor(message: string, options?: { cause?: Error; context?: ErrorContext }) {
    super(message, { cause: options?.cause });
    this.timestamp = Date.now();
    this.context = options?.context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Expression errors are deterministic for a given input
   */
  isRetryable(): boolean {
    return false;
  }

  /**
   * Serialize error for API responses
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };

    if (this.context) {
      result.context = this.context;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause instanceof ExpressionError) {
      result.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      result.cause = {
        name: this.cause.name,
        code: 'UNKNOWN',
        message: this.cause.message,
        timestamp: this.timestamp,
        stack: this.cause.stack,
      };
    }

    return result;
  }

  /**
   * Format error for structured logging
   */
  toLogEntry(): ErrorLogEntry {
    return {
      level: 'error',
      timestamp: new Date(this.timestamp).toISOString(),
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        stack: this.stack,
      },
      metadata: {
        category: this.category,
        ...this.context,
      },
    };
  }

  /**
   * Attach additional context
   */
  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }
}
