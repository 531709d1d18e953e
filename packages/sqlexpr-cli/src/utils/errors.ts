/**
 * Error handling utilities for consistent error coercion across the CLI.
 */

import { LexError, ParseError } from 'sqlexpr';

/**
 * Coerces an unknown value to an Error instance.
 * If the value is already an Error, returns it as-is.
 * Otherwise, converts it to a string and wraps it in a new Error.
 *
 * @example
 * ```ts
 * try {
 *   runCommand();
 * } catch (error) {
 *   const err = toError(error);
 *   console.error(err.message);
 * }
 * ```
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extracts the error message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

/**
 * Message for the terminal. Syntax errors include the offending source line
 * with a caret under the error position.
 */
export function describeError(error: unknown): string {
  if (error instanceof LexError || error instanceof ParseError) {
    return error.format();
  }
  return getErrorMessage(error);
}
