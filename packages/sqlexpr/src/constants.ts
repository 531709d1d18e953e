/**
 * sqlexpr Constants
 *
 * Centralized limits and numeric bounds used across the lexer, parser and
 * evaluator.
 */

// =============================================================================
// Integer Bounds
// =============================================================================

/**
 * Signed 64-bit integer range
 */
export const INTEGER_BOUNDS = {
  /** 9223372036854775807 */
  MAX: 2n ** 63n - 1n,
  /** -9223372036854775808 */
  MIN: -(2n ** 63n),
} as const;

// =============================================================================
// Limit Constants
// =============================================================================

/**
 * Parser and engine limits
 */
export const LIMITS = {
  /** Maximum parenthesis nesting and operator tree depth accepted by the parser */
  MAX_NESTING_DEPTH: 256,
  /** Default number of parsed expressions kept by the engine cache */
  DEFAULT_CACHE_SIZE: 100,
} as const;

// =============================================================================
// Environment Variables
// =============================================================================

/**
 * Environment variables read by resolveConfig()
 */
export const ENV_VARS = {
  MAX_DEPTH: 'SQLEXPR_MAX_DEPTH',
  CACHE_SIZE: 'SQLEXPR_CACHE_SIZE',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;
