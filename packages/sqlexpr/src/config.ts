/**
 * Engine configuration
 *
 * Explicit options win over environment variables, which win over the
 * defaults in constants.ts.
 */

import { ENV_VARS, LIMITS } from './constants.js';
import {
  createLogger,
  getLogLevelFromEnv,
  type LogLevel,
  type StructuredLogger,
} from './logging/index.js';

/**
 * Options accepted by ExpressionEngine
 */
export interface ExpressionEngineOptions {
  /** Maximum parenthesis nesting and operator tree depth accepted by the parser */
  maxNestingDepth?: number;
  /** Parsed expressions kept in the LRU cache; 0 disables caching */
  cacheSize?: number;
  /** Logger to use; one is created at `logLevel` when omitted */
  logger?: StructuredLogger;
  /** Level for the created logger; ignored when `logger` is given */
  logLevel?: LogLevel;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedConfig {
  maxNestingDepth: number;
  cacheSize: number;
  logger: StructuredLogger;
}

export const DEFAULT_CONFIG = {
  maxNestingDepth: LIMITS.MAX_NESTING_DEPTH,
  cacheSize: LIMITS.DEFAULT_CACHE_SIZE,
} as const;

function checkCount(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function readCount(env: NodeJS.ProcessEnv, variable: string): number | undefined {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  if (!/^\s*\d+\s*$/.test(raw)) {
    throw new RangeError(`${variable} must be a non-negative integer, got '${raw}'`);
  }
  return checkCount(variable, Number(raw));
}

/**
 * Merge options with environment overrides and defaults
 *
 * @throws RangeError when a count is negative, fractional or not a number
 */
export function resolveConfig(options: ExpressionEngineOptions = {}): ResolvedConfig {
  const env = options.env ?? process.env;

  const maxNestingDepth =
    options.maxNestingDepth !== undefined
      ? checkCount('maxNestingDepth', options.maxNestingDepth)
      : readCount(env, ENV_VARS.MAX_DEPTH) ?? DEFAULT_CONFIG.maxNestingDepth;

  const cacheSize =
    options.cacheSize !== undefined
      ? checkCount('cacheSize', options.cacheSize)
      : readCount(env, ENV_VARS.CACHE_SIZE) ?? DEFAULT_CONFIG.cacheSize;

  const logger =
    options.logger ??
    createLogger({ level: options.logLevel ?? getLogLevelFromEnv(env) });

  return { maxNestingDepth, cacheSize, logger };
}
