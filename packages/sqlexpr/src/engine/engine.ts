/**
 * Expression Engine
 *
 * Ties the parser and evaluator to configuration, an AST cache and logging.
 * Parsed trees are immutable, so one cached tree can be shared by every
 * caller that evaluates the same text.
 *
 * @packageDocumentation
 */

import { resolveConfig, type ExpressionEngineOptions, type ResolvedConfig } from '../config.js';
import { ExpressionError } from '../errors/index.js';
import { evaluate, type RowContext } from '../evaluator/index.js';
import type { StructuredLogger } from '../logging/index.js';
import { formatExpression } from '../parser/format.js';
import { parseExpression } from '../parser/parser.js';
import type { Expression } from '../parser/types.js';
import type { Value } from '../value/types.js';
import { LRUCache, type LRUCacheStats } from './cache.js';

// =============================================================================
// COMPILED EXPRESSION
// =============================================================================

/**
 * An expression parsed once and evaluated against many rows
 */
export class CompiledExpression {
  constructor(
    readonly ast: Expression,
    readonly source: string,
    private readonly engine: ExpressionEngine
  ) {}

  evaluate(context?: RowContext): Value {
    return this.engine.evaluate(this.ast, context);
  }

  /**
   * Canonical, fully parenthesized text of the expression
   */
  toString(): string {
    return formatExpression(this.ast);
  }
}

// =============================================================================
// ENGINE
// =============================================================================

/**
 * @example
 * ```typescript
 * const engine = new ExpressionEngine({ cacheSize: 500 });
 * const filter = engine.compile("name LIKE 'a%' AND age >= 18");
 * for (const row of rows) {
 *   if (isTrue(filter.evaluate(createRowContext(row))).value) { ... }
 * }
 * ```
 */
export class ExpressionEngine {
  private readonly config: ResolvedConfig;
  private readonly cache: LRUCache<string, Expression>;
  private readonly log: StructuredLogger;

  constructor(options: ExpressionEngineOptions = {}) {
    this.config = resolveConfig(options);
    this.cache = new LRUCache(this.config.cacheSize);
    this.log = this.config.logger.child({ component: 'expression-engine' });
  }

  get maxNestingDepth(): number {
    return this.config.maxNestingDepth;
  }

  get logger(): StructuredLogger {
    return this.log;
  }

  /**
   * Parse text into an AST, reusing a cached tree for text seen before
   *
   * @throws LexError, ParseError
   */
  parse(text: string): Expression {
    const cached = this.cache.get(text);
    if (cached) {
      return cached;
    }

    this.log.debug('Parse cache miss for {expression}', { expression: text });
    const ast = parseExpression(text, { maxNestingDepth: this.config.maxNestingDepth });
    this.cache.set(text, ast);
    return ast;
  }

  /**
   * Evaluate text or an already parsed tree
   *
   * @throws ValueError, LookupError, or the syntax errors of `parse`
   */
  evaluate(input: string | Expression, context?: RowContext): Value {
    try {
      const ast = typeof input === 'string' ? this.parse(input) : input;
      return evaluate(ast, context);
    } catch (error) {
      if (error instanceof ExpressionError) {
        this.log.debug(
          () => `Evaluation failed: ${error.message}`,
          { code: error.code, expression: typeof input === 'string' ? input : formatExpression(input) }
        );
      }
      throw error;
    }
  }

  compile(text: string): CompiledExpression {
    return new CompiledExpression(this.parse(text), text, this);
  }

  getCacheStats(): LRUCacheStats {
    return this.cache.getStats();
  }

  clearCache(): void {
    this.cache.clear();
  }
}

// =============================================================================
// CONVENIENCE
// =============================================================================

let defaultEngine: ExpressionEngine | undefined;

/**
 * Shared engine with the resolved default configuration
 */
export function getDefaultEngine(): ExpressionEngine {
  defaultEngine ??= new ExpressionEngine();
  return defaultEngine;
}

/**
 * Parse (through the default engine's cache) and evaluate in one call
 *
 * @example
 * ```typescript
 * evaluateExpression('2 ^ 10'); // { type: 'integer', value: 1024n }
 * ```
 */
export function evaluateExpression(text: string, context?: RowContext): Value {
  return getDefaultEngine().evaluate(text, context);
}
