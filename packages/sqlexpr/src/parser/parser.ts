/**
 * Expression Parser
 *
 * Precedence-climbing parser over the token stream. Binary tiers, loosest
 * first:
 *
 *   1. OR
 *   2. AND
 *   3. = != LIKE
 *   4. > >= < <=
 *   5. + -
 *   6. * / %
 *   7. ^ (right-associative)
 *
 * Below all of them sits the unary level: a run of prefix NOT / + / -, one
 * primary, the prefixes applied innermost first, then postfix `!` and
 * `IS [NOT] NULL|TRUE|FALSE` left to right. An operand of any binary
 * operator is therefore fully prefix/postfix-reduced unless parenthesized:
 * `2 ^ 3!` is `2 ^ (3!)` and `-3!` is `(-3)!`.
 *
 * Every operator node counts one level of tree depth, so long prefix runs,
 * postfix chains and left-associative chains are held to the same limit as
 * parentheses and the tree walks over the result stay bounded.
 *
 * @packageDocumentation
 */

import { INTEGER_BOUNDS, LIMITS } from '../constants.js';
import {
  ParseError,
  UnexpectedEOFError,
  UnexpectedTokenError,
  createNestingTooDeepError,
  createNumberOutOfRangeError,
} from '../errors/index.js';
import type { Value } from '../value/types.js';
import { NULL, booleanValue, floatValue, integerValue, stringValue } from '../value/value.js';
import { isFloatLiteral, tokenize } from './tokenizer.js';
import {
  OPERATOR_PRECEDENCE,
  RIGHT_ASSOCIATIVE,
  type BinaryOperator,
  type Expression,
  type PostfixOperator,
  type PrefixOperator,
  type SourceLocation,
  type Token,
} from './types.js';

// =============================================================================
// OPTIONS
// =============================================================================

export interface ParseOptions {
  /**
   * Maximum parenthesis nesting, and maximum operator depth of the tree
   * (default LIMITS.MAX_NESTING_DEPTH)
   */
  maxNestingDepth?: number;
  /** Source text, attached to errors for snippets */
  source?: string;
}

// =============================================================================
// TOKEN HELPERS
// =============================================================================

/**
 * Token as shown in parse error messages
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case 'eof':
      return 'end of input';
    case 'string':
      return `'${token.value.replace(/'/g, "''")}'`;
    default:
      return token.value;
  }
}

function isBinaryOperator(value: string): value is BinaryOperator {
  return Object.prototype.hasOwnProperty.call(OPERATOR_PRECEDENCE, value);
}

function toBinaryOperator(token: Token): BinaryOperator | undefined {
  if (token.type !== 'operator' && token.type !== 'keyword') return undefined;
  return isBinaryOperator(token.value) ? token.value : undefined;
}

function toPrefixOperator(token: Token): PrefixOperator | undefined {
  if (token.type === 'keyword' && token.value === 'NOT') return 'NOT';
  if (token.type === 'operator' && (token.value === '+' || token.value === '-')) {
    return token.value;
  }
  return undefined;
}

const IS_TARGETS = 'NULL, TRUE or FALSE';

// =============================================================================
// PARSER CLASS
// =============================================================================

/**
 * Parser over a complete token sequence
 */
export class ExpressionParser {
  private readonly tokens: Token[];
  private readonly maxNestingDepth: number;
  private readonly source?: string;
  private pos = 0;
  private depth = 0;
  /** Operator depth of each node built; leaves are absent and count 0 */
  private readonly heights = new WeakMap<Expression, number>();

  constructor(tokens: Token[], options: ParseOptions = {}) {
    this.tokens = tokens;
    this.maxNestingDepth = options.maxNestingDepth ?? LIMITS.MAX_NESTING_DEPTH;
    this.source = options.source;
  }

  /**
   * Parse the whole token sequence as one expression
   * @throws ParseError
   */
  parse(): Expression {
    const expr = this.parseBinary(1);
    const next = this.peek();
    if (next.type !== 'eof') {
      throw this.unexpected(next, 'end of input');
    }
    return expr;
  }

  // ---------------------------------------------------------------------------
  // Token stream
  // ---------------------------------------------------------------------------

  private peek(): Token {
    const token = this.tokens[this.pos];
    if (token) return token;
    const last = this.tokens[this.tokens.length - 1];
    const location: SourceLocation = last
      ? { ...last.location, offset: last.location.offset + last.length }
      : { line: 1, column: 1, offset: 0 };
    return { type: 'eof', value: '', location, length: 0 };
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') this.pos++;
    return token;
  }

  private isKeyword(value: string): boolean {
    const token = this.peek();
    return token.type === 'keyword' && token.value === value;
  }

  private isPunctuation(value: string): boolean {
    const token = this.peek();
    return token.type === 'punctuation' && token.value === value;
  }

  private unexpected(token: Token, expected: string): ParseError {
    return token.type === 'eof'
      ? new UnexpectedEOFError(expected, token.location, this.source)
      : new UnexpectedTokenError(describeToken(token), expected, token.location, this.source);
  }

  private enterNesting(token: Token): void {
    this.depth++;
    if (this.depth > this.maxNestingDepth) {
      throw createNestingTooDeepError(this.maxNestingDepth, token.location, this.source);
    }
  }

  private leaveNesting(): void {
    this.depth--;
  }

  /**
   * Record an operator node one level above its deepest child
   */
  private build(node: Expression, location: SourceLocation, ...children: Expression[]): Expression {
    let height = 0;
    for (const child of children) {
      height = Math.max(height, this.heights.get(child) ?? 0);
    }
    height++;
    if (height > this.maxNestingDepth) {
      throw createNestingTooDeepError(this.maxNestingDepth, location, this.source);
    }
    this.heights.set(node, height);
    return node;
  }

  // ---------------------------------------------------------------------------
  // Binary tiers
  // ---------------------------------------------------------------------------

  /**
   * Parse operands of the unary level joined by operators binding at least
   * as tightly as `minPrecedence`
   */
  private parseBinary(minPrecedence: number): Expression {
    let left = this.parseUnary();

    while (true) {
      const token = this.peek();
      const op = toBinaryOperator(token);
      if (!op) break;

      const precedence = OPERATOR_PRECEDENCE[op];
      if (precedence < minPrecedence) break;
      this.advance();

      let right: Expression;
      if (RIGHT_ASSOCIATIVE.has(op)) {
        this.enterNesting(token);
        right = this.parseBinary(precedence);
        this.leaveNesting();
      } else {
        right = this.parseBinary(precedence + 1);
      }

      left = this.build(
        { type: 'binary', op, left, right, location: token.location },
        token.location,
        left,
        right
      );
    }

    return left;
  }

  // ---------------------------------------------------------------------------
  // Unary level
  // ---------------------------------------------------------------------------

  private parseUnary(): Expression {
    const prefixes: Array<{ op: PrefixOperator; location: SourceLocation }> = [];
    for (;;) {
      const token = this.peek();
      const op = toPrefixOperator(token);
      if (!op) break;
      this.advance();
      prefixes.push({ op, location: token.location });
    }

    let expr = this.parsePrimary();
    for (let i = prefixes.length - 1; i >= 0; i--) {
      const { op, location } = prefixes[i];
      expr = this.build({ type: 'unary', op, operand: expr, location }, location, expr);
    }

    return this.parsePostfix(expr);
  }

  private parsePostfix(operand: Expression): Expression {
    let expr = operand;

    for (;;) {
      const token = this.peek();

      if (token.type === 'operator' && token.value === '!') {
        this.advance();
        expr = this.build(
          { type: 'postfix', op: '!', operand: expr, location: token.location },
          token.location,
          expr
        );
        continue;
      }

      if (token.type === 'keyword' && token.value === 'IS') {
        this.advance();
        const negated = this.isKeyword('NOT');
        if (negated) this.advance();
        const op = this.parseIsTarget(negated);
        expr = this.build(
          { type: 'postfix', op, operand: expr, location: token.location },
          token.location,
          expr
        );
        continue;
      }

      return expr;
    }
  }

  private parseIsTarget(negated: boolean): PostfixOperator {
    const token = this.advance();
    if (token.type === 'keyword') {
      switch (token.value) {
        case 'NULL':
          return negated ? 'IS NOT NULL' : 'IS NULL';
        case 'TRUE':
          return negated ? 'IS NOT TRUE' : 'IS TRUE';
        case 'FALSE':
          return negated ? 'IS NOT FALSE' : 'IS FALSE';
      }
    }
    throw this.unexpected(token, IS_TARGETS);
  }

  // ---------------------------------------------------------------------------
  // Primaries
  // ---------------------------------------------------------------------------

  private parsePrimary(): Expression {
    const token = this.peek();
    const location = token.location;

    switch (token.type) {
      case 'number':
        this.advance();
        return { type: 'literal', value: this.parseNumber(token), location };

      case 'string':
        this.advance();
        return { type: 'literal', value: stringValue(token.value), location };

      case 'keyword':
        switch (token.value) {
          case 'TRUE':
            this.advance();
            return { type: 'literal', value: booleanValue(true), location };
          case 'FALSE':
            this.advance();
            return { type: 'literal', value: booleanValue(false), location };
          case 'NULL':
            this.advance();
            return { type: 'literal', value: NULL, location };
          case 'INFINITY':
            this.advance();
            return { type: 'literal', value: floatValue(Infinity), location };
          case 'NAN':
            this.advance();
            return { type: 'literal', value: floatValue(NaN), location };
        }
        break;

      case 'identifier':
        return this.parseColumn();

      case 'punctuation':
        if (token.value === '(') {
          this.advance();
          this.enterNesting(token);
          const expr = this.parseBinary(1);
          this.leaveNesting();
          this.expectPunctuation(')');
          return expr;
        }
        break;
    }

    throw this.unexpected(token, 'expression');
  }

  /**
   * Integer literals are bounded by the positive 64-bit limit before any
   * unary minus is applied
   */
  private parseNumber(token: Token): Value {
    if (isFloatLiteral(token.value)) {
      return floatValue(Number(token.value));
    }
    const magnitude = BigInt(token.value);
    if (magnitude > INTEGER_BOUNDS.MAX) {
      throw createNumberOutOfRangeError(token.location, this.source);
    }
    return integerValue(magnitude);
  }

  /**
   * column | table.column
   */
  private parseColumn(): Expression {
    const first = this.advance();
    if (!this.isPunctuation('.')) {
      return { type: 'column', column: { name: first.value }, location: first.location };
    }

    this.advance();
    const second = this.peek();
    if (second.type !== 'identifier') {
      throw this.unexpected(second, 'column name');
    }
    this.advance();
    return {
      type: 'column',
      column: { table: first.value, name: second.value },
      location: first.location,
    };
  }

  private expectPunctuation(value: string): void {
    const token = this.peek();
    if (token.type === 'punctuation' && token.value === value) {
      this.advance();
      return;
    }
    throw this.unexpected(token, `token ${value}`);
  }
}

// =============================================================================
// CONVENIENCE FUNCTIONS
// =============================================================================

/**
 * Parse a token sequence into an expression AST
 */
export function parseTokens(tokens: Token[], options: ParseOptions = {}): Expression {
  return new ExpressionParser(tokens, options).parse();
}

/**
 * Tokenize and parse expression text
 *
 * @example
 * ```typescript
 * const ast = parseExpression('2 ^ 3!');
 * // { type: 'binary', op: '^', left: 2, right: { type: 'postfix', op: '!', ... } }
 * ```
 *
 * @throws LexError | ParseError
 */
export function parseExpression(source: string, options: ParseOptions = {}): Expression {
  try {
    return parseTokens(tokenize(source), { ...options, source });
  } catch (error) {
    if (error instanceof ParseError) {
      error.withContext({ expression: source });
    }
    throw error;
  }
}
