/**
 * Expression Tokenizer
 *
 * Converts expression text into a flat sequence of tokens: keywords,
 * identifiers, numeric and string literals, operators and punctuation,
 * terminated by an explicit `eof` token.
 *
 * @packageDocumentation
 */

import { LexError, LexErrorCode } from '../errors/index.js';
import { KEYWORDS, type SourceLocation, type Token, type TokenType } from './types.js';

// =============================================================================
// KEYWORDS
// =============================================================================

const KEYWORD_SET: ReadonlySet<string> = new Set<string>(KEYWORDS);

/**
 * Check if a word is an expression keyword
 */
export function isKeyword(value: string): boolean {
  return KEYWORD_SET.has(value.toUpperCase());
}

const TWO_CHAR_OPERATORS = ['!=', '>=', '<='];
const ONE_CHAR_OPERATORS = '+-*/%^!=<>';
const PUNCTUATION = '().';

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isIdentifierStart(char: string): boolean {
  return /[a-zA-Z_]/.test(char);
}

function isIdentifierPart(char: string): boolean {
  return /[a-zA-Z0-9_]/.test(char);
}

// =============================================================================
// CURSOR
// =============================================================================

/**
 * Read position within the source; one per scan so that scans can restart
 * and interleave
 */
class Cursor {
  pos = 0;
  line = 1;
  column = 1;

  constructor(private readonly source: string) {}

  get done(): boolean {
    return this.pos >= this.source.length;
  }

  location(): SourceLocation {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  peek(offset = 0): string {
    return this.source[this.pos + offset] ?? '';
  }

  advance(): string {
    const char = this.source[this.pos] ?? '';
    this.pos++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }
}

// =============================================================================
// TOKENIZER CLASS
// =============================================================================

/**
 * Expression Tokenizer
 *
 * @example
 * ```typescript
 * const tokenizer = new Tokenizer("price * 2 >= 10");
 * for (const token of tokenizer.scan()) {
 *   console.log(token.type, token.value);
 * }
 * ```
 */
export class Tokenizer {
  private readonly source: string;

  /**
   * @param source - Expression text to tokenize
   */
  constructor(source: string) {
    this.source = source;
  }

  /**
   * Lazily yield tokens, ending with `eof`. Every call starts over from the
   * beginning of the source.
   * @throws LexError on the first malformed token
   */
  *scan(): Generator<Token, void, undefined> {
    const cursor = new Cursor(this.source);

    while (true) {
      while (!cursor.done && /\s/.test(cursor.peek())) {
        cursor.advance();
      }
      if (cursor.done) {
        yield { type: 'eof', value: '', location: cursor.location(), length: 0 };
        return;
      }
      yield this.readToken(cursor);
    }
  }

  /**
   * Tokenize the entire source
   */
  tokenize(): Token[] {
    return Array.from(this.scan());
  }

  [Symbol.iterator](): Iterator<Token> {
    return this.scan();
  }

  private token(type: TokenType, value: string, start: SourceLocation, cursor: Cursor): Token {
    return { type, value, location: start, length: cursor.pos - start.offset };
  }

  private error(code: LexErrorCode, message: string, location: SourceLocation): LexError {
    return new LexError(code, message, location, this.source, {
      context: { expression: this.source },
    });
  }

  /**
   * Read next token from input
   */
  private readToken(cursor: Cursor): Token {
    const start = cursor.location();
    const char = cursor.peek();

    if (char === "'") {
      return this.readString(cursor, start);
    }

    if (char === '"') {
      return this.readQuotedIdentifier(cursor, start);
    }

    if (isDigit(char)) {
      return this.readNumber(cursor, start);
    }

    if (isIdentifierStart(char)) {
      return this.readWord(cursor, start);
    }

    const twoChar = char + cursor.peek(1);
    if (TWO_CHAR_OPERATORS.includes(twoChar)) {
      cursor.advance();
      cursor.advance();
      return this.token('operator', twoChar, start, cursor);
    }

    if (ONE_CHAR_OPERATORS.includes(char)) {
      return this.token('operator', cursor.advance(), start, cursor);
    }

    if (PUNCTUATION.includes(char)) {
      return this.token('punctuation', cursor.advance(), start, cursor);
    }

    const codePoint = this.source.codePointAt(start.offset) ?? 0;
    throw this.error(
      LexErrorCode.UNEXPECTED_CHARACTER,
      `Unexpected character '${String.fromCodePoint(codePoint)}'`,
      start
    );
  }

  /**
   * Read a single-quoted string. A doubled quote is a literal quote; no other
   * escapes are interpreted.
   */
  private readString(cursor: Cursor, start: SourceLocation): Token {
    let value = '';
    cursor.advance(); // opening quote

    while (!cursor.done) {
      const char = cursor.advance();
      if (char !== "'") {
        value += char;
      } else if (cursor.peek() === "'") {
        value += cursor.advance();
      } else {
        return this.token('string', value, start, cursor);
      }
    }

    throw this.error(LexErrorCode.UNTERMINATED_STRING, 'Unterminated string literal', start);
  }

  /**
   * Read a double-quoted identifier; `""` is an escaped quote
   */
  private readQuotedIdentifier(cursor: Cursor, start: SourceLocation): Token {
    let value = '';
    cursor.advance(); // opening quote

    while (!cursor.done) {
      const char = cursor.advance();
      if (char !== '"') {
        value += char;
      } else if (cursor.peek() === '"') {
        value += cursor.advance();
      } else {
        return this.token('identifier', value, start, cursor);
      }
    }

    throw this.error(
      LexErrorCode.UNTERMINATED_IDENTIFIER,
      'Unterminated quoted identifier',
      start
    );
  }

  /**
   * Read numeric literal: digits [. digits] [e|E [+|-] digits]
   */
  private readNumber(cursor: Cursor, start: SourceLocation): Token {
    let value = '';

    while (isDigit(cursor.peek())) {
      value += cursor.advance();
    }

    // A trailing '.' with no digits is still part of the literal
    if (cursor.peek() === '.') {
      value += cursor.advance();
      while (isDigit(cursor.peek())) {
        value += cursor.advance();
      }
    }

    const exponent = cursor.peek();
    if (exponent === 'e' || exponent === 'E') {
      const sign = cursor.peek(1);
      const signed = sign === '+' || sign === '-';
      if (isDigit(cursor.peek(signed ? 2 : 1))) {
        value += cursor.advance();
        if (signed) value += cursor.advance();
        while (isDigit(cursor.peek())) {
          value += cursor.advance();
        }
      }
    }

    return this.token('number', value, start, cursor);
  }

  /**
   * Read identifier or keyword
   */
  private readWord(cursor: Cursor, start: SourceLocation): Token {
    let value = '';

    while (isIdentifierPart(cursor.peek())) {
      value += cursor.advance();
    }

    const upper = value.toUpperCase();
    return KEYWORD_SET.has(upper)
      ? this.token('keyword', upper, start, cursor)
      : this.token('identifier', value, start, cursor);
  }
}

// =============================================================================
// CONVENIENCE FUNCTIONS
// =============================================================================

/**
 * Tokenize an expression
 *
 * @param source - Expression text
 * @returns Tokens ending with an `eof` token
 */
export function tokenize(source: string): Token[] {
  return new Tokenizer(source).tokenize();
}

/**
 * Whether a number token is a float literal
 */
export function isFloatLiteral(raw: string): boolean {
  return /[.eE]/.test(raw);
}
