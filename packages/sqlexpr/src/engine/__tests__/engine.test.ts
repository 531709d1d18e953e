import { describe, it, expect } from 'vitest';
import { ParseError, ParseErrorCode, ValueError, ValueErrorCode } from '../../errors/index.js';
import { createRowContext } from '../../evaluator/index.js';
import { MemorySink, createLogger } from '../../logging/index.js';
import { parseExpression } from '../../parser/index.js';
import { floatValue, integerValue } from '../../value/value.js';
import { ExpressionEngine, evaluateExpression, getDefaultEngine } from '../index.js';

function createEngine(options: { cacheSize?: number; maxNestingDepth?: number } = {}) {
  const sink = new MemorySink();
  const logger = createLogger({ level: 'debug', sink, traceId: 'test-trace' });
  const engine = new ExpressionEngine({ ...options, logger, env: {} });
  return { engine, sink };
}

describe('ExpressionEngine', () => {
  it('should evaluate expression text', () => {
    const { engine } = createEngine();
    expect(engine.evaluate('2 ^ 10')).toEqual(integerValue(1024n));
  });

  it('should reuse cached trees', () => {
    const { engine, sink } = createEngine();
    const first = engine.parse('a + 1');
    const second = engine.parse('a + 1');

    expect(second).toBe(first);
    expect(sink.messages('debug')).toEqual(['Parse cache miss for a + 1']);
    expect(sink.entries[0].context).toEqual({ component: 'expression-engine', expression: 'a + 1' });
    expect(engine.getCacheStats()).toMatchObject({ size: 1, hits: 1, misses: 1 });
  });

  it('should parse every time when caching is off', () => {
    const { engine, sink } = createEngine({ cacheSize: 0 });
    engine.parse('1');
    engine.parse('1');

    expect(sink.messages('debug')).toHaveLength(2);
    expect(engine.getCacheStats().size).toBe(0);
  });

  it('should clear the cache', () => {
    const { engine } = createEngine();
    engine.parse('1');
    engine.clearCache();
    expect(engine.getCacheStats()).toMatchObject({ size: 0, hits: 0, misses: 0 });
  });

  it('should apply the configured nesting limit', () => {
    const { engine } = createEngine({ maxNestingDepth: 2 });
    expect(engine.maxNestingDepth).toBe(2);
    expect(engine.evaluate('((1))')).toEqual(integerValue(1n));
    expect(() => engine.parse('(((1)))')).toThrow(ParseError);
  });

  it('should log and rethrow evaluation failures', () => {
    const { engine, sink } = createEngine();
    expect(() => engine.evaluate('1 / 0')).toThrow(ValueError);

    const failure = sink.entries.find(entry => entry.message.startsWith('Evaluation failed'));
    expect(failure).toMatchObject({
      level: 'debug',
      message: "Evaluation failed: Can't divide by zero",
      traceId: 'test-trace',
      context: { code: ValueErrorCode.DIVIDE_BY_ZERO, expression: '1 / 0' },
    });
  });

  it('should reject over-deep operator chains as parse errors', () => {
    const { engine, sink } = createEngine();
    const text = `1${' + 1'.repeat(10000)}`;
    expect(() => engine.evaluate(text)).toThrow(ParseError);

    expect(sink.entries.at(-1)).toMatchObject({
      message: 'Evaluation failed: Expression nesting exceeds maximum depth of 256',
      context: { code: ParseErrorCode.TOO_DEEP, expression: text },
    });
  });

  it('should log the canonical text when evaluating a tree', () => {
    const { engine, sink } = createEngine();
    expect(() => engine.evaluate(parseExpression('1+2*TRUE'))).toThrow("Can't multiply 2 and TRUE");
    expect(sink.entries.at(-1)?.context).toMatchObject({ expression: '1 + (2 * TRUE)' });
  });

  it('should not log at info level', () => {
    const sink = new MemorySink();
    const engine = new ExpressionEngine({ logger: createLogger({ level: 'info', sink }), env: {} });
    engine.parse('1');
    expect(() => engine.evaluate('x')).toThrow('No row context to resolve column x');
    expect(sink.entries).toEqual([]);
  });

  describe('compile', () => {
    it('should evaluate one parsed expression against many rows', () => {
      const { engine } = createEngine();
      const total = engine.compile('price * qty');

      expect(total.source).toBe('price * qty');
      expect(total.evaluate(createRowContext({ price: floatValue(1.5), qty: integerValue(2n) }))).toEqual(
        floatValue(3)
      );
      expect(total.evaluate(createRowContext({ price: integerValue(4n), qty: integerValue(5n) }))).toEqual(
        integerValue(20n)
      );
    });

    it('should print the canonical expression', () => {
      const { engine } = createEngine();
      expect(engine.compile('1+2*3').toString()).toBe('1 + (2 * 3)');
    });
  });

  it('should expose its logger', () => {
    const { engine, sink } = createEngine();
    engine.logger.info('hello {name}', { name: 'engine' });
    expect(sink.messages('info')).toEqual(['hello engine']);
  });
});

describe('evaluateExpression', () => {
  it('should share the default engine', () => {
    expect(getDefaultEngine()).toBe(getDefaultEngine());
    expect(evaluateExpression("'abc' LIKE 'a%'")).toEqual({ type: 'boolean', value: true });
  });
});
