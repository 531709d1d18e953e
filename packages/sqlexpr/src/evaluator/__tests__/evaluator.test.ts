import { describe, it, expect } from 'vitest';
import { LookupError, LookupErrorCode, ValueError, ValueErrorCode } from '../../errors/index.js';
import { parseExpression } from '../../parser/index.js';
import type { Value } from '../../value/types.js';
import { NULL, booleanValue, floatValue, integerValue, stringValue } from '../../value/value.js';
import { createRowContext, evaluate, isConstant, like, type RowContext } from '../index.js';

type Expected = Value | { error: string };

const T = booleanValue(true);
const F = booleanValue(false);
const int = (value: bigint): Value => integerValue(value);
const flt = (value: number): Value => floatValue(value);
const fail = (error: string): Expected => ({ error });

const run = (source: string, context?: RowContext): Value => evaluate(parseExpression(source), context);

function errorOf(fn: () => unknown): Error {
  try {
    fn();
  } catch (error) {
    if (error instanceof Error) return error;
    throw error;
  }
  throw new Error('expected an error');
}

function check(source: string, expected: Expected): void {
  if ('error' in expected) {
    const error = errorOf(() => run(source));
    expect(error).toBeInstanceOf(ValueError);
    expect(error.message).toBe(expected.error);
  } else {
    expect(run(source)).toEqual(expected);
  }
}

describe('evaluate', () => {
  describe('literals', () => {
    it.each<[string, Expected]>([
      ['TrUe', T],
      ['FALSE', F],
      ['INFINITY', flt(Infinity)],
      ['NAN', flt(NaN)],
      ['NULL', NULL],
      ['3.72', flt(3.72)],
      ['3.14e3', flt(3140)],
      ['2.718E-2', flt(0.02718)],
      ['3.', flt(3)],
      ['3.0', flt(3)],
      ['1.23456789012345e308', flt(1.23456789012345e308)],
      ['-1.23456789012345e308', flt(-1.23456789012345e308)],
      ['1.23456789012345e-307', flt(1.23456789012345e-307)],
      ['1.23456789012345e-323', flt(1e-323)],
      ['0.12345678901234567890', flt(0.12345678901234568)],
      ['1e309', flt(Infinity)],
      ['1e-325', flt(0)],
      ['3', int(3n)],
      ['314', int(314n)],
      ['03', int(3n)],
      ['9223372036854775807', int(9223372036854775807n)],
      ['-9223372036854775807', int(-9223372036854775807n)],
      ["'Hi! 👋'", stringValue('Hi! 👋')],
      ["'Try \\n newlines and \\t tabs'", stringValue('Try \\n newlines and \\t tabs')],
      [`'Has ''single'' and "double" quotes'`, stringValue(`Has 'single' and "double" quotes`)],
      ["' Has \n newlines and \t tabs  '", stringValue(' Has \n newlines and \t tabs  ')],
      [`'${'a'.repeat(4096)}'`, stringValue('a'.repeat(4096))],
    ])('%s', check);
  });

  describe('logical operators', () => {
    it.each<[string, Expected]>([
      ['TRUE AND TRUE', T],
      ['TRUE AND FALSE', F],
      ['FALSE AND TRUE', F],
      ['FALSE AND FALSE', F],
      ['TRUE AND NULL', NULL],
      ['FALSE AND NULL', F],
      ['NULL AND TRUE', NULL],
      ['NULL AND FALSE', F],
      ['NULL AND NULL', NULL],
      ['3.14 AND 3.14', fail("Can't and 3.14 and 3.14")],
      ['3 AND 3', fail("Can't and 3 and 3")],
      ["'a' AND 'b'", fail("Can't and a and b")],

      ['NOT TRUE', F],
      ['NOT FALSE', T],
      ['NOT NULL', NULL],
      ['NOT 3.14', fail("Can't negate 3.14")],
      ['NOT 3', fail("Can't negate 3")],
      ["NOT 'abc'", fail("Can't negate abc")],

      ['TRUE OR TRUE', T],
      ['TRUE OR FALSE', T],
      ['FALSE OR TRUE', T],
      ['FALSE OR FALSE', F],
      ['TRUE OR NULL', T],
      ['FALSE OR NULL', NULL],
      ['NULL OR TRUE', T],
      ['NULL OR FALSE', NULL],
      ['NULL OR NULL', NULL],
      ['3.14 OR 3.14', fail("Can't or 3.14 and 3.14")],
      ['3 OR 3', fail("Can't or 3 and 3")],
      ["'a' OR 'b'", fail("Can't or a and b")],
    ])('%s', check);
  });

  describe('comparison operators', () => {
    it.each<[string, Expected]>([
      ['TRUE = TRUE', T],
      ['TRUE = FALSE', F],
      ['3.14 = 3.14', T],
      ['3.14 = 2.718', F],
      ['INFINITY = INFINITY', T],
      ['NAN = NAN', F],
      ['3.0 = 3', T],
      ['3.01 = 3', F],
      ['1 = 1', T],
      ['3 = 3.01', F],
      ['NULL = NULL', NULL],
      ['1 = NULL', NULL],
      ["'abc' = 'abc'", T],
      ["'abc' = 'ABC'", F],
      ["'😀' = '😀'", T],
      ["'😀' = '🙁'", F],
      ["1 = 'a'", fail("Can't compare 1 and a")],
      ['TRUE = 1', fail("Can't compare TRUE and 1")],

      ['TRUE != FALSE', T],
      ['INFINITY != INFINITY', F],
      ['NAN != NAN', T],
      ['3 != 3.0', F],
      ['NULL != 1', NULL],
      ["'abc' != 'ABC'", T],
      ["1 != 'a'", fail("Can't compare 1 and a")],

      ['TRUE > FALSE', T],
      ['FALSE > TRUE', F],
      ['3.14 > 3.13', T],
      ['INFINITY > INFINITY', F],
      ['NAN > NAN', F],
      ['3.01 > 3', T],
      ['3.0 > 3', F],
      ['3 > 2.99', T],
      ['NULL > 1', NULL],
      ["'xyz' > 'abc'", T],
      ["'b' > 'A'", T],
      ["'B' > 'a'", F],
      ["'abcde' > 'abc'", T],
      ["'🙁' > '😀'", T],
      ["1 > 'a'", fail("Can't compare 1 and a")],

      ['TRUE >= TRUE', T],
      ['INFINITY >= INFINITY', T],
      ['NAN >= NAN', F],
      ['3 >= 3.0', T],
      ["'b' >= 'abc'", T],
      ["'ABC' >= 'abc'", F],
      ['1 >= NULL', NULL],

      ['FALSE < TRUE', T],
      ['NAN < NAN', F],
      ['2.99 < 3', T],
      ['3 < 3.1', T],
      ["'A' < 'b'", T],
      ["'abc' < 'abcde'", T],
      ["'😀' < '🙁'", T],
      ['NULL < NULL', NULL],

      ['TRUE <= TRUE', T],
      ['INFINITY <= INFINITY', T],
      ['NAN <= NAN', F],
      ['3.01 <= 4', T],
      ["'a' <= 'B'", F],
      ["1 <= 'a'", fail("Can't compare 1 and a")],
    ])('%s', check);
  });

  describe('LIKE', () => {
    it.each<[string, Expected]>([
      ["'abcde' LIKE 'a%e'", T],
      ["'ab%de' LIKE 'ab%%de'", T],
      ["'ab_de' LIKE 'ab__de'", T],
      ["'abcde' LIKE 'A%E'", F],
      ["'abc' LIKE NULL", NULL],
      ["NULL LIKE 'abc'", NULL],
      ["3 LIKE 'abc'", fail("Can't LIKE 3 and abc")],
      ["'abc' LIKE 1", fail("Can't LIKE abc and 1")],
    ])('%s', check);

    it('should expose the operator directly', () => {
      expect(like(stringValue('abc'), stringValue('a_c'))).toEqual(T);
    });
  });

  describe('IS predicates', () => {
    it.each<[string, Expected]>([
      ['NULL IS NULL', T],
      ['NULL IS NOT NULL', F],
      ['TRUE IS NULL', F],
      ['TRUE IS NOT NULL', T],
      ['TRUE IS TRUE', T],
      ['FALSE IS TRUE', F],
      ['NULL IS TRUE', F],
      ['NULL IS NOT TRUE', T],
      ['FALSE IS FALSE', T],
      ['NULL IS FALSE', F],
      ['TRUE IS NOT FALSE', T],
      ['1 IS TRUE', F],
      ["'abc' IS NOT FALSE", T],
    ])('%s', check);
  });

  describe('arithmetic operators', () => {
    it.each<[string, Expected]>([
      ['3.1 + 2.71', flt(3.1 + 2.71)],
      ['3.72 + 1', flt(3.72 + 1)],
      ['1 + 2', int(3n)],
      ['1 + NULL', NULL],
      ['NULL + 3.14', NULL],
      ['1 + -3', int(-2n)],
      ['1 + INFINITY', flt(Infinity)],
      ['1 + NAN', flt(NaN)],
      ['9223372036854775807 + 1', fail('Integer overflow')],
      ['-9223372036854775807 + -2', fail('Integer overflow')],
      ['2e308 + 2e308', flt(Infinity)],
      ['9223372036854775807 + 10.0', flt(9223372036854776000)],
      ['TRUE + FALSE', fail("Can't add TRUE and FALSE")],
      ["'a' + 'b'", fail("Can't add a and b")],

      ['+3.72', flt(3.72)],
      ['+1', int(1n)],
      ['+NULL', NULL],
      ['+++1', int(1n)],
      ['+TRUE', fail("Can't take the positive of TRUE")],
      ["+'abc'", fail("Can't take the positive of abc")],

      ['4.16 / 3.2', flt(4.16 / 3.2)],
      ['4.16 / 0.0', flt(Infinity)],
      ['0.0 / 0.0', flt(NaN)],
      ['1.5 / 3', flt(0.5)],
      ['4.16 / 0', flt(Infinity)],
      ['3 / 1.2', flt(2.5)],
      ['8 / 3', int(2n)],
      ['8 / -3', int(-2n)],
      ['1 / 0', fail("Can't divide by zero")],
      ['1 / INFINITY', flt(0)],
      ['INFINITY / INFINITY', flt(NaN)],
      ['NULL / NULL', NULL],
      ['TRUE / FALSE', fail("Can't divide TRUE and FALSE")],

      ['6.25 ^ 0.5', flt(2.5)],
      ['6.25 ^ 2', flt(39.0625)],
      ['9 ^ 0.5', flt(3)],
      ['2 ^ 3', int(8n)],
      ['2 ^ 10000000000', fail('Integer overflow')],
      ['NULL ^ NULL', NULL],
      ['2 ^ INFINITY', flt(Infinity)],
      ['2 ^ NAN', flt(NaN)],
      ['10e200 ^ 2', flt(Infinity)],
      ['9223372036854775807 ^ 2', fail('Integer overflow')],
      ['2 ^ -3', flt(0.125)],
      ['1 ^ NAN', flt(1)],
      ["'a' ^ 'b'", fail("Can't exponentiate a and b")],

      ['3!', int(6n)],
      ['0!', int(1n)],
      ['NULL!', NULL],
      ['20!', int(2432902008176640000n)],
      ['21!', fail('Integer overflow')],
      ['TRUE!', fail("Can't take factorial of TRUE")],
      ['3.14!', fail("Can't take factorial of 3.14")],
      ["'abc'!", fail("Can't take factorial of abc")],

      ['6.28 % 2.2', flt(6.28 % 2.2)],
      ['6.28 % 0.0', flt(NaN)],
      ['3.15 % 2', flt(3.15 % 2)],
      ['6 % 3.15', flt(6 % 3.15)],
      ['5 % 3', int(2n)],
      ['7 % 0', fail("Can't divide by zero")],
      ['-5 % 3', int(-2n)],
      ['5 % -3', int(2n)],
      ['INFINITY % 7', flt(NaN)],
      ['7 % INFINITY', flt(7)],
      ['TRUE % FALSE', fail("Can't take modulo of TRUE and FALSE")],

      ['3.1 * 2.71', flt(3.1 * 2.71)],
      ['2 * 3', int(6n)],
      ['2 * -3', int(-6n)],
      ['2 * NAN', flt(NaN)],
      ['9223372036854775807 * 2', fail('Integer overflow')],
      ['9223372036854775807 * -2', fail('Integer overflow')],
      ['9223372036854775807 * 2.0', flt(18446744073709552000)],
      ["'a' * 'b'", fail("Can't multiply a and b")],

      ['-1', int(-1n)],
      ['--1', int(1n)],
      ['-3.72', flt(-3.72)],
      ['-+-+-1', int(-1n)],
      ['-NULL', NULL],
      ['-INFINITY', flt(-Infinity)],
      ['-TRUE', fail("Can't negate TRUE")],

      ['3.1 - 2.71', flt(3.1 - 2.71)],
      ['1 - 2', int(-1n)],
      ['1 - -3', int(4n)],
      ['1 - INFINITY', flt(-Infinity)],
      ['9223372036854775807 - -1', fail('Integer overflow')],
      ['-9223372036854775807 - 2', fail('Integer overflow')],
      ['TRUE - FALSE', fail("Can't subtract TRUE and FALSE")],
    ])('%s', check);
  });

  describe('precedence', () => {
    it.each<[string, Expected]>([
      ['-3!', fail("Can't take factorial of negative number")],
      ['-(3!)', int(-6n)],
      ['-NULL IS NULL', T],
      ['-(NULL IS NULL)', fail("Can't negate TRUE")],
      ['NOT NULL IS NULL', T],
      ['NOT (NULL IS NULL)', F],
      ['2 ^ 3!', int(64n)],
      ['(2 ^ 3)!', int(40320n)],
      ['2^NULL IS NULL', fail("Can't exponentiate 2 and TRUE")],
      ['(2^NULL) IS NULL', T],
      ['2^3^2', int(512n)],
      ['(2^3)^2', int(64n)],
      ['2^3*4', int(32n)],
      ['2^5%2', int(0n)],
      ['3 * 4 % 3', int(0n)],
      ['1 - 2 * 3', int(-5n)],
      ['8 / 4 % 3', int(2n)],
      ['8 % 3 / 2', int(1n)],
      ['8 - 5 % 3', int(6n)],
      ['3 - 2 + 1', int(2n)],
      ['1 + (2 > 2)', fail("Can't add 1 and FALSE")],
      ['5 - (2 >= 2)', fail("Can't subtract 5 and TRUE")],
      ['5 > 3 >= TRUE', T],
      ['5 > 3 < TRUE', F],
      ['5 > 3 = TRUE', T],
      ['5 > (3 = TRUE)', fail("Can't compare 3 and TRUE")],
      ['5 > 3 != TRUE', F],
      ["5 > 3 LIKE 'abc'", fail("Can't LIKE TRUE and abc")],
      ["5 > (3 LIKE 'abc')", fail("Can't LIKE 3 and abc")],
      ['3 <= 5 > TRUE', F],
      ["3 < (5 LIKE 'abc')", fail("Can't LIKE 5 and abc")],
      ['1 = 1 != FALSE', T],
      ["1 = 1 LIKE 'abc'", fail("Can't LIKE TRUE and abc")],
      ['1 = (1 AND TRUE)', fail("Can't and 1 and TRUE")],
      ['1 != 2 = TRUE', T],
      ["'abc' LIKE 'abc' != FALSE", T],
      ["'abc' LIKE 'abc' AND TRUE", T],
      ["'abc' LIKE ('abc' AND TRUE)", fail("Can't and abc and TRUE")],
      ['FALSE AND TRUE OR TRUE', T],
      ['FALSE AND (TRUE OR TRUE)', F],
    ])('%s', check);
  });

  it('should evaluate both sides of AND and OR', () => {
    expect(errorOf(() => run('FALSE AND 1/0 = 1')).message).toBe("Can't divide by zero");
    expect(errorOf(() => run('TRUE OR 1/0 = 1')).message).toBe("Can't divide by zero");
  });

  it('should report error codes', () => {
    expect(errorOf(() => run('1 / 0'))).toMatchObject({ code: ValueErrorCode.DIVIDE_BY_ZERO });
    expect(errorOf(() => run('-1!'))).toMatchObject({ code: ValueErrorCode.NEGATIVE_FACTORIAL });
    expect(errorOf(() => run('1 + TRUE'))).toMatchObject({ code: ValueErrorCode.TYPE_MISMATCH });
  });

  describe('columns', () => {
    const row = createRowContext({
      qty: integerValue(4n),
      price: floatValue(2.5),
      'orders.qty': integerValue(7n),
      note: NULL,
    });

    it('should resolve bare and qualified columns', () => {
      expect(run('qty * price', row)).toEqual(flt(10));
      expect(run('orders.qty', row)).toEqual(int(7n));
      expect(run('items.price', row)).toEqual(flt(2.5));
      expect(run('note IS NULL', row)).toEqual(T);
    });

    it('should not resolve inherited properties', () => {
      const error = errorOf(() => run('toString', row));
      expect(error).toBeInstanceOf(LookupError);
      expect(error).toMatchObject({
        message: 'Column toString not found',
        code: LookupErrorCode.COLUMN_NOT_FOUND,
      });
    });

    it('should name qualified columns in lookup errors', () => {
      expect(errorOf(() => run('t.missing', row)).message).toBe('Column t.missing not found');
    });

    it('should fail without a row context', () => {
      expect(errorOf(() => run('1 + qty'))).toMatchObject({
        message: 'No row context to resolve column qty',
        code: LookupErrorCode.NO_ROW,
      });
    });

    it('should propagate errors raised by the context', () => {
      const context: RowContext = {
        resolve(column) {
          throw new Error(`denied: ${column.name}`);
        },
      };
      expect(errorOf(() => run('secret + 1', context)).message).toBe('denied: secret');
    });

    it('should evaluate one tree against many rows', () => {
      const expr = parseExpression('qty * 2');
      const results = [1n, 2n, 3n].map(qty => evaluate(expr, createRowContext({ qty: integerValue(qty) })));
      expect(results).toEqual([int(2n), int(4n), int(6n)]);
    });
  });

  describe('isConstant', () => {
    it('should detect column references anywhere in the tree', () => {
      expect(isConstant(parseExpression('1 + 2 * -3!'))).toBe(true);
      expect(isConstant(parseExpression('1 + (2 * x) IS NULL'))).toBe(false);
      expect(isConstant(parseExpression('NOT t.flag'))).toBe(false);
    });
  });
});
