/**
 * Row contexts
 *
 * The evaluator resolves column references through a RowContext supplied by
 * the caller. How rows are stored is not this module's concern; the
 * record-backed context here covers tests, the CLI and simple callers.
 *
 * @packageDocumentation
 */

import { createColumnNotFoundError } from '../errors/index.js';
import { columnName, type ColumnReference } from '../parser/types.js';
import type { Value } from '../value/types.js';

/**
 * Resolves a column reference to its value in the current row
 */
export interface RowContext {
  /**
   * @throws LookupError (or any caller-defined error) when the column cannot
   * be resolved
   */
  resolve(column: ColumnReference): Value;
}

/**
 * Build a row context from a record keyed by column name. Qualified
 * references look up `table.column` first, then the bare column name.
 *
 * @example
 * ```typescript
 * const row = createRowContext({ price: floatValue(9.5), 'orders.qty': integerValue(3n) });
 * evaluate(parseExpression('price * orders.qty'), row);
 * ```
 */
export function createRowContext(record: Readonly<Record<string, Value>>): RowContext {
  const lookup = (key: string): Value | undefined =>
    Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;

  return {
    resolve(column: ColumnReference): Value {
      const qualified = column.table === undefined ? undefined : lookup(columnName(column));
      const value = qualified ?? lookup(column.name);
      if (value === undefined) {
        throw createColumnNotFoundError(columnName(column));
      }
      return value;
    },
  };
}
