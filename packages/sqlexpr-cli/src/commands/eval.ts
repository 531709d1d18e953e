import {
  createRowContext,
  formatFloat,
  formatLiteral,
  type ExpressionEngine,
  type Value,
} from 'sqlexpr';

export interface EvalOptions {
  /** `name=<literal>` column bindings */
  set?: string[];
  /** Print `{ "type", "value" }` JSON instead of a literal */
  json?: boolean;
}

export interface EvalResult {
  value: Value;
  output: string;
  /** Columns bound more than once; the last binding wins */
  rebound: string[];
}

export interface Binding {
  name: string;
  value: Value;
}

/**
 * Split `name=<expression>` and evaluate the right-hand side as a constant
 */
export function parseBinding(assignment: string, engine: ExpressionEngine): Binding {
  const separator = assignment.indexOf('=');
  const name = separator < 0 ? '' : assignment.slice(0, separator).trim();
  if (name === '') {
    throw new Error(`Invalid binding '${assignment}', expected name=<literal>`);
  }
  return { name, value: engine.evaluate(assignment.slice(separator + 1)) };
}

/**
 * JSON-safe form of a value: integers as decimal strings, non-finite floats
 * by their literal names
 */
export function toJSONValue(value: Value): null | boolean | number | string {
  switch (value.type) {
    case 'null':
      return null;
    case 'integer':
      return value.value.toString();
    case 'float':
      return Number.isFinite(value.value) ? value.value : formatFloat(value.value);
    case 'boolean':
    case 'string':
      return value.value;
  }
}

export function evaluateCommand(
  expression: string,
  options: EvalOptions,
  engine: ExpressionEngine
): EvalResult {
  const row: Record<string, Value> = {};
  const rebound: string[] = [];

  for (const assignment of options.set ?? []) {
    const { name, value } = parseBinding(assignment, engine);
    if (Object.prototype.hasOwnProperty.call(row, name)) {
      rebound.push(name);
    }
    row[name] = value;
  }

  const value = engine.evaluate(expression, createRowContext(row));
  const output = options.json
    ? JSON.stringify({ type: value.type, value: toJSONValue(value) })
    : formatLiteral(value);

  return { value, output, rebound };
}
