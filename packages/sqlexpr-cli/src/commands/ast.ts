import { formatExpression, formatFloat, type ExpressionEngine } from 'sqlexpr';

export interface AstOptions {
  /** Print canonical expression text instead of JSON */
  format?: boolean;
}

function jsonReplacer(key: string, value: unknown): unknown {
  if (key === 'location') {
    return undefined;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return formatFloat(value);
  }
  return value;
}

export function astCommand(expression: string, options: AstOptions, engine: ExpressionEngine): string {
  const ast = engine.parse(expression);
  return options.format ? formatExpression(ast) : JSON.stringify(ast, jsonReplacer, 2);
}
