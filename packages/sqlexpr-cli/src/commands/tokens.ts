import { formatColumn, formatLiteral, stringValue, tokenize, type Token } from 'sqlexpr';

/**
 * `type value @line:column`, with string literals and identifiers written
 * the way they would be typed
 */
export function formatToken(token: Token): string {
  const position = `@${token.location.line}:${token.location.column}`;

  let text: string;
  switch (token.type) {
    case 'string':
      text = formatLiteral(stringValue(token.value));
      break;
    case 'identifier':
      text = formatColumn({ name: token.value });
      break;
    case 'eof':
      return `${token.type} ${position}`;
    default:
      text = token.value;
  }

  return `${token.type} ${text} ${position}`;
}

export function tokensCommand(expression: string): string[] {
  return tokenize(expression).map(formatToken);
}
