/**
 * SQL LIKE pattern matching
 *
 * `%` matches any run of characters (including none), `_` exactly one.
 * A doubled wildcard, `%%` or `__`, matches one literal `%` or `_`.
 * Everything else matches itself, case-sensitively. Characters are Unicode
 * code points.
 *
 * Matching is dynamic programming over (text position, pattern position), so
 * patterns with many `%` stay polynomial.
 *
 * @packageDocumentation
 */

export type LikeElement =
  | { kind: 'any' }
  | { kind: 'one' }
  | { kind: 'literal'; char: string };

/**
 * Split a pattern into wildcard and literal elements
 */
export function compileLikePattern(pattern: string): LikeElement[] {
  const chars = Array.from(pattern);
  const elements: LikeElement[] = [];

  for (let i = 0; i < chars.length; i++) {
    const char = chars[i];
    if (char === '%' || char === '_') {
      if (chars[i + 1] === char) {
        elements.push({ kind: 'literal', char });
        i++;
      } else {
        elements.push(char === '%' ? { kind: 'any' } : { kind: 'one' });
      }
    } else {
      elements.push({ kind: 'literal', char });
    }
  }

  return elements;
}

/**
 * A LIKE pattern compiled once and matched against many strings
 *
 * @example
 * ```typescript
 * const matcher = new LikeMatcher('a_c%');
 * matcher.matches('abcdef'); // true
 * matcher.matches('acd');    // false
 * ```
 */
export class LikeMatcher {
  readonly pattern: string;
  private readonly elements: LikeElement[];

  constructor(pattern: string) {
    this.pattern = pattern;
    this.elements = compileLikePattern(pattern);
  }

  matches(text: string): boolean {
    const chars = Array.from(text);
    const elements = this.elements;
    const n = elements.length;

    // row[j]: the first j elements match the text consumed so far
    let row: boolean[] = new Array<boolean>(n + 1).fill(false);
    row[0] = true;
    for (let j = 1; j <= n; j++) {
      row[j] = row[j - 1] && elements[j - 1].kind === 'any';
    }

    for (const char of chars) {
      const next: boolean[] = new Array<boolean>(n + 1).fill(false);
      for (let j = 1; j <= n; j++) {
        const element = elements[j - 1];
        switch (element.kind) {
          case 'any':
            next[j] = next[j - 1] || row[j];
            break;
          case 'one':
            next[j] = row[j - 1];
            break;
          case 'literal':
            next[j] = row[j - 1] && element.char === char;
            break;
        }
      }
      row = next;
    }

    return row[n];
  }
}

/**
 * Whether `text` matches the LIKE `pattern`
 */
export function matchesLike(text: string, pattern: string): boolean {
  return new LikeMatcher(pattern).matches(text);
}
