// Characters that make the rest of a regex source non-literal.
const DYNAMIC_CHARS = new Set(['(', ')', '[', ']', '{', '}', '|', '?', '*', '+', '.', '^', '$']);

/** Drop a leading `^` and an unescaped trailing `$`. */
export function stripAnchors(source: string): string {
  let stripped = source.startsWith('^') ? source.slice(1) : source;
  if (stripped.endsWith('$') && !stripped.endsWith('\\$')) {
    stripped = stripped.slice(0, -1);
  }
  return stripped;
}

/**
 * True when the group opening at `index` starts with a separator, as in
 * `(\.json)?` or `(/:id)?`: the literal run before it is a whole segment.
 */
function groupStartsWithSeparator(source: string, index: number): boolean {
  let inner = source.slice(index + 1);
  if (inner.startsWith('?:')) inner = inner.slice(2);
  return inner.startsWith('/') || inner.startsWith('\\/') || inner.startsWith('\\.');
}

/**
 * Leading literal path segments every match of `pattern` must contain.
 *
 * Reads the source text without executing it. `/` and an escaped `\.` both
 * separate segments; the walk stops at the first segment holding a capture,
 * alternation, class, quantifier or wildcard.
 *
 * @example
 * ```ts
 * extractStaticSegments(/^\/foo\/(bar|baz)\/([a-z0-9]+)/); // ['foo']
 * extractStaticSegments(/^\/people\/show\/1$/);            // ['people', 'show', '1']
 * ```
 */
export function extractStaticSegments(pattern: RegExp | string): string[] {
  const source = stripAnchors(typeof pattern === 'string' ? pattern : pattern.source);
  const segments: string[] = [];
  let current = '';

  const endSegment = () => {
    if (current) segments.push(current);
    current = '';
  };

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];

    if (ch === '\\') {
      const next = source[i + 1];
      if (next === undefined || /[A-Za-z0-9]/.test(next)) return segments; // \d, \w, \b...
      i++;
      if (next === '/' || next === '.') {
        endSegment();
      } else {
        current += next;
      }
      continue;
    }

    if (ch === '/') {
      endSegment();
      continue;
    }

    if (DYNAMIC_CHARS.has(ch)) {
      if (ch === '(' && groupStartsWithSeparator(source, i)) endSegment();
      return segments;
    }

    current += ch;
  }

  endSegment();
  return segments;
}

/**
 * The literal a requirement matches when it matches exactly one string,
 * e.g. `/people/` → `"people"`; `undefined` for anything with alternatives.
 */
export function extractStaticLiteral(pattern: RegExp | string): string | undefined {
  if (pattern instanceof RegExp && pattern.flags.includes('i')) return undefined;

  const source = stripAnchors(typeof pattern === 'string' ? pattern : pattern.source);
  let literal = '';

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === '\\') {
      const next = source[i + 1];
      if (next === undefined || /[A-Za-z0-9]/.test(next)) return undefined;
      literal += next;
      i++;
      continue;
    }
    if (DYNAMIC_CHARS.has(ch)) return undefined;
    literal += ch;
  }

  return literal;
}
