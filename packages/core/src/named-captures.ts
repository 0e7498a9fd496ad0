/**
 * Capture names in position order. `null` marks an anonymous capture so that
 * `names[i]` always describes capture `i + 1`.
 */
export type CaptureNames = ReadonlyArray<string | null>;

/**
 * Either a position-ordered name list (with `null` gaps) or a
 * name → 1-based capture position mapping.
 */
export type NamesDeclaration = CaptureNames | Readonly<Record<string, number>>;

/**
 * A regex plus the canonical record of which capture positions carry which
 * logical name.
 *
 * A name maps to more than one position only when it is declared in mutually
 * exclusive branches; for a single match at most one of them is non-empty.
 */
export interface NamedCapturePattern {
  readonly regexp: RegExp;
  readonly names: CaptureNames;
  readonly namedCaptures: Readonly<Record<string, readonly number[]>>;
}

// `(?:<name>...)` marks a group as named without engine support for it.
const COMMENT_MARKER = /\(\?:<([A-Za-z_$][\w$]*)>/y;
// `(?<name>...)`, but not the `(?<=` / `(?<!` lookbehinds.
const NATIVE_GROUP = /\(\?<([A-Za-z_$][\w$]*)>/y;

interface CaptureScan {
  /** Source with comment markers rewritten to plain capturing groups. */
  source: string;
  /** One entry per capturing group, in opening-parenthesis order. */
  captures: Array<string | null>;
}

/**
 * Walk a regex source and list its capturing groups.
 *
 * Escaped parentheses and parentheses inside character classes are skipped;
 * non-capturing groups and lookarounds are not counted.
 */
function scanCaptures(input: string): CaptureScan {
  let source = '';
  const captures: Array<string | null> = [];
  let inClass = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (ch === '\\') {
      source += input.slice(i, i + 2);
      i++;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
      source += ch;
      continue;
    }
    if (ch === '[') {
      inClass = true;
      source += ch;
      continue;
    }
    if (ch !== '(') {
      source += ch;
      continue;
    }
    if (input[i + 1] !== '?') {
      captures.push(null);
      source += ch;
      continue;
    }

    COMMENT_MARKER.lastIndex = i;
    const marker = COMMENT_MARKER.exec(input);
    if (marker) {
      captures.push(marker[1]);
      source += '(';
      i += marker[0].length - 1;
      continue;
    }

    NATIVE_GROUP.lastIndex = i;
    const named = NATIVE_GROUP.exec(input);
    if (named) {
      captures.push(named[1]);
      source += named[0];
      i += named[0].length - 1;
      continue;
    }

    source += ch;
  }

  return { source, captures };
}

/**
 * Number of capturing groups in a regex source.
 */
export function countCaptures(source: string): number {
  return scanCaptures(source).captures.length;
}

function isNameList(names: NamesDeclaration): names is CaptureNames {
  return Array.isArray(names);
}

function namesFromPositions(positions: Readonly<Record<string, number>>): Array<string | null> {
  const names: Array<string | null> = [];
  for (const [name, position] of Object.entries(positions)) {
    while (names.length < position) names.push(null);
    names[position - 1] = name;
  }
  return names;
}

function groupPositions(names: CaptureNames): Record<string, number[]> {
  const grouped: Record<string, number[]> = {};
  names.forEach((name, index) => {
    if (name === null) return;
    const positions = grouped[name] ?? [];
    positions.push(index + 1);
    grouped[name] = positions;
  });
  return grouped;
}

/**
 * Canonicalize a pattern and an optional names declaration into a
 * {@link NamedCapturePattern}.
 *
 * Without a declaration the names come from the pattern itself: native
 * `(?<name>...)` groups, or `(?:<name>...)` markers, which are rewritten to
 * plain capturing groups. A purely positional pattern yields no names.
 *
 * @example
 * ```ts
 * indexNamedCaptures(/\/foo\/([a-z]+)(\/([0-9]+))?/, ['name', null, 'id']).namedCaptures;
 * // { name: [1], id: [3] }
 * ```
 */
export function indexNamedCaptures(
  pattern: RegExp | string,
  declaration?: NamesDeclaration,
): NamedCapturePattern {
  const input = typeof pattern === 'string' ? pattern : pattern.source;
  const scan = scanCaptures(input);

  let regexp: RegExp;
  if (typeof pattern !== 'string' && scan.source === input) {
    regexp = pattern;
  } else {
    regexp = new RegExp(scan.source, typeof pattern === 'string' ? '' : pattern.flags);
  }

  let names: CaptureNames;
  if (declaration === undefined) {
    names = scan.captures.some((name) => name !== null) ? scan.captures : [];
  } else if (isNameList(declaration)) {
    names = [...declaration];
  } else {
    names = namesFromPositions(declaration);
  }

  return { regexp, names, namedCaptures: groupPositions(names) };
}

/**
 * First non-empty capture among a name's positions.
 */
export function pickCapture(
  match: RegExpExecArray,
  positions: readonly number[],
): string | undefined {
  for (const position of positions) {
    const value = match[position];
    if (value !== undefined && value !== '') return value;
  }
  return undefined;
}
