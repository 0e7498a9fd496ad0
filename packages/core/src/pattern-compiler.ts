import type { Requirement } from 'waymark-shared';
import { PatternSyntaxError } from './errors.js';
import {
  countCaptures,
  indexNamedCaptures,
  pickCapture,
  type NamedCapturePattern,
} from './named-captures.js';
import { stripAnchors } from './static-segments.js';

// ─── Segment tree ─────────────────────────────────────────────────────────────

/**
 * A `:name` or `*name` slot. `requirement` is the anchored form of the
 * capture body, used to validate generated values.
 */
export interface DynamicSegment {
  type: 'dynamic';
  name: string;
  glob: boolean;
  requirement: RegExp;
}

/** A parenthesized optional sub-pattern. */
export interface OptionalGroup {
  type: 'optional';
  segments: Segment[];
}

/** Literal text, a dynamic slot, or an optional group. */
export type Segment = string | DynamicSegment | OptionalGroup;

export interface CompiledPattern extends NamedCapturePattern {
  /** The route-definition string this was compiled from. */
  readonly pattern: string;
  readonly segments: readonly Segment[];
}

/** `:name` matches one segment, stopping at separators. */
export const DEFAULT_SEGMENT_SOURCE = '[^/.?]+';
/** `*name` crosses segment boundaries. */
export const GLOB_SEGMENT_SOURCE = '.*';

const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y;
const REGEXP_META = /[\\^$.|?*+()[\]{}]/g;

function escapeLiteral(text: string): string {
  return text.replace(REGEXP_META, '\\$&');
}

// Flags that change what a source matches. Compiled patterns carry none.
const MATCHING_FLAGS = /[imsuv]/;

/** A requirement's source with its own `^`/`$` anchors removed. */
export function requirementSource(requirement: Requirement): string {
  return stripAnchors(typeof requirement === 'string' ? requirement : requirement.source);
}

// ─── Parser ───────────────────────────────────────────────────────────────────

/**
 * Recursive-descent parser over a route-definition string.
 *
 * Produces the regex source and the segment tree in one left-to-right pass,
 * recording a name for every capture it emits: the segment name, `null` for
 * the optional group itself, and `null` for any groups inside a requirement.
 */
class SegmentParser {
  private index = 0;
  readonly names: Array<string | null> = [];

  constructor(
    private readonly pattern: string,
    private readonly requirements: Readonly<Record<string, Requirement>>,
  ) {}

  parse(): { source: string; segments: Segment[] } {
    return this.parseSequence(0);
  }

  private parseSequence(depth: number): { source: string; segments: Segment[] } {
    let source = '';
    const segments: Segment[] = [];
    let literal = '';

    const flushLiteral = () => {
      if (literal) {
        segments.push(literal);
        literal = '';
      }
    };

    while (this.index < this.pattern.length) {
      const ch = this.pattern[this.index];

      if (ch === ')') {
        if (depth === 0) {
          throw new PatternSyntaxError('Unmatched ")"', this.pattern, this.index);
        }
        break;
      }

      if (ch === '(') {
        flushLiteral();
        const start = this.index++;
        this.names.push(null);
        const group = this.parseSequence(depth + 1);

        if (this.pattern[this.index] !== ')') {
          throw new PatternSyntaxError('Unterminated optional group', this.pattern, start);
        }
        if (group.segments.length === 0) {
          throw new PatternSyntaxError('Empty optional group', this.pattern, start);
        }
        this.index++;

        source += `(${group.source})?`;
        segments.push({ type: 'optional', segments: group.segments });
        continue;
      }

      if (ch === ':' || ch === '*') {
        flushLiteral();
        const dynamic = this.parseDynamic(ch === '*');
        source += `(${dynamic.source})`;
        segments.push(dynamic.segment);
        continue;
      }

      literal += ch;
      source += ch === '/' ? '/' : escapeLiteral(ch);
      this.index++;
    }

    flushLiteral();
    return { source, segments };
  }

  private parseDynamic(glob: boolean): { source: string; segment: DynamicSegment } {
    const start = this.index++;

    IDENTIFIER.lastIndex = this.index;
    const match = IDENTIFIER.exec(this.pattern);
    if (!match) {
      const token = glob ? '*' : ':';
      throw new PatternSyntaxError(`Expected a parameter name after "${token}"`, this.pattern, start);
    }
    this.index += match[0].length;

    const name = match[0];
    const requirement = this.requirements[name];
    if (requirement instanceof RegExp && MATCHING_FLAGS.test(requirement.flags)) {
      throw new PatternSyntaxError(
        `Requirement for "${name}" uses unsupported flags "${requirement.flags}"`,
        this.pattern,
        start,
      );
    }
    const body =
      requirement === undefined
        ? glob ? GLOB_SEGMENT_SOURCE : DEFAULT_SEGMENT_SOURCE
        : requirementSource(requirement);

    this.names.push(name);
    for (let extra = countCaptures(body); extra > 0; extra--) {
      this.names.push(null);
    }

    return {
      source: body,
      segment: {
        type: 'dynamic',
        name,
        glob,
        requirement: new RegExp(`^(?:${body})$`),
      },
    };
  }
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Compile a route-definition string into an anchored matcher.
 *
 * Captures are positional (JavaScript on Node.js 20 rejects duplicate group
 * names), so optional groups appear as `null` entries in `names`.
 *
 * @example
 * ```ts
 * const compiled = compilePattern('/people/:id(.:format)');
 * compiled.regexp;        // /^\/people\/([^/.?]+)(\.([^/.?]+))?$/
 * compiled.names;         // ['id', null, 'format']
 * compiled.namedCaptures; // { id: [1], format: [3] }
 * ```
 */
export function compilePattern(
  pattern: string,
  requirements: Readonly<Record<string, Requirement>> = {},
): CompiledPattern {
  const parser = new SegmentParser(pattern, requirements);
  const { source, segments } = parser.parse();
  const indexed = indexNamedCaptures(`^${source}$`, parser.names);

  return { ...indexed, pattern, segments };
}

/**
 * Match `input` against a compiled pattern and return its named values.
 * Names whose captures are all empty are left out.
 */
export function matchPattern(
  compiled: NamedCapturePattern,
  input: string,
): Record<string, string> | null {
  const match = compiled.regexp.exec(input);
  if (!match) return null;

  const params: Record<string, string> = {};
  for (const [name, positions] of Object.entries(compiled.namedCaptures)) {
    const value = pickCapture(match, positions);
    if (value !== undefined) params[name] = value;
  }
  return params;
}

/**
 * Every dynamic segment name in a segment list, optional groups included.
 */
export function segmentNames(segments: readonly Segment[]): string[] {
  const names: string[] = [];
  for (const segment of segments) {
    if (typeof segment === 'string') continue;
    if (segment.type === 'dynamic') {
      names.push(segment.name);
    } else {
      names.push(...segmentNames(segment.segments));
    }
  }
  return names;
}
