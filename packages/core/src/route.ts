import type { ParamValue, Params, Requirement, RouteDefinition } from 'waymark-shared';
import {
  compilePattern,
  matchPattern,
  requirementSource,
  segmentNames,
  type CompiledPattern,
  type Segment,
} from './pattern-compiler.js';
import { extractStaticSegments } from './static-segments.js';

/** The URL parts a route can generate. */
export type UrlPart = 'host' | 'pathInfo';

export type UrlParts = Partial<Record<UrlPart, string>>;

export interface GenerateOptions {
  /** Applied to every value before it is checked and placed in a segment. */
  parameterize?: (name: string, value: string) => string;
}

export interface RouteGeneration {
  parts: UrlParts;
  /** Parameters no segment consumed and that differ from the route defaults. */
  params: Params;
}

/**
 * Statically known constraints a route places on generation keys: a literal
 * value, or a requirement that may not reduce to one.
 */
export type GenerationKeyValues = Readonly<Record<string, string | RegExp>>;

export function isPresent(value: ParamValue): boolean {
  return value !== undefined && value !== null && value !== false;
}

/**
 * String form of a parameter for a path segment or a generation key.
 * Arrays join with `/` (glob values); nested objects have no path form.
 */
export function toParamString(value: ParamValue): string | null {
  if (!isPresent(value)) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    const parts = value.map(toParamString);
    return parts.every((part): part is string => part !== null) ? parts.join('/') : null;
  }
  return null;
}

const CLEAR_REMAINING = Symbol('clear-remaining');

/**
 * Fills one compiled pattern's segments from parameters.
 */
class SegmentGenerator {
  /** Top-level names with no default: generation fails without them. */
  readonly requiredParams: readonly string[];
  /** Defaults the pattern never captures: the caller must ask for exactly these. */
  readonly requiredDefaults: Readonly<Record<string, string>>;
  readonly captured: ReadonlySet<string>;

  constructor(
    private readonly compiled: CompiledPattern,
    private readonly defaults: Readonly<Record<string, string>>,
  ) {
    this.captured = new Set(segmentNames(compiled.segments));
    this.requiredParams = compiled.segments
      .filter((s): s is Exclude<Segment, string> => typeof s !== 'string')
      .flatMap((s) => (s.type === 'dynamic' && !(s.name in defaults) ? [s.name] : []));

    const required: Record<string, string> = {};
    for (const [key, value] of Object.entries(defaults)) {
      if (!this.captured.has(key)) required[key] = value;
    }
    this.requiredDefaults = required;
  }

  get significant(): boolean {
    return this.requiredParams.length > 0 || Object.keys(this.requiredDefaults).length > 0;
  }

  generate(
    params: Params,
    merged: Params,
    options: GenerateOptions,
    consumed: Set<string>,
  ): string | null {
    if (!this.requiredParams.every((name) => isPresent(merged[name]))) return null;
    for (const [key, value] of Object.entries(this.requiredDefaults)) {
      if (toParamString(merged[key]) !== value) return null;
    }

    const result = this.fill(this.compiled.segments, params, merged, options, consumed, false);
    return typeof result === 'string' ? result : null;
  }

  private parameterize(
    segment: { name: string; glob: boolean },
    value: ParamValue,
    options: GenerateOptions,
  ): string | null {
    const text = toParamString(value);
    if (text === null || !options.parameterize) return text;

    const { parameterize } = options;
    if (segment.glob) {
      return text
        .split('/')
        .map((piece) => parameterize(segment.name, piece))
        .join('/');
    }
    return parameterize(segment.name, text);
  }

  private fill(
    segments: readonly Segment[],
    params: Params,
    merged: Params,
    options: GenerateOptions,
    consumed: Set<string>,
    optional: boolean,
  ): string | null | typeof CLEAR_REMAINING {
    if (optional) {
      if (segments.every((s) => typeof s === 'string')) return '';
      if (!segmentNames(segments).some((name) => Object.hasOwn(params, name))) return '';

      for (const segment of segments) {
        if (typeof segment === 'string' || segment.type !== 'dynamic') continue;
        const fallback = this.defaults[segment.name];
        const value = this.parameterize(
          segment,
          isPresent(merged[segment.name]) ? merged[segment.name] : fallback,
          options,
        );
        if (value === null || !segment.requirement.test(value)) return '';

        // A value equal to its default makes the rest of the group redundant.
        const mergedValue = this.parameterize(segment, merged[segment.name], options);
        const defaultValue = this.parameterize(segment, fallback, options);
        if (mergedValue === defaultValue) return CLEAR_REMAINING;
      }
    }

    let path = '';
    for (const segment of segments) {
      if (typeof segment === 'string') {
        path += segment;
      } else if (segment.type === 'dynamic') {
        const raw = [params[segment.name], merged[segment.name], this.defaults[segment.name]].find(isPresent);
        const value = this.parameterize(segment, raw, options);
        if (value === null || !segment.requirement.test(value)) return null;
        path += value;
      } else {
        const group = this.fill(segment.segments, params, merged, options, consumed, true);
        if (group === CLEAR_REMAINING) {
          for (const s of segment.segments) {
            if (typeof s !== 'string' && s.type === 'dynamic') consumed.add(s.name);
          }
        } else if (group !== null) {
          path += group;
        }
      }
    }

    for (const segment of segments) {
      if (typeof segment !== 'string' && segment.type === 'dynamic') consumed.add(segment.name);
    }
    return path;
  }
}

/**
 * A compiled route: the unit of both recognition and generation.
 *
 * Immutable once constructed. A route is "significant" when it has required
 * path parameters or required defaults, which is what lets the route set
 * find it from a bare parameter set; other routes are reachable by name only.
 */
export class Route {
  readonly name: string | undefined;
  readonly path: CompiledPattern;
  readonly host: CompiledPattern | undefined;
  readonly defaults: Readonly<Record<string, string>>;
  readonly requirements: Readonly<Record<string, Requirement>>;
  readonly significantParams: boolean;
  readonly generationKeys: GenerationKeyValues;

  private readonly generators: ReadonlyMap<UrlPart, SegmentGenerator>;
  /** Requirements on names no pattern captures and no default covers. */
  private readonly conditions: ReadonlyMap<string, RegExp>;

  constructor(definition: RouteDefinition) {
    this.name = definition.name;
    this.defaults = { ...definition.defaults };
    this.requirements = { ...definition.requirements };
    this.path = compilePattern(definition.path, this.requirements);
    this.host = definition.host === undefined ? undefined : compilePattern(definition.host, this.requirements);

    const generators = new Map<UrlPart, SegmentGenerator>();
    generators.set('pathInfo', new SegmentGenerator(this.path, this.defaults));
    if (this.host) generators.set('host', new SegmentGenerator(this.host, this.defaults));
    this.generators = generators;

    const captured = new Set<string>();
    for (const generator of generators.values()) {
      for (const name of generator.captured) captured.add(name);
    }

    const conditions = new Map<string, RegExp>();
    const keys: Record<string, string | RegExp> = {};
    for (const generator of generators.values()) {
      Object.assign(keys, generator.requiredDefaults);
    }
    for (const [name, requirement] of Object.entries(this.requirements)) {
      if (captured.has(name) || name in this.defaults) continue;
      const source = requirementSource(requirement);
      const flags = typeof requirement === 'string' ? '' : requirement.flags.replace(/[gy]/g, '');
      conditions.set(name, new RegExp(`^(?:${source})$`, flags));
      keys[name] = new RegExp(source, flags);
    }
    this.conditions = conditions;
    this.generationKeys = keys;

    this.significantParams =
      conditions.size > 0 || [...generators.values()].some((generator) => generator.significant);
  }

  /**
   * Generate the requested URL parts.
   *
   * Returns `null` when the path cannot be generated from `params` merged
   * over `recall`. A host that fails to generate is left out, so the
   * request's own host stays in place.
   */
  generate(
    parts: readonly UrlPart[],
    params: Params,
    recall: Params = {},
    options: GenerateOptions = {},
  ): RouteGeneration | null {
    const merged: Params = { ...recall, ...params };

    for (const [name, condition] of this.conditions) {
      const value = toParamString(merged[name]);
      if (value === null || !condition.test(value)) return null;
    }

    const generated: UrlParts = {};
    const consumed = new Set<string>();
    let any = false;

    for (const part of parts) {
      const generator = this.generators.get(part);
      if (!generator) continue;
      const partConsumed = new Set<string>();
      const text = generator.generate(params, merged, options, partConsumed);
      if (text === null) {
        if (part === 'host') continue;
        return null;
      }
      for (const name of partConsumed) consumed.add(name);
      generated[part] = text;
      any = true;
    }
    if (!any) return null;

    const leftover: Params = {};
    for (const [key, value] of Object.entries(params)) {
      if (consumed.has(key)) continue;
      if (key in this.defaults && toParamString(value) === this.defaults[key]) continue;
      leftover[key] = value;
    }

    return { parts: generated, params: leftover };
  }

  /**
   * Match a path (and host, when the route declares one). Defaults fill in
   * names the match leaves empty.
   */
  match(pathInfo: string, host?: string): Record<string, string> | null {
    const pathParams = matchPattern(this.path, pathInfo);
    if (!pathParams) return null;

    let hostParams: Record<string, string> = {};
    if (this.host) {
      if (host === undefined) return null;
      const matched = matchPattern(this.host, host);
      if (!matched) return null;
      hostParams = matched;
    }

    return { ...this.defaults, ...hostParams, ...pathParams };
  }

  /** Leading literal path segments, for static dispatch indexing. */
  staticSegments(): string[] {
    return extractStaticSegments(this.path.regexp);
  }
}
