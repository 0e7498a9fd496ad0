import type { Params } from 'waymark-shared';

export class WaymarkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A route-definition string the compiler cannot parse.
 * `index` is the zero-based column where parsing failed.
 */
export class PatternSyntaxError extends WaymarkError {
  constructor(
    reason: string,
    readonly pattern: string,
    readonly index: number,
  ) {
    super(`${reason} at column ${index} of "${pattern}"`);
  }
}

/**
 * No route could generate a URL from the supplied parameters.
 */
export class RoutingError extends WaymarkError {
  constructor(
    message: string,
    readonly routeName: string | null,
    readonly params: Params,
  ) {
    super(message);
  }
}

/**
 * The route set was asked to generate before `rehash()` built its graph.
 */
export class RouteSetStateError extends WaymarkError {}

export function describeParams(params: Params): string {
  return JSON.stringify(params);
}
