import { log } from 'waymark-shared';
import type { Params, RequestContext, RouteDefinition } from 'waymark-shared';
import { RouteSetStateError, RoutingError, describeParams } from './errors.js';
import { GenerationGraph, type GraphShape } from './generation-graph.js';
import { KeyFrequencyAnalyzer } from './key-frequency.js';
import { Route, isPresent, toParamString, type GenerateOptions, type UrlPart, type UrlParts } from './route.js';
import { RequestProxy, buildNestedQuery, escapeUri, reconstructPath, reconstructUrl } from './url.js';

export interface RouteSetOptions {
  /** Escapes a value placed in a path segment (default: {@link escapeUri}). */
  escape?: (name: string, value: string) => string;
  /** Builds the query string from leftover params (default: {@link buildNestedQuery}). */
  buildQuery?: (params: Params) => string;
}

export type RouteSetState = 'unbuilt' | 'built' | 'stale';

export interface GenerationResult {
  parts: UrlParts;
  params: Params;
}

export interface RecognitionResult {
  route: Route;
  params: Record<string, string>;
}

/** Params accepted by {@link RouteSet.url}; `onlyPath: false` asks for a full URL. */
export type UrlParams = Params & { onlyPath?: boolean };

/** Keys and graph from one `rehash()`, swapped in as a single reference. */
interface GenerationSnapshot {
  keys: readonly string[];
  graph: GenerationGraph<Route>;
}

const URL_PARTS: readonly UrlPart[] = ['host', 'pathInfo'];

/**
 * The route catalogue plus its generation index.
 *
 * Routes are added during setup; `rehash()` then builds the generation keys
 * and graph. Adding a route afterwards marks the set stale until the next
 * `rehash()`.
 *
 * @example
 * ```ts
 * const routes = new RouteSet();
 * routes.addRoute({ name: 'person', path: '/people/:id(.:format)' });
 * routes.rehash();
 *
 * routes.url(request, 'person', { id: '1', format: 'json' }); // '/people/1.json'
 * ```
 */
export class RouteSet {
  private readonly routes: Route[] = [];
  private readonly namedRoutes = new Map<string, Route>();
  private analyzer: KeyFrequencyAnalyzer | null = new KeyFrequencyAnalyzer();
  private snapshot: GenerationSnapshot | null = null;
  private built = false;

  private readonly escape: (name: string, value: string) => string;
  private readonly buildQuery: (params: Params) => string;

  constructor(options: RouteSetOptions = {}) {
    this.escape = options.escape ?? ((_name, value) => escapeUri(value));
    this.buildQuery = options.buildQuery ?? buildNestedQuery;
  }

  get state(): RouteSetState {
    if (this.snapshot) return 'built';
    return this.built ? 'stale' : 'unbuilt';
  }

  get size(): number {
    return this.routes.length;
  }

  /** Generation keys of the current build, most discriminating first. */
  get generationKeys(): readonly string[] {
    return this.requireSnapshot().keys;
  }

  addRoute(definition: RouteDefinition): Route {
    const route = new Route(definition);
    this.routes.push(route);

    if (route.name !== undefined) {
      if (this.namedRoutes.has(route.name)) {
        log.warn(`Route "${route.name}" redefined by ${definition.path}`);
      }
      this.namedRoutes.set(route.name, route);
    }

    if (this.analyzer) {
      this.analyzer.observe(route.generationKeys);
    }
    this.snapshot = null;
    return route;
  }

  route(name: string): Route | undefined {
    return this.namedRoutes.get(name);
  }

  /**
   * Build the generation keys and graph from the registered routes.
   * The analyzer is released once the graph exists.
   */
  rehash(): void {
    const analyzer = this.analyzer ?? this.observeAll();
    const keys = analyzer.report();
    const possible = analyzer.possibleKeys;

    const graph = GenerationGraph.build(this.routes, (route, index) =>
      route.significantParams ? keys.map((key) => possible[index][key] ?? null) : null,
    );

    this.snapshot = { keys, graph };
    this.built = true;
    this.analyzer = null;
  }

  /** The generation graph as plain data, routes labelled by name or path. */
  graphShape(): GraphShape {
    return this.requireSnapshot().graph.shape((route) => route.name ?? route.path.pattern);
  }

  /** Candidate routes for a parameter set, in registration order. */
  candidates(params: Params): readonly Route[] {
    const { keys, graph } = this.requireSnapshot();
    return graph.lookup(keys.map((key) => toParamString(params[key])));
  }

  /**
   * Generate raw URL parts.
   *
   * With a name, only that route is tried, with its defaults under `recall`.
   * With `null`, the generation graph supplies candidates for `recall`
   * merged with `params`, and the first route that generates wins.
   *
   * @throws {RoutingError} when no route can generate from the params
   * @throws {RouteSetStateError} when called before `rehash()` or while stale
   */
  generate(
    parts: UrlPart | readonly UrlPart[],
    name: string | null,
    params: Params = {},
    recall: Params = {},
    options: GenerateOptions = {},
  ): GenerationResult {
    const snapshot = this.requireSnapshot();
    const requested = typeof parts === 'string' ? [parts] : parts;

    if (name !== null) {
      const route = this.namedRoutes.get(name);
      if (!route) {
        throw new RoutingError(`${name} failed to generate from ${describeParams(params)}`, name, params);
      }
      const result = route.generate(requested, params, { ...route.defaults, ...recall }, options);
      if (!result) {
        throw new RoutingError(`${name} failed to generate from ${describeParams(params)}`, name, params);
      }
      return result;
    }

    const merged: Params = { ...recall, ...params };
    const values = snapshot.keys.map((key) => toParamString(merged[key]));

    for (const route of snapshot.graph.lookup(values)) {
      if (!route.significantParams) continue;
      const result = route.generate(requested, params, recall, options);
      if (result) return result;
    }

    throw new RoutingError(`No route matches ${describeParams(params)}`, null, params);
  }

  /**
   * Generate a URL string for a request.
   *
   * Recall comes from `request.params`. Paths are returned unless
   * `onlyPath: false` is passed, which yields `scheme://host[:port]/...`.
   *
   * @example
   * ```ts
   * routes.url(request, 'dashboard');                      // '/dashboard'
   * routes.url(request, 'dashboard', { onlyPath: false }); // 'http://example.com/dashboard'
   * routes.url(request, { controller: 'people', action: 'show', id: '1' });
   * ```
   */
  url(request: RequestContext, name: string, params?: UrlParams): string;
  url(request: RequestContext, params: UrlParams): string;
  url(request: RequestContext, nameOrParams: string | UrlParams, maybeParams: UrlParams = {}): string {
    const name = typeof nameOrParams === 'string' ? nameOrParams : null;
    const { onlyPath = true, ...params } = typeof nameOrParams === 'string' ? maybeParams : nameOrParams;

    const result = this.generate(URL_PARTS, name, params, request.params ?? {}, {
      parameterize: this.escape,
    });

    const query: Params = {};
    for (const [key, value] of Object.entries(result.params)) {
      if (isPresent(value)) query[key] = value;
    }

    const req = new RequestProxy(request, {
      host: result.parts.host,
      pathInfo: result.parts.pathInfo,
      queryString: this.buildQuery(query),
    });
    return onlyPath ? reconstructPath(req) : reconstructUrl(req);
  }

  /**
   * First route, in registration order, whose patterns match.
   */
  recognize(pathInfo: string, host?: string): RecognitionResult | null {
    for (const route of this.routes) {
      const params = route.match(pathInfo, host);
      if (params) return { route, params };
    }
    return null;
  }

  /** Each route's static path prefix, in registration order. */
  staticPrefixes(): Array<{ route: Route; segments: string[] }> {
    return this.routes.map((route) => ({ route, segments: route.staticSegments() }));
  }

  private observeAll(): KeyFrequencyAnalyzer {
    const analyzer = new KeyFrequencyAnalyzer();
    for (const route of this.routes) analyzer.observe(route.generationKeys);
    return analyzer;
  }

  private requireSnapshot(): GenerationSnapshot {
    if (!this.snapshot) {
      throw new RouteSetStateError(
        this.built
          ? 'Route set changed since the last rehash(); call rehash() before generating'
          : 'Route set not built; call rehash() before generating',
      );
    }
    return this.snapshot;
  }
}
