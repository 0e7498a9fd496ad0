/**
 * A value a caller may pass as a routing parameter.
 *
 * Scalars are coerced with `String()` when they land in a path segment.
 * Arrays and nested objects only survive into the query string.
 */
export type ParamValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | ParamValue[]
  | { [key: string]: ParamValue };

export type Params = Record<string, ParamValue>;

/**
 * Constraint on a named segment: a RegExp, or the source text of one.
 */
export type Requirement = RegExp | string;

/**
 * A route as declared by the application.
 */
export type RouteDefinition = {
  /** Segment string, e.g. `/people/:id(.:format)` */
  path: string;
  /** Optional host segment string, e.g. `:subdomain.example.com` */
  host?: string;
  /** Unique name used for direct generation */
  name?: string;
  /** Values used when generating and recalled into recognized params */
  defaults?: Record<string, string>;
  /** Per-name constraints compiled into the matcher */
  requirements?: Record<string, Requirement>;
};

/**
 * The request fields URL reconstruction reads.
 */
export type RequestFields = {
  scheme: string;
  host: string;
  port: number;
  scriptName: string;
  pathInfo: string;
  queryString: string;
};

/**
 * Request fields plus the parameters recognized for the current request,
 * which generation recalls as defaults.
 */
export type RequestContext = RequestFields & {
  params?: Params;
};

/**
 * waymark configuration file shape
 */
export type WaymarkConfig = {
  /** Project root (default: process.cwd()) */
  root?: string;
  /** Routes in registration order */
  routes?: RouteDefinition[];
  /** Request used by the CLI when reconstructing URLs */
  request?: Partial<RequestFields>;
  /** Print paths instead of full URLs (default: true) */
  onlyPath?: boolean;
};
