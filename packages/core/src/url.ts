import qs from 'qs';
import type { Params, RequestFields } from 'waymark-shared';

// Anything outside RFC 3986 pchar (plus `%`, so escaped input stays as is).
const UNSAFE_PATH_CHARS = /[^-_.!~*'()a-zA-Z\d:@&=+$,;%]/gu;
const LONE_SURROGATE = /^[\uD800-\uDFFF]$/;
// U+FFFD in UTF-8, as URL serializers write an unpaired surrogate.
const ENCODED_REPLACEMENT_CHAR = '%EF%BF%BD';

export const DEFAULT_PORTS: Readonly<Record<string, number>> = {
  http: 80,
  https: 443,
  ws: 80,
  wss: 443,
};

/**
 * Percent-encode a value for use inside a path segment. An unpaired
 * surrogate has no UTF-8 form and is written as U+FFFD.
 */
export function escapeUri(value: string): string {
  return value.replace(UNSAFE_PATH_CHARS, (ch) =>
    LONE_SURROGATE.test(ch) ? ENCODED_REPLACEMENT_CHAR : encodeURIComponent(ch),
  );
}

/**
 * Build a query string from possibly nested parameters:
 * `{ tags: ['a', 'b'], page: { size: 10 } }` → `tags%5B%5D=a&tags%5B%5D=b&page%5Bsize%5D=10`.
 */
export function buildNestedQuery(params: Params): string {
  return qs.stringify(params, { arrayFormat: 'brackets', format: 'RFC1738', skipNulls: true });
}

/**
 * Read-through view over a request: generated fields win, the rest come from
 * the wrapped request.
 */
export class RequestProxy implements RequestFields {
  constructor(
    private readonly request: RequestFields,
    private readonly overrides: Partial<RequestFields>,
  ) {}

  get scheme(): string {
    return this.overrides.scheme ?? this.request.scheme;
  }

  get host(): string {
    return this.overrides.host ?? this.request.host;
  }

  get port(): number {
    return this.overrides.port ?? this.request.port;
  }

  get scriptName(): string {
    return this.overrides.scriptName ?? this.request.scriptName;
  }

  get pathInfo(): string {
    return this.overrides.pathInfo ?? this.request.pathInfo;
  }

  get queryString(): string {
    return this.overrides.queryString ?? this.request.queryString;
  }
}

/**
 * `scriptName + pathInfo`, plus `?query` when there is one.
 */
export function reconstructPath(req: RequestFields): string {
  let url = `${req.scriptName}${req.pathInfo}`;
  if (req.queryString) url += `?${req.queryString}`;
  return url;
}

/**
 * Fully qualified URL. The port is left out when it is the scheme's default.
 */
export function reconstructUrl(req: RequestFields): string {
  let url = `${req.scheme}://${req.host}`;
  if (DEFAULT_PORTS[req.scheme] !== req.port) url += `:${req.port}`;
  return url + reconstructPath(req);
}
