import type http from 'node:http';
import { TLSSocket } from 'node:tls';
import type { Params, RequestContext } from 'waymark-shared';
import { DEFAULT_PORTS } from './url.js';

export interface CreateRequestContextOptions {
  req: http.IncomingMessage;
  /** Mount point of the application, stripped from the path. */
  scriptName?: string;
  /** Parameters recognized for this request; recalled during generation. */
  params?: Params;
  /** Honour `x-forwarded-proto` (default: false). */
  trustProxy?: boolean;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw?.split(',')[0].trim() || undefined;
}

/**
 * Build a RequestContext from Node's IncomingMessage.
 */
export function createRequestContext(opts: CreateRequestContextOptions): RequestContext {
  const { req, scriptName = '', params = {}, trustProxy = false } = opts;

  const forwarded = trustProxy ? firstHeader(req.headers['x-forwarded-proto']) : undefined;
  const scheme = forwarded ?? (req.socket instanceof TLSSocket ? 'https' : 'http');
  const host = req.headers.host || 'localhost';
  const url = new URL(req.url || '/', `${scheme}://${host}`);

  let pathInfo = url.pathname;
  if (scriptName && pathInfo.startsWith(scriptName)) {
    pathInfo = pathInfo.slice(scriptName.length) || '/';
  }

  return {
    scheme,
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_PORTS[scheme] ?? 80,
    scriptName,
    pathInfo,
    queryString: url.search.slice(1),
    params,
  };
}
