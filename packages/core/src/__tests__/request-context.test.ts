import { describe, it, expect } from 'vitest';
import http from 'node:http';
import { Socket } from 'node:net';
import { createRequestContext } from '../request-context.js';

function createRequest(url: string, headers: http.IncomingHttpHeaders): http.IncomingMessage {
  const req = new http.IncomingMessage(new Socket());
  req.method = 'GET';
  req.url = url;
  req.headers = headers;
  return req;
}

describe('createRequestContext', () => {
  it('reads host, path and query from a plain request', () => {
    const ctx = createRequestContext({ req: createRequest('/people/1?page=2', { host: 'example.com' }) });
    expect(ctx).toEqual({
      scheme: 'http',
      host: 'example.com',
      port: 80,
      scriptName: '',
      pathInfo: '/people/1',
      queryString: 'page=2',
      params: {},
    });
  });

  it('reads an explicit port from the host header', () => {
    const ctx = createRequestContext({ req: createRequest('/', { host: 'localhost:3000' }) });
    expect(ctx.host).toBe('localhost');
    expect(ctx.port).toBe(3000);
  });

  it('strips the script name from the path', () => {
    const ctx = createRequestContext({
      req: createRequest('/app/people', { host: 'example.com' }),
      scriptName: '/app',
    });
    expect(ctx.scriptName).toBe('/app');
    expect(ctx.pathInfo).toBe('/people');
  });

  it('uses / when the path is the script name itself', () => {
    const ctx = createRequestContext({ req: createRequest('/app', { host: 'example.com' }), scriptName: '/app' });
    expect(ctx.pathInfo).toBe('/');
  });

  it('ignores x-forwarded-proto unless the proxy is trusted', () => {
    const headers = { host: 'example.com', 'x-forwarded-proto': 'https, http' };
    expect(createRequestContext({ req: createRequest('/', headers) }).scheme).toBe('http');

    const trusted = createRequestContext({ req: createRequest('/', headers), trustProxy: true });
    expect(trusted.scheme).toBe('https');
    expect(trusted.port).toBe(443);
  });

  it('carries recognized params for recall', () => {
    const ctx = createRequestContext({
      req: createRequest('/people/1', { host: 'example.com' }),
      params: { controller: 'people', id: '1' },
    });
    expect(ctx.params).toEqual({ controller: 'people', id: '1' });
  });

  it('falls back to localhost without a host header', () => {
    expect(createRequestContext({ req: createRequest('/', {}) }).host).toBe('localhost');
  });
});
