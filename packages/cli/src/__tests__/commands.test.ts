import { describe, it, expect } from 'vitest';
import type { WaymarkConfig } from 'waymark-shared';
import { buildRouteSet, formatRouteTable } from '../commands/routes.js';
import { generateUrl, parseUrlArgs } from '../commands/url.js';
import { isSilent, useColor } from '../utils/reporter.js';

const config: WaymarkConfig = {
  routes: [
    { name: 'person', path: '/people/:id(.:format)' },
    { path: '/:controller(/:action)' },
  ],
  request: { host: 'example.com' },
};

// ─── parseUrlArgs ────────────────────────────────────────────────────────────

describe('parseUrlArgs', () => {
  it('splits a route name from key=value params', () => {
    expect(parseUrlArgs(['person', 'id=1', 'format=json'])).toEqual({
      name: 'person',
      params: { id: '1', format: 'json' },
    });
  });

  it('returns a null name when only params are given', () => {
    expect(parseUrlArgs(['controller=posts'])).toEqual({ name: null, params: { controller: 'posts' } });
  });

  it('collects repeated keys into an array', () => {
    expect(parseUrlArgs(['tags=a', 'tags=b', 'tags=c']).params).toEqual({ tags: ['a', 'b', 'c'] });
  });

  it('splits on the first equals sign only', () => {
    expect(parseUrlArgs(['q=a=b']).params).toEqual({ q: 'a=b' });
  });

  it('rejects a second route name', () => {
    expect(() => parseUrlArgs(['person', 'post'])).toThrow(
      'Unexpected argument "post": route name already given as "person"',
    );
  });

  it('rejects a param without a name', () => {
    expect(() => parseUrlArgs(['=1'])).toThrow('Missing parameter name in "=1"');
  });
});

// ─── generateUrl ─────────────────────────────────────────────────────────────

describe('generateUrl', () => {
  const routes = buildRouteSet(config);

  it('generates a path from a named route', () => {
    expect(generateUrl(routes, config, { name: 'person', params: { id: '1' } })).toBe('/people/1');
  });

  it('generates a full URL with --full', () => {
    expect(generateUrl(routes, config, { name: 'person', params: { id: '1' } }, { full: true })).toBe(
      'http://example.com/people/1',
    );
  });

  it('follows onlyPath from the config', () => {
    const fullUrls: WaymarkConfig = { ...config, onlyPath: false };
    expect(generateUrl(routes, fullUrls, { name: 'person', params: { id: '1' } })).toBe(
      'http://example.com/people/1',
    );
    expect(generateUrl(routes, fullUrls, { name: 'person', params: { id: '1' } }, { full: false })).toBe(
      '/people/1',
    );
  });

  it('uses the configured port', () => {
    const withPort: WaymarkConfig = { ...config, request: { host: 'example.com', port: 8080 } };
    expect(generateUrl(routes, withPort, { name: 'person', params: { id: '1' } }, { full: true })).toBe(
      'http://example.com:8080/people/1',
    );
  });

  it('finds a route from params alone', () => {
    expect(generateUrl(routes, config, parseUrlArgs(['controller=posts', 'page=2']))).toBe('/posts?page=2');
  });
});

// ─── formatRouteTable ────────────────────────────────────────────────────────

describe('formatRouteTable', () => {
  it('aligns the name, pattern and matcher columns', () => {
    const routes = buildRouteSet({
      routes: [{ name: 'person', path: '/people/:id(.:format)' }, { path: '/about' }],
    });
    const person = new RegExp('^/people/([^/.?]+)(\\.([^/.?]+))?$').source;
    const about = new RegExp('^/about$').source;

    expect(formatRouteTable(routes).split('\n')).toEqual([
      `person  /people/:id(.:format)  ${person}  /people`,
      `        /about                 ${about.padEnd(person.length)}  /about`,
    ]);
  });

  it('colors each column when enabled', () => {
    const routes = buildRouteSet({ routes: [{ name: 'home', path: '/' }] });
    const source = new RegExp('^/$').source;

    expect(formatRouteTable(routes, { color: true })).toBe(
      `\x1b[36mhome\x1b[39m  \x1b[1m/\x1b[22m  \x1b[2m${source}\x1b[22m  /`,
    );
  });

  it('reports an empty table', () => {
    expect(formatRouteTable(buildRouteSet({}))).toBe('No routes configured');
  });
});

// ─── reporter ────────────────────────────────────────────────────────────────

describe('isSilent', () => {
  it('is enabled by the --silent flag', () => {
    expect(isSilent(['node', 'waymark', 'routes', '--silent'], {})).toBe(true);
  });

  it('is enabled by WAYMARK_SILENT=1', () => {
    expect(isSilent(['node', 'waymark'], { WAYMARK_SILENT: '1' })).toBe(true);
  });

  it('is off by default', () => {
    expect(isSilent(['node', 'waymark'], {})).toBe(false);
  });
});

describe('useColor', () => {
  it('is disabled by --no-color', () => {
    expect(useColor(['node', 'waymark', '--no-color'], { FORCE_COLOR: '1' })).toBe(false);
  });

  it('is disabled by NO_COLOR', () => {
    expect(useColor(['node', 'waymark'], { NO_COLOR: '', FORCE_COLOR: '1' })).toBe(false);
  });

  it('is forced by FORCE_COLOR', () => {
    expect(useColor(['node', 'waymark'], { FORCE_COLOR: '1' })).toBe(true);
  });
});
