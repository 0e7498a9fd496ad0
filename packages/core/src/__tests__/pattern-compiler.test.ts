import { describe, it, expect } from 'vitest';
import { compilePattern, matchPattern, segmentNames } from '../pattern-compiler.js';
import { PatternSyntaxError } from '../errors.js';

/** Source text of the regex a compiled pattern should equal. */
function source(pattern: string): string {
  return new RegExp(pattern).source;
}

// ─── Static patterns ──────────────────────────────────────────────────────────

describe('compilePattern with static strings', () => {
  it('anchors a simple path', () => {
    const compiled = compilePattern('/foo');
    expect(compiled.regexp.source).toBe(source('^/foo$'));
    expect(compiled.names).toEqual([]);
    expect(compiled.namedCaptures).toEqual({});
  });

  it('keeps every literal segment', () => {
    const compiled = compilePattern('/people/show/1');
    expect(compiled.regexp.source).toBe(source('^/people/show/1$'));
    expect(compiled.names).toEqual([]);
  });

  it('escapes regex metacharacters in literals', () => {
    const compiled = compilePattern('/search+more');
    expect(compiled.regexp.source).toBe(source('^/search\\+more$'));
    expect(compiled.regexp.test('/search+more')).toBe(true);
    expect(compiled.regexp.test('/searchhmore')).toBe(false);
  });
});

// ─── Dynamic segments ─────────────────────────────────────────────────────────

describe('compilePattern with dynamic segments', () => {
  it('compiles each :name to a default capture', () => {
    const compiled = compilePattern('/foo/:action/:id');
    expect(compiled.regexp.source).toBe(source('^/foo/([^/.?]+)/([^/.?]+)$'));
    expect(compiled.names).toEqual(['action', 'id']);
    expect(compiled.namedCaptures).toEqual({ action: [1], id: [2] });
  });

  it('uses requirements as capture bodies', () => {
    const compiled = compilePattern('/foo/:action/:id', { action: /bar|baz/, id: /[a-z0-9]+/ });
    expect(compiled.regexp.source).toBe(source('^/foo/(bar|baz)/([a-z0-9]+)$'));
    expect(compiled.names).toEqual(['action', 'id']);
    expect(compiled.namedCaptures).toEqual({ action: [1], id: [2] });
  });

  it('accepts requirement source strings', () => {
    const compiled = compilePattern('/items/:id', { id: '\\d+' });
    expect(compiled.regexp.source).toBe(source('^/items/(\\d+)$'));
  });

  it('escapes the period before a format segment', () => {
    const compiled = compilePattern('/foo/:id.:format');
    expect(compiled.regexp.source).toBe(source('^/foo/([^/.?]+)\\.([^/.?]+)$'));
    expect(compiled.names).toEqual(['id', 'format']);
    expect(compiled.namedCaptures).toEqual({ id: [1], format: [2] });
  });

  it('compiles a glob to a greedy capture', () => {
    const compiled = compilePattern('/files/*files');
    expect(compiled.regexp.source).toBe(source('^/files/(.*)$'));
    expect(compiled.names).toEqual(['files']);
    expect(compiled.namedCaptures).toEqual({ files: [1] });
  });

  it('records requirement groups as anonymous positions', () => {
    const compiled = compilePattern('/posts/:date', { date: /(\d{4})-(\d{2})/ });
    expect(compiled.regexp.source).toBe(source('^/posts/((\\d{4})-(\\d{2}))$'));
    expect(compiled.names).toEqual(['date', null, null]);
    expect(compiled.namedCaptures).toEqual({ date: [1] });
    expect(matchPattern(compiled, '/posts/2024-05')).toEqual({ date: '2024-05' });
  });
});

// ─── Optional groups ──────────────────────────────────────────────────────────

describe('compilePattern with optional groups', () => {
  it('makes a trailing format optional', () => {
    const compiled = compilePattern('/people(.:format)');
    expect(compiled.regexp.source).toBe(source('^/people(\\.([^/.?]+))?$'));
    expect(compiled.names).toEqual([null, 'format']);
    expect(compiled.namedCaptures).toEqual({ format: [2] });
  });

  it('combines a dynamic segment with an optional format', () => {
    const compiled = compilePattern('/people/:id(.:format)');
    expect(compiled.regexp.source).toBe(source('^/people/([^/.?]+)(\\.([^/.?]+))?$'));
    expect(compiled.names).toEqual(['id', null, 'format']);
    expect(compiled.namedCaptures).toEqual({ id: [1], format: [3] });
  });

  it('nests optional groups', () => {
    const compiled = compilePattern('/:controller(/:action(/:id(.:format)))');
    expect(compiled.regexp.source).toBe(
      source('^/([^/.?]+)(/([^/.?]+)(/([^/.?]+)(\\.([^/.?]+))?)?)?$'),
    );
    expect(compiled.names).toEqual(['controller', null, 'action', null, 'id', null, 'format']);
    expect(compiled.namedCaptures).toEqual({ controller: [1], action: [3], id: [5], format: [7] });
  });

  it('builds the segment tree', () => {
    const compiled = compilePattern('/people/:id(.:format)');
    expect(compiled.segments).toMatchObject([
      '/people/',
      { type: 'dynamic', name: 'id', glob: false },
      { type: 'optional', segments: ['.', { type: 'dynamic', name: 'format' }] },
    ]);
    expect(segmentNames(compiled.segments)).toEqual(['id', 'format']);
  });

  it('anchors segment requirements', () => {
    const compiled = compilePattern('/people/:id', { id: /\d+/ });
    const [, id] = compiled.segments;
    expect(typeof id === 'object' && id.type === 'dynamic' ? id.requirement.source : null).toBe(
      source('^(?:\\d+)$'),
    );
  });

  it('drops anchors a requirement carries', () => {
    const compiled = compilePattern('/items/:id', { id: /^\d+$/ });
    expect(compiled.regexp.source).toBe(source('^/items/(\\d+)$'));
    const [, id] = compiled.segments;
    expect(typeof id === 'object' && id.type === 'dynamic' ? id.requirement.source : null).toBe(
      source('^(?:\\d+)$'),
    );
    expect(matchPattern(compiled, '/items/12')).toEqual({ id: '12' });
  });
});

// ─── Matching ─────────────────────────────────────────────────────────────────

describe('matchPattern', () => {
  it('captures a glob across segments', () => {
    expect(matchPattern(compilePattern('/files/*files'), '/files/a/b/c')).toEqual({ files: 'a/b/c' });
  });

  it('reads optional values when present', () => {
    const compiled = compilePattern('/people/:id(.:format)');
    expect(matchPattern(compiled, '/people/1.json')).toEqual({ id: '1', format: 'json' });
    expect(matchPattern(compiled, '/people/1')).toEqual({ id: '1' });
  });

  it('never accepts a partial path', () => {
    const compiled = compilePattern('/people/:id');
    expect(matchPattern(compiled, '/people/1/edit')).toBeNull();
    expect(matchPattern(compiled, '/api/people/1')).toBeNull();
  });
});

// ─── Errors ───────────────────────────────────────────────────────────────────

describe('compilePattern errors', () => {
  it('rejects an unterminated group', () => {
    expect(() => compilePattern('/people(.:format')).toThrow(PatternSyntaxError);
    expect(() => compilePattern('/people(.:format')).toThrow(
      'Unterminated optional group at column 7 of "/people(.:format"',
    );
  });

  it('rejects an unmatched closing parenthesis', () => {
    expect(() => compilePattern('/people)')).toThrow('Unmatched ")" at column 7 of "/people)"');
  });

  it('rejects a marker without a name', () => {
    expect(() => compilePattern('/people/:')).toThrow(
      'Expected a parameter name after ":" at column 8 of "/people/:"',
    );
    expect(() => compilePattern('/files/*')).toThrow(
      'Expected a parameter name after "*" at column 7 of "/files/*"',
    );
  });

  it('rejects requirement flags the compiled pattern cannot carry', () => {
    expect(() => compilePattern('/p/:slug', { slug: /[a-z]+/i })).toThrow(
      'Requirement for "slug" uses unsupported flags "i" at column 3 of "/p/:slug"',
    );
    expect(compilePattern('/p/:slug', { slug: /[a-z]+/g }).regexp.source).toBe(source('^/p/([a-z]+)$'));
  });

  it('rejects an empty group', () => {
    expect(() => compilePattern('/a()')).toThrow('Empty optional group at column 2 of "/a()"');
  });

  it('carries the pattern and column', () => {
    try {
      compilePattern('/x/(:id');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PatternSyntaxError);
      if (error instanceof PatternSyntaxError) {
        expect(error.pattern).toBe('/x/(:id');
        expect(error.index).toBe(3);
        expect(error.name).toBe('PatternSyntaxError');
      }
    }
  });
});
