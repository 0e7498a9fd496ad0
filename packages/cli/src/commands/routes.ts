import type { WaymarkConfig } from 'waymark-shared';
import { RouteSet } from 'waymark-core';
import { colors } from '../utils/reporter.js';

/**
 * Register the configured routes, in order, and build the generation index.
 */
export function buildRouteSet(config: WaymarkConfig): RouteSet {
  const routes = new RouteSet();
  for (const definition of config.routes ?? []) {
    routes.addRoute(definition);
  }
  routes.rehash();
  return routes;
}

/**
 * One line per route: name, path, compiled matcher and static prefix.
 *
 * ```
 * person  /people/:id(.:format)  ^\/people\/([^/.?]+)(\.([^/.?]+))?$  /people
 * ```
 */
export function formatRouteTable(routes: RouteSet, opts: { color?: boolean } = {}): string {
  const c = colors(opts.color ?? false);
  const rows = routes.staticPrefixes().map(({ route, segments }) => [
    route.name ?? '',
    route.path.pattern,
    route.path.regexp.source,
    '/' + segments.join('/'),
  ]);

  if (rows.length === 0) return c.dim('No routes configured');

  const widths = [0, 1, 2].map((column) => Math.max(...rows.map((row) => row[column].length)));
  return rows
    .map(([name, pattern, source, prefix]) =>
      [
        c.cyan(name.padEnd(widths[0])),
        c.bold(pattern.padEnd(widths[1])),
        c.dim(source.padEnd(widths[2])),
        prefix,
      ].join('  '),
    )
    .join('\n');
}
