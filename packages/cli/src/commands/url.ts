import { getRequestDefaults } from 'waymark-shared';
import type { Params, WaymarkConfig } from 'waymark-shared';
import type { RouteSet } from 'waymark-core';

export interface UrlCommandArgs {
  name: string | null;
  params: Params;
}

/**
 * Split positional CLI arguments into an optional route name and
 * `key=value` params. Repeating a key collects its values into an array.
 *
 * `['person', 'id=1', 'format=json']` → `{ name: 'person', params: { id: '1', format: 'json' } }`
 */
export function parseUrlArgs(args: readonly string[]): UrlCommandArgs {
  let name: string | null = null;
  const params: Params = {};

  for (const arg of args) {
    const eqIndex = arg.indexOf('=');
    if (eqIndex === -1) {
      if (name !== null) {
        throw new Error(`Unexpected argument "${arg}": route name already given as "${name}"`);
      }
      name = arg;
      continue;
    }

    const key = arg.slice(0, eqIndex);
    const value = arg.slice(eqIndex + 1);
    if (!key) throw new Error(`Missing parameter name in "${arg}"`);

    const existing = params[key];
    if (existing === undefined) {
      params[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      params[key] = [existing, value];
    }
  }

  return { name, params };
}

/**
 * Generate a URL against the configured request.
 * `full` overrides the config's `onlyPath`.
 */
export function generateUrl(
  routes: RouteSet,
  config: WaymarkConfig,
  args: UrlCommandArgs,
  opts: { full?: boolean } = {},
): string {
  const request = getRequestDefaults(config);
  const onlyPath = opts.full === undefined ? config.onlyPath ?? true : !opts.full;
  const params = { ...args.params, onlyPath };

  return args.name === null
    ? routes.url(request, params)
    : routes.url(request, args.name, params);
}
