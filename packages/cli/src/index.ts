export { buildRouteSet, formatRouteTable } from './commands/routes.js';
export { parseUrlArgs, generateUrl } from './commands/url.js';
export type { UrlCommandArgs } from './commands/url.js';
export { isSilent, useColor } from './utils/reporter.js';
