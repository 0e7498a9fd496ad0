export { log } from './logger.js';
export { ConfigError } from './errors.js';
export {
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfigFile,
  resolveConfig,
  loadConfig,
  validateConfig,
  getRequestDefaults,
} from './config-loader.js';
export type {
  ParamValue,
  Params,
  Requirement,
  RouteDefinition,
  RequestFields,
  RequestContext,
  WaymarkConfig,
} from './types.js';
