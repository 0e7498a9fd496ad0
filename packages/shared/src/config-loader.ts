import { existsSync, readFileSync } from 'node:fs';
import { resolve, join, extname } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { RequestFields, RouteDefinition, WaymarkConfig } from './types.js';
import { ConfigError } from './errors.js';
import { log } from './logger.js';

/**
 * Configuration file names in order of priority
 */
const CONFIG_FILES = [
  'waymark.config.mjs',
  'waymark.config.js',
  'waymark.config.json',
] as const;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Required<Pick<WaymarkConfig, 'routes' | 'onlyPath'>> & {
  request: RequestFields;
} = {
  routes: [],
  onlyPath: true,
  request: {
    scheme: 'http',
    host: 'localhost',
    port: 80,
    scriptName: '',
    pathInfo: '/',
    queryString: '',
  },
};

/**
 * Find the configuration file in the project directory
 */
export function findConfigFile(root: string = process.cwd()): string | null {
  for (const fileName of CONFIG_FILES) {
    const filePath = join(root, fileName);
    if (existsSync(filePath)) {
      return filePath;
    }
  }
  return null;
}

function isConfigObject(value: unknown): value is WaymarkConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and parse the configuration file.
 *
 * JSON files are read from disk; modules are imported and their default
 * export used, which may be the config object or a function returning it.
 */
export async function loadConfigFile(configPath: string): Promise<WaymarkConfig> {
  try {
    let config: unknown;

    if (extname(configPath) === '.json') {
      config = JSON.parse(readFileSync(configPath, 'utf-8'));
    } else {
      const configModule: unknown = await import(pathToFileURL(configPath).href);
      config =
        isConfigObject(configModule) && 'default' in configModule
          ? configModule.default
          : configModule;

      if (typeof config === 'function') {
        config = await config();
      }
    }

    if (!isConfigObject(config)) {
      throw new ConfigError('Config must export an object', configPath);
    }
    return config;
  } catch (error) {
    log.error(`Failed to load config from ${configPath}: ${error}`);
    throw error;
  }
}

/**
 * Resolve the final configuration by merging user config with defaults
 */
export function resolveConfig(userConfig: WaymarkConfig): WaymarkConfig {
  return {
    ...DEFAULT_CONFIG,
    ...userConfig,
    request: {
      ...DEFAULT_CONFIG.request,
      ...userConfig.request,
    },
  };
}

/**
 * Load waymark configuration from the project
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const config = await loadConfig({ configFile: 'routes/waymark.config.json' });
 * ```
 */
export async function loadConfig(options: {
  root?: string;
  configFile?: string;
  /** Suppress config loading log messages (default: true). */
  silent?: boolean;
} = {}): Promise<WaymarkConfig> {
  const root = options.root || process.cwd();
  const silent = options.silent ?? true;

  const configPath = options.configFile
    ? resolve(root, options.configFile)
    : findConfigFile(root);

  let userConfig: WaymarkConfig = {};

  if (configPath) {
    if (!silent) log.info(`Loading config from ${configPath}`);
    userConfig = await loadConfigFile(configPath);
  } else {
    if (!silent) log.info('No config file found, using defaults');
  }

  if (!userConfig.root) {
    userConfig.root = root;
  }

  const config = resolveConfig(userConfig);
  validateConfig(config);
  return config;
}

function validateRoute(route: unknown, index: number, names: Set<string>): void {
  if (!isRouteDefinition(route)) {
    throw new ConfigError(`Config validation error: routes[${index}] must have a string path`);
  }
  if (route.name !== undefined) {
    if (names.has(route.name)) {
      throw new ConfigError(`Config validation error: duplicate route name "${route.name}"`);
    }
    names.add(route.name);
  }
}

function isRouteDefinition(value: unknown): value is RouteDefinition {
  return isConfigObject(value) && 'path' in value && typeof value.path === 'string';
}

/**
 * Validate that required configuration values are present
 */
export function validateConfig(config: WaymarkConfig): void {
  if (config.routes !== undefined && !Array.isArray(config.routes)) {
    throw new ConfigError('Config validation error: routes must be an array');
  }

  const names = new Set<string>();
  config.routes?.forEach((route, index) => validateRoute(route, index, names));

  const port = config.request?.port;
  if (port != null && (!Number.isInteger(port) || port < 1 || port > 65535)) {
    throw new ConfigError(`Config validation error: request.port must be between 1 and 65535 (got ${port})`);
  }
}

/**
 * Get the effective request fields from configuration
 */
export function getRequestDefaults(config: WaymarkConfig): RequestFields {
  return { ...DEFAULT_CONFIG.request, ...config.request };
}
