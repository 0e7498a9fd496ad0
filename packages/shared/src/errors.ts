/**
 * Raised when a configuration file is missing required fields or holds
 * values the router cannot use.
 */
export class ConfigError extends Error {
  constructor(message: string, readonly configPath?: string) {
    super(configPath ? `${message} (in ${configPath})` : message);
    this.name = 'ConfigError';
  }
}
