import { ConfigError } from '../errors';

/**
 * Error thrown when changelog.config.json is not valid JSON or violates its schema
 */
export class ConfigValidationError extends ConfigError {
  public readonly source: string;
  public readonly details: string[];

  constructor(source: string, details: string[]) {
    super(`Invalid configuration in ${source}: ${details.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.source = source;
    this.details = details;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
