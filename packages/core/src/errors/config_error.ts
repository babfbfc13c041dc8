/**
 * Base class for fatal setup errors: the run cannot start with the given
 * repository, refs or configuration.
 */
export class ConfigError extends Error {
  /** Process exit code the CLI should use */
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = 1) {
    super(message);
    this.name = 'ConfigError';
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
