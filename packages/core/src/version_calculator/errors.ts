/**
 * Error thrown when a string is not a `v?MAJOR.MINOR.PATCH` version
 */
export class VersionParseError extends Error {
  public readonly input: string;

  constructor(input: string) {
    super(`Invalid version string: ${input}`);
    this.name = 'VersionParseError';
    this.input = input;
    Object.setPrototypeOf(this, VersionParseError.prototype);
  }
}
