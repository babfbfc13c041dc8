/**
 * Error thrown when the changelog cannot be read or written
 */
export class ChangelogWriteError extends Error {
  public readonly location: string;

  constructor(location: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cannot open output file: ${location}${reason}`, { cause });
    this.name = 'ChangelogWriteError';
    this.location = location;
    Object.setPrototypeOf(this, ChangelogWriteError.prototype);
  }
}
