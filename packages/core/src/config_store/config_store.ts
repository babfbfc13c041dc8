/**
 * ConfigStore Interface
 *
 * Abstraction for changelog.config.json persistence. Stores return the raw
 * parsed document; validation happens in ConfigManager.
 *
 * Implementations:
 * - FsConfigStore: Filesystem-based
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /** Where the config comes from, used in error messages */
  readonly location: string;

  /**
   * Load the raw configuration document
   *
   * @returns Parsed JSON, or null when there is no config
   * @throws ConfigValidationError when the file is not valid JSON
   */
  loadConfig(): Promise<unknown>;
}
