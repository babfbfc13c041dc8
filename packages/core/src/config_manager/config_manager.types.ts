/**
 * ConfigManager Types
 */

/**
 * Contents of changelog.config.json. Every field is optional.
 */
export type ChangelogConfig = {
  output?: string;
  url?: string;
  remote?: string;
  follow?: string[];
  sectionName?: string;
};

/**
 * Values given on the command line. They take precedence over the file.
 */
export type ConfigOverrides = {
  /** Resolved against the current working directory */
  output?: string;
  url?: string;
  remote?: string;
  follow?: string[];
  sectionName?: string;
};

/**
 * Fully resolved settings for one generation run
 */
export type ResolvedConfig = {
  /** Absolute path of the changelog file */
  output: string;
  /** Explicit repository URL, if any */
  url: string | undefined;
  remote: string;
  follow: string[];
  sectionName: string;
};

export interface IConfigManager {
  /**
   * Load and validate changelog.config.json
   *
   * @returns The config, or null when there is no config file
   * @throws ConfigValidationError for invalid JSON or schema violations
   */
  loadConfig(): Promise<ChangelogConfig | null>;

  /**
   * Merge overrides, file values and defaults
   */
  resolve(overrides?: ConfigOverrides): Promise<ResolvedConfig>;
}
