/**
 * ChangelogStore Interface
 *
 * Abstraction over the changelog file a run reads once at the start and
 * rewrites once at the end.
 *
 * Implementations:
 * - FsChangelogStore: file on disk, truncate-and-rewrite
 * - MemoryChangelogStore: In-memory for tests
 */
export interface ChangelogStore {
  /** Human-readable location (file path for the filesystem store) */
  readonly location: string;

  /**
   * Current changelog content
   *
   * @returns File content, or null when there is no changelog yet
   */
  read(): Promise<string | null>;

  /**
   * Replaces the changelog content
   *
   * @throws ChangelogWriteError when the content cannot be written
   */
  write(content: string): Promise<void>;
}
