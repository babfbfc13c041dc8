import type { Config, Generator, Git, Store } from '@changelog-gen/core';

/**
 * Everything a command needs from the outside world. The CLI uses
 * DependencyInjectionService; tests pass in-memory implementations.
 */
export interface IDependencyProvider {
  /** Git access rooted at `repoPath` (not yet validated) */
  getGitModule(repoPath: string): Git.IGitModule;

  /**
   * @param configPath - Explicit config file; defaults to changelog.config.json in the repository root
   */
  getConfigManager(repoRoot: string, configPath?: string): Config.IConfigManager;

  getChangelogStore(outputPath: string): Store.ChangelogStore;

  getChangelogGenerator(dependencies: Generator.ChangelogGeneratorDependencies): Generator.IChangelogGenerator;
}
