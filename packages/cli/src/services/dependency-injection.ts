import * as path from 'path';
import { spawn } from 'child_process';
import { Config, Generator, Git, Store } from '@changelog-gen/core';
import { FsChangelogStore, FsConfigStore, LocalGitModule } from '@changelog-gen/core/fs';
import type { IDependencyProvider } from '../interfaces/dependencies';

/**
 * Runs a command and collects its output. Never rejects: spawn failures
 * (git not installed) come back as exit code 1 with the error in stderr.
 */
export const execCommand: Git.ExecCommand = (command, args, options) => {
  return new Promise<Git.ExecResult>((resolve) => {
    const proc = spawn(command, args, {
      cwd: options?.cwd ?? process.cwd(),
      env: { ...process.env, ...options?.env },
    });

    let stdout = '';
    let stderr = '';

    proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
    proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

    proc.on('close', (code: number | null) => {
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });

    proc.on('error', (error: Error) => {
      resolve({ exitCode: 1, stdout, stderr: error.message });
    });
  });
};

/**
 * Dependency Injection Service for the changelog CLI
 *
 * Creates the filesystem and git-backed implementations from core.
 */
export class DependencyInjectionService implements IDependencyProvider {
  private static instance: DependencyInjectionService | null = null;
  private gitModules = new Map<string, Git.IGitModule>();

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Reset singleton instance (for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  getGitModule(repoPath: string): Git.IGitModule {
    const resolved = path.resolve(repoPath);
    let gitModule = this.gitModules.get(resolved);
    if (!gitModule) {
      gitModule = new LocalGitModule({ repoRoot: resolved, execCommand });
      this.gitModules.set(resolved, gitModule);
    }
    return gitModule;
  }

  getConfigManager(repoRoot: string, configPath?: string): Config.IConfigManager {
    const configStore = configPath
      ? new FsConfigStore(configPath)
      : FsConfigStore.forRepository(repoRoot);
    return new Config.ConfigManager(configStore, repoRoot);
  }

  getChangelogStore(outputPath: string): Store.ChangelogStore {
    return new FsChangelogStore(outputPath);
  }

  getChangelogGenerator(dependencies: Generator.ChangelogGeneratorDependencies): Generator.IChangelogGenerator {
    return new Generator.ChangelogGenerator(dependencies);
  }
}
