import { Command } from 'commander';
import { Errors, Git, Logger, RemoteResolver, VersionCalculator } from '@changelog-gen/core';
import type { Generator } from '@changelog-gen/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface GenerateCommandOptions extends BaseCommandOptions {
  repo?: string;
  output?: string;
  url?: string;
  follow?: string[];
  name?: string;
  config?: string;
}

/**
 * Exit code for a failed run: the code git exited with when there is one.
 */
export function exitCodeFor(error: unknown): number {
  let code: number | undefined;
  if (error instanceof Errors.ConfigError) {
    code = error.exitCode;
  } else if (error instanceof Git.GitCommandError) {
    code = error.exitCode;
  }
  return code !== undefined && code > 0 ? code : 1;
}

function describeSection(section: Generator.GeneratedSection): string {
  const version = VersionCalculator.formatVersion(section.version);
  const noun = section.entryCount === 1 ? 'entry' : 'entries';
  return `   ${section.name}@${version} (${section.entryCount} ${noun})`;
}

/**
 * GenerateCommand - merges new commits into the changelog file
 */
export class GenerateCommand extends BaseCommand<GenerateCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerGenerateCommand() in generate.ts
  }

  async execute(options: GenerateCommandOptions): Promise<void> {
    if (options.verbose) {
      Logger.setLogLevel('debug');
    } else if (options.json || options.quiet) {
      Logger.setLogLevel('error');
    }

    try {
      const git = this.dependencyService.getGitModule(options.repo ?? '.');
      const repoRoot = await git.getRepoRoot();

      const config = await this.dependencyService
        .getConfigManager(repoRoot, options.config)
        .resolve({
          output: options.output,
          url: options.url,
          follow: options.follow,
          sectionName: options.name,
        });

      const remoteUrl = await RemoteResolver.resolveRemoteUrl(git, config.url, config.remote);

      const generator = this.dependencyService.getChangelogGenerator({
        git,
        store: this.dependencyService.getChangelogStore(config.output),
        remoteUrl,
      });

      const result = await generator.generate({
        follow: config.follow,
        sectionName: config.sectionName,
      });

      const lines = result.sections.length > 0
        ? result.sections.map(describeSection)
        : ['   No new entries'];
      if (result.backfilled) {
        lines.push('   Existing sections were given versions');
      }

      this.handleSuccess(
        {
          output: result.location,
          backfilled: result.backfilled,
          sections: result.sections.map((section) => ({
            name: section.name,
            version: VersionCalculator.formatVersion(section.version),
            entries: section.entryCount,
          })),
        },
        options,
        `Changelog written to ${result.location}\n${lines.join('\n')}`
      );
    } catch (error) {
      this.handleError(
        error instanceof Error ? error.message : String(error),
        options,
        error instanceof Error ? error : undefined,
        exitCodeFor(error)
      );
    }
  }
}
