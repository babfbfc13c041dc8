import { Command } from 'commander';
import { GenerateCommand } from './generate-command';
import type { GenerateCommandOptions } from './generate-command';

export function registerGenerateCommand(program: Command): void {
  const generateCommand = new GenerateCommand();

  // changelog -r . -f packages/core packages/cli
  program
    .option('-r, --repo <path>', 'Repository path', '.')
    .option('-o, --output <file>', 'Changelog file (default: CHANGELOG.md in the repository)')
    .option('-u, --url <url>', 'Repository URL used for commit links (default: origin remote)')
    .option('-f, --follow <paths...>', 'Write one section per path, with only the commits touching it')
    .option('-n, --name <section>', 'Section name when no paths are followed (default: "All Changes")')
    .option('-c, --config <file>', 'Config file (default: changelog.config.json in the repository)')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: GenerateCommandOptions) => {
      await generateCommand.execute(options);
    });
}
