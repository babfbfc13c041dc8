#!/usr/bin/env node

import { Command } from 'commander';
import { registerGenerateCommand } from './commands/generate/generate';

const program = new Command();

program
  .name('changelog')
  .description('Generate a versioned changelog from commit history')
  .version('0.1.0');

registerGenerateCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
