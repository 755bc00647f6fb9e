#!/usr/bin/env node

import { Command } from 'commander';
import { registerItemCommands } from './commands/item';
import { registerSubmissionsCommands } from './commands/submissions';

const program = new Command();

program
  .name('catalog-submissions')
  .description('Submit catalog item changes as pull requests and follow their status')
  .version('0.1.0');

registerItemCommands(program);
registerSubmissionsCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
