#!/usr/bin/env node

import { Command } from 'commander';
import { registerRepoCommand } from './commands/repo/repo';
import { registerFileCommand } from './commands/file/file';
import { registerHeadCommand } from './commands/head/head';
import { registerEncryptCommand } from './commands/encrypt/encrypt';
import { registerSyncCommand } from './commands/sync/sync';

const program = new Command();

program
  .name('hookline')
  .description('Hookline CLI - GitHub and Travis CI from the command line')
  .version('1.0.0');

// GitHub
registerRepoCommand(program);
registerFileCommand(program);
registerHeadCommand(program);

// Travis CI
registerEncryptCommand(program);
registerSyncCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
