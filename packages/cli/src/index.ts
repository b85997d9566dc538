#!/usr/bin/env node

import { Command } from 'commander';
import { registerRequireCommand } from './commands/require';

export const VERSION = '0.1.0';

const program = new Command();

program
  .name('modreq')
  .description('Obtains a require statement based on a git repository')
  .version(VERSION, '-V, --version');

registerRequireCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
