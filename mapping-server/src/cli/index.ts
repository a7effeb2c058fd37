#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { dbCommand } from './commands/db.js';
import { resolveCommand } from './commands/resolve.js';
import { verifyCommand } from './commands/verify.js';
import { reportCommand } from './commands/report.js';
import { mappingsCommand } from './commands/mappings.js';
import { runInteractive } from './interactive.js';

const program = new Command();

program
  .name('team-identity')
  .description('Team identity resolution CLI')
  .version('1.0.0')
  .enablePositionalOptions(); // Allow subcommands to define their own options

program.addCommand(dbCommand);
program.addCommand(resolveCommand);
program.addCommand(verifyCommand);
program.addCommand(reportCommand);
program.addCommand(mappingsCommand);

// If no arguments provided, run interactive mode
if (process.argv.length <= 2) {
  runInteractive().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
} else {
  program.parseAsync().catch((error) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
