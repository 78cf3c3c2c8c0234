#!/usr/bin/env node

/**
 * mcrcon CLI - Main entry point
 */

import { Command } from 'commander';
import { createExecCommand } from './commands/exec.js';
import { createShellCommand } from './commands/shell.js';
import { formatError, getExitCode } from './formatting.js';

/**
 * Main CLI program
 */
async function main(): Promise<void> {
  const program = new Command();

  program.name('mcrcon').version('0.1.0').description('mcrcon - run commands on a Minecraft server over RCON');

  // Register commands
  program.addCommand(createExecCommand());
  program.addCommand(createShellCommand());

  // Show help if no command provided
  if (process.argv.slice(2).length === 0) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(getExitCode(error));
});
