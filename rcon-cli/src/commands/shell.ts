/**
 * Shell command implementation - interactive prompt
 */

import { Command } from 'commander';
import { createInterface } from 'readline';
import { RconConsole, connectTcp } from '../rconConsole.js';
import { resolveSettings, validateCommand } from '../validation.js';
import { formatError, formatResponse, getExitCode } from '../formatting.js';
import { addConnectionOptions } from '../options.js';
import { ValidationError } from '../errors.js';
import { CommandLineOptions, ConnectionSettings, Connector, Output } from '../types.js';

const EXIT_WORDS: ReadonlySet<string> = new Set(['exit', 'quit']);

export interface ShellDependencies {
  readonly connector: Connector;
  readonly output: Output;
  readonly input: NodeJS.ReadableStream;
  /** Where the prompt is written; omitted in tests */
  readonly promptOutput?: NodeJS.WritableStream;
}

const defaultDependencies: ShellDependencies = {
  connector: connectTcp,
  output: console,
  input: process.stdin,
  promptOutput: process.stdout,
};

/**
 * Read commands line by line until `exit`, `quit` or end of input.
 * A rejected line is reported and the prompt continues; a failed
 * exchange ends the shell, since the connection is gone.
 * @returns process exit code
 */
export async function runShell(
  options: CommandLineOptions,
  { connector, output, input, promptOutput }: ShellDependencies = defaultDependencies
): Promise<number> {
  let settings: ConnectionSettings;
  try {
    settings = resolveSettings(options);
  } catch (error) {
    output.error(formatError(error));
    return getExitCode(error);
  }

  const rcon = new RconConsole(settings, connector);
  try {
    await rcon.open();
  } catch (error) {
    output.error(formatError(error));
    await rcon.close();
    return getExitCode(error);
  }

  output.log(`Logged in to ${rcon.endpoint}. Type "exit" to quit.`);

  const lines = createInterface({
    input,
    output: promptOutput,
    prompt: 'rcon> ',
    terminal: promptOutput !== undefined && process.stdin.isTTY === true,
  });

  let exitCode = 0;
  try {
    lines.prompt();
    for await (const line of lines) {
      const trimmed = line.trim();
      if (EXIT_WORDS.has(trimmed)) {
        break;
      }

      if (trimmed.length > 0) {
        try {
          const response = formatResponse(await rcon.run(validateCommand(line)), options.raw);
          if (response.length > 0) {
            output.log(response);
          }
        } catch (error) {
          output.error(formatError(error));
          if (!(error instanceof ValidationError)) {
            exitCode = getExitCode(error);
            break;
          }
        }
      }

      lines.prompt();
    }
  } finally {
    lines.close();
    await rcon.close();
  }

  return exitCode;
}

/**
 * Create the shell command
 */
export function createShellCommand(): Command {
  const cmd = new Command('shell');

  addConnectionOptions(cmd)
    .description('Open an interactive RCON console')
    .action(async (options: CommandLineOptions) => {
      process.exit(await runShell(options));
    });

  return cmd;
}
