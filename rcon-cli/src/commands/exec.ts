/**
 * Exec command implementation
 */

import { Command } from 'commander';
import { RconConsole, connectTcp } from '../rconConsole.js';
import { resolveSettings, validateCommand } from '../validation.js';
import { formatError, formatResponse, getExitCode } from '../formatting.js';
import { addConnectionOptions } from '../options.js';
import { CommandLineOptions, Connector, Output } from '../types.js';

export interface ExecDependencies {
  readonly connector: Connector;
  readonly output: Output;
}

const defaultDependencies: ExecDependencies = { connector: connectTcp, output: console };

/**
 * Run each command in order on one connection
 * @returns process exit code
 */
export async function runExec(
  commands: readonly string[],
  options: CommandLineOptions,
  { connector, output }: ExecDependencies = defaultDependencies
): Promise<number> {
  let rcon: RconConsole | null = null;

  try {
    // 1. Validate everything before connecting
    const settings = resolveSettings(options);
    const validated = commands.map(validateCommand);

    // 2. Connect and log in
    rcon = new RconConsole(settings, connector);
    await rcon.open();

    // 3. Run commands, printing each response
    for (const command of validated) {
      const response = formatResponse(await rcon.run(command), options.raw);
      if (response.length > 0) {
        output.log(response);
      }
    }

    // 4. Disconnect
    await rcon.close();
    return 0;
  } catch (error) {
    output.error(formatError(error));

    // Ensure cleanup
    await rcon?.close();

    return getExitCode(error);
  }
}

/**
 * Create the exec command
 */
export function createExecCommand(): Command {
  const cmd = new Command('exec');

  addConnectionOptions(cmd)
    .description('Run one or more commands and print their responses')
    .argument('<command...>', 'Commands to run, one per argument (quote commands with spaces)')
    .action(async (commands: string[], options: CommandLineOptions) => {
      process.exit(await runExec(commands, options));
    });

  return cmd;
}
