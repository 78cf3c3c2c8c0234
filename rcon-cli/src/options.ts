/**
 * Connection options shared by every command
 */

import { Command, Option } from 'commander';
import { DEFAULT_RCON_PORT } from '@rcon-kit/client';

export const DEFAULT_HOST = 'localhost';
export const DEFAULT_TIMEOUT_MS = 5000;

export function addConnectionOptions(cmd: Command): Command {
  return cmd
    .addOption(new Option('-H, --host <host>', 'Server host').env('RCON_HOST').default(DEFAULT_HOST))
    .addOption(new Option('-p, --port <port>', 'RCON port').env('RCON_PORT').default(String(DEFAULT_RCON_PORT)))
    .addOption(new Option('-P, --password <password>', 'RCON password').env('RCON_PASSWORD'))
    .addOption(
      new Option('-t, --timeout <ms>', 'Connect and read timeout in milliseconds')
        .env('RCON_TIMEOUT')
        .default(String(DEFAULT_TIMEOUT_MS))
    )
    .option('--raw', 'Keep Minecraft formatting codes in output');
}
