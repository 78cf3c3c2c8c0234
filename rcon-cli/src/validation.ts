/**
 * Input validation functions
 */

import { MAX_OUTGOING_PAYLOAD_LENGTH } from '@rcon-kit/client';
import { ValidationError } from './errors.js';
import { CommandLineOptions, ConnectionSettings } from './types.js';

/**
 * @throws ValidationError if the host is blank
 */
export function validateHost(host: string): string {
  const trimmed = host.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('host', 'Host cannot be empty');
  }
  return trimmed;
}

/**
 * Parses a TCP port
 * @throws ValidationError unless the input is an integer in 1-65535
 */
export function parsePort(input: string): number {
  const port = Number(input);
  if (!/^\d+$/.test(input) || port < 1 || port > 65535) {
    throw new ValidationError('port', `Invalid port: ${input}. Must be 1-65535`);
  }
  return port;
}

/**
 * Parses a timeout in milliseconds
 * @throws ValidationError unless the input is a positive integer
 */
export function parseTimeout(input: string): number {
  const timeout = Number(input);
  if (!/^\d+$/.test(input) || timeout <= 0) {
    throw new ValidationError('timeout', `Invalid timeout: ${input}. Must be a positive number of milliseconds`);
  }
  return timeout;
}

/**
 * Checks text that goes into a packet payload: no NUL, at most 1446 bytes
 */
function validatePayloadText(field: 'password' | 'command', label: string, text: string): void {
  if (text.includes('\0')) {
    throw new ValidationError(field, `${label} cannot contain NUL characters`);
  }

  const size = Buffer.byteLength(text, 'utf8');
  if (size > MAX_OUTGOING_PAYLOAD_LENGTH) {
    throw new ValidationError(field, `${label} exceeds maximum size`, size, MAX_OUTGOING_PAYLOAD_LENGTH);
  }
}

/**
 * @throws ValidationError if the password is missing or cannot be sent
 */
export function validatePassword(password: string | undefined): string {
  if (password === undefined || password.length === 0) {
    throw new ValidationError('password', 'Password is required (use --password or RCON_PASSWORD)');
  }
  validatePayloadText('password', 'Password', password);
  return password;
}

/**
 * @throws ValidationError if the command is blank or cannot be sent
 */
export function validateCommand(command: string): string {
  if (command.trim().length === 0) {
    throw new ValidationError('command', 'Command cannot be empty');
  }
  validatePayloadText('command', 'Command', command);
  return command;
}

/**
 * Turns raw command-line options into connection settings
 * @throws ValidationError for the first invalid option
 */
export function resolveSettings(options: CommandLineOptions): ConnectionSettings {
  return {
    host: validateHost(options.host),
    port: parsePort(options.port),
    password: validatePassword(options.password),
    timeout: parseTimeout(options.timeout),
  };
}
