/**
 * RconConsole - CLI-facing wrapper around RconClient
 * Maps library errors onto OperationError so commands can pick exit codes
 */

import { RconClient, RconClientError } from '@rcon-kit/client';
import { OperationError } from './errors.js';
import { ConnectionSettings, Connector } from './types.js';

/**
 * Default connector: TCP, with the CLI timeout applied to connect and reads
 */
export const connectTcp: Connector = (settings) =>
  RconClient.connect(
    { host: settings.host, port: settings.port },
    { connectTimeout: settings.timeout, readTimeout: settings.timeout }
  );

type Operation = OperationError['operation'];

function toOperationError(operation: Operation, err: unknown): unknown {
  if (!(err instanceof RconClientError)) {
    return err;
  }

  switch (err.kind) {
    case 'Timeout':
      return new OperationError(operation, 'timeout', err.message, err);
    case 'ConnectionClosed':
      return new OperationError(operation, 'connection', err.message, err);
    case 'AuthenticationFailed':
      return new OperationError(operation, 'authentication', err.message, err);
    default:
      return new OperationError(operation, 'protocol', err.message, err);
  }
}

export class RconConsole {
  private client: RconClient | null = null;

  constructor(
    private readonly settings: ConnectionSettings,
    private readonly connector: Connector = connectTcp
  ) {}

  get endpoint(): string {
    return `${this.settings.host}:${this.settings.port}`;
  }

  /**
   * Connect and log in with the configured password
   */
  async open(): Promise<void> {
    try {
      this.client = await this.connector(this.settings);
    } catch (err) {
      throw toOperationError('connect', err);
    }

    try {
      await this.client.logIn(this.settings.password);
    } catch (err) {
      throw toOperationError('login', err);
    }
  }

  /**
   * Run one command and return the server's full response
   */
  async run(command: string): Promise<string> {
    if (this.client === null) {
      throw new OperationError('command', 'connection', `Not connected to ${this.endpoint}`);
    }

    try {
      return await this.client.sendCommand(command);
    } catch (err) {
      throw toOperationError('command', err);
    }
  }

  /**
   * Close the connection
   *
   * Best-effort: disconnect errors are logged, not thrown, so cleanup
   * never masks the error that caused it.
   */
  async close(): Promise<void> {
    const client = this.client;
    if (client === null) {
      return;
    }
    this.client = null;

    try {
      await client.disconnect();
    } catch (err) {
      console.error(`Warning: Failed to disconnect from ${this.endpoint}:`, err);
    }
  }
}
