/**
 * Core type definitions for the mcrcon CLI
 */

import type { RconClient } from '@rcon-kit/client';

/**
 * Raw option values as commander hands them over
 */
export interface CommandLineOptions {
  readonly host: string;
  readonly port: string;
  readonly password?: string;
  readonly timeout: string;
  readonly raw?: boolean;
}

/**
 * Validated connection settings
 */
export interface ConnectionSettings {
  readonly host: string;
  readonly port: number;
  readonly password: string;
  readonly timeout: number; // milliseconds, used for both connect and read
}

/**
 * Opens a client for the given settings
 */
export type Connector = (settings: ConnectionSettings) => Promise<RconClient>;

/**
 * Where command output goes (console in production, a capture in tests)
 */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}
