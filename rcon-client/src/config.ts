// Client configuration with validation and defaults
// Plain object configuration, NOT builder pattern

import { MAX_OUTGOING_PAYLOAD_LENGTH, MAX_PAYLOAD_LENGTH } from './protocol/constants.js';

/**
 * Session-level configuration, independent of the stream
 */
export interface ClientConfig {
  readonly maxCommandLength: number; // bytes, default 1446
}

/**
 * Socket-level configuration used when the client opens its own connection
 */
export interface ConnectionConfig {
  readonly connectTimeout: number; // milliseconds, default 5000
  readonly readTimeout: number; // milliseconds, default 10000, 0 disables
}

export const DEFAULT_CONNECT_TIMEOUT = 5000; // 5 seconds
export const DEFAULT_READ_TIMEOUT = 10000; // 10 seconds
export const DEFAULT_MAX_COMMAND_LENGTH = MAX_OUTGOING_PAYLOAD_LENGTH;

export interface ClientConfigInput {
  readonly maxCommandLength?: number;
}

export interface ConnectionConfigInput {
  readonly connectTimeout?: number;
  readonly readTimeout?: number;
}

/**
 * Validate client configuration
 * Throws synchronous error if invalid
 */
export function validateConfig(config: ClientConfig): void {
  if (!Number.isInteger(config.maxCommandLength) || config.maxCommandLength <= 0) {
    throw new Error('maxCommandLength must be a positive integer');
  }

  if (config.maxCommandLength > MAX_PAYLOAD_LENGTH) {
    throw new Error(`maxCommandLength cannot exceed ${MAX_PAYLOAD_LENGTH}`);
  }
}

/**
 * Create a complete ClientConfig from partial input
 */
export function createConfig(input: ClientConfigInput = {}): ClientConfig {
  const config: ClientConfig = {
    maxCommandLength: input.maxCommandLength ?? DEFAULT_MAX_COMMAND_LENGTH,
  };

  validateConfig(config);

  return config;
}

export function validateConnectionConfig(config: ConnectionConfig): void {
  if (!Number.isFinite(config.connectTimeout) || config.connectTimeout <= 0) {
    throw new Error('connectTimeout must be positive');
  }

  if (!Number.isFinite(config.readTimeout) || config.readTimeout < 0) {
    throw new Error('readTimeout must be zero or positive');
  }
}

/**
 * Create a complete ConnectionConfig from partial input
 */
export function createConnectionConfig(input: ConnectionConfigInput = {}): ConnectionConfig {
  const config: ConnectionConfig = {
    connectTimeout: input.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
    readTimeout: input.readTimeout ?? DEFAULT_READ_TIMEOUT,
  };

  validateConnectionConfig(config);

  return config;
}
