// Custom error classes for the RCON client
// Every error carries a `kind` so callers can switch on it

import { RequestId } from './types.js';

export type RconErrorKind =
  | 'ConnectionClosed'
  | 'Timeout'
  | 'MalformedPacket'
  | 'InvalidEncoding'
  | 'InvalidPayload'
  | 'PayloadTooLarge'
  | 'AuthenticationFailed'
  | 'ProtocolViolation'
  | 'NotAuthenticated'
  | 'AlreadyAuthenticated';

/**
 * Kinds after which the stream can no longer be trusted
 */
const FATAL_KINDS: ReadonlySet<RconErrorKind> = new Set<RconErrorKind>([
  'ConnectionClosed',
  'Timeout',
  'MalformedPacket',
  'InvalidEncoding',
  'ProtocolViolation',
]);

/**
 * Base error class for all RCON client errors
 */
export class RconClientError extends Error {
  public readonly name: string = 'RconClientError';

  constructor(
    public readonly kind: RconErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The stream ended, failed, or was closed locally
 */
export class ConnectionClosedError extends RconClientError {
  public readonly name: string = 'ConnectionClosedError';

  constructor(message = 'Connection closed', cause?: unknown) {
    super('ConnectionClosed', message, cause === undefined ? undefined : { cause });
  }
}

/**
 * No data arrived before the deadline
 */
export class TimeoutError extends RconClientError {
  public readonly name: string = 'TimeoutError';

  constructor(
    public readonly timeoutMs: number,
    message = `Timed out after ${timeoutMs}ms waiting for data`
  ) {
    super('Timeout', message);
  }
}

/**
 * Frame length out of range or terminators missing
 */
export class MalformedPacketError extends RconClientError {
  public readonly name: string = 'MalformedPacketError';

  constructor(message: string) {
    super('MalformedPacket', `Malformed packet: ${message}`);
  }
}

/**
 * Payload bytes are not valid UTF-8
 */
export class InvalidEncodingError extends RconClientError {
  public readonly name: string = 'InvalidEncodingError';

  constructor(message: string, cause?: unknown) {
    super('InvalidEncoding', message, cause === undefined ? undefined : { cause });
  }
}

/**
 * Caller text cannot be framed (contains NUL). Nothing is sent.
 */
export class InvalidPayloadError extends RconClientError {
  public readonly name: string = 'InvalidPayloadError';

  constructor(message: string) {
    super('InvalidPayload', message);
  }
}

/**
 * Caller text is over the size limit. Nothing is sent.
 */
export class PayloadTooLargeError extends RconClientError {
  public readonly name: string = 'PayloadTooLargeError';

  constructor(
    public readonly actual: number,
    public readonly limit: number
  ) {
    super('PayloadTooLarge', `Payload is ${actual} bytes, limit is ${limit}`);
  }
}

/**
 * The server rejected the password
 */
export class AuthenticationFailedError extends RconClientError {
  public readonly name: string = 'AuthenticationFailedError';

  constructor() {
    super('AuthenticationFailed', 'Authentication failed: incorrect password');
  }
}

/**
 * Unexpected request id or packet type
 */
export class ProtocolViolationError extends RconClientError {
  public readonly name: string = 'ProtocolViolationError';

  constructor(
    message: string,
    public readonly requestId?: RequestId
  ) {
    super('ProtocolViolation', `Protocol violation: ${message}`);
  }
}

export class NotAuthenticatedError extends RconClientError {
  public readonly name: string = 'NotAuthenticatedError';

  constructor() {
    super('NotAuthenticated', 'Not logged in: call logIn() before sending commands');
  }
}

export class AlreadyAuthenticatedError extends RconClientError {
  public readonly name: string = 'AlreadyAuthenticatedError';

  constructor() {
    super('AlreadyAuthenticated', 'Already logged in');
  }
}

/**
 * Whether an error leaves the session unusable
 */
export function isFatal(error: unknown): boolean {
  return error instanceof RconClientError && FATAL_KINDS.has(error.kind);
}
