/**
 * Error classes for the mcrcon CLI
 */

/**
 * Validation error - for client-side validation failures
 */
export class ValidationError extends Error {
  public readonly name = 'ValidationError';

  constructor(
    public readonly field: 'host' | 'port' | 'password' | 'timeout' | 'command',
    message: string,
    public readonly actual?: string | number,
    public readonly expected?: string | number
  ) {
    super(message);
  }
}

/**
 * Operation error - for runtime errors while talking to the server
 */
export class OperationError extends Error {
  public readonly name = 'OperationError';

  constructor(
    public readonly operation: 'connect' | 'login' | 'command',
    public readonly reason: 'timeout' | 'connection' | 'authentication' | 'protocol',
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
  }
}
