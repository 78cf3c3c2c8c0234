/**
 * Output formatting utilities
 */

import { ValidationError, OperationError } from './errors.js';

// Minecraft formatting codes: section sign followed by a color or style character
const FORMATTING_CODE = /§[0-9a-fk-or]/gi;

/**
 * Remove Minecraft color and style codes from server output
 */
export function stripFormattingCodes(text: string): string {
  return text.replace(FORMATTING_CODE, '');
}

/**
 * Format a command response for display
 */
export function formatResponse(response: string, raw = false): string {
  return raw ? response : stripFormattingCodes(response);
}

/**
 * Format an error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    if (error.actual !== undefined && error.expected !== undefined) {
      return `Error: ${error.message} (actual: ${error.actual}, expected: ${error.expected})`;
    }
    return `Error: ${error.message}`;
  }

  if (error instanceof OperationError) {
    if (error.reason === 'timeout') {
      return `Error: ${error.message} (is the server reachable and RCON enabled?)`;
    }
    return `Error: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}

/**
 * Get appropriate exit code for error
 *
 * Exit codes follow Unix conventions:
 * - 0: Success (not handled here)
 * - 1: Validation error (bad user input)
 * - 2: Connection/timeout error (network issues)
 * - 3: Authentication, protocol and unexpected failures
 */
export function getExitCode(error: unknown): number {
  if (error instanceof ValidationError) {
    return 1;
  }

  if (error instanceof OperationError && (error.reason === 'connection' || error.reason === 'timeout')) {
    return 2;
  }

  return 3;
}
