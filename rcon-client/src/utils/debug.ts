/**
 * Debug logging utility
 *
 * Centralized debug logging, off by default.
 * Set RCON_DEBUG=1 in the environment to print protocol traffic.
 */

const DEBUG_ENABLED = ['1', 'true'].includes((process.env.RCON_DEBUG ?? '').toLowerCase());

/**
 * Log a debug message if debug mode is enabled
 */
export function debugLog(message: string, ...args: unknown[]): void {
  if (DEBUG_ENABLED) {
    console.log(`[rcon] ${message}`, ...args);
  }
}
