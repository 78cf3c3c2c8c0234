// Event name constants for type-safe event handling

/**
 * Event name constants for RconClient events
 *
 * Usage:
 * ```typescript
 * client.on(ClientEvents.COMMAND_COMPLETED, (evt) => {
 *   console.log(evt.command, evt.fragmentCount);
 * });
 * ```
 */
export const ClientEvents = {
  /** Emitted when the server accepts the password */
  AUTHENTICATED: 'authenticated',

  /** Emitted when a command's full response has been reassembled */
  COMMAND_COMPLETED: 'commandCompleted',

  /** Emitted once when the session closes, by the caller or after a fatal error */
  DISCONNECTED: 'disconnected',
} as const;

/**
 * Type representing all valid client event names
 */
export type ClientEventName = (typeof ClientEvents)[keyof typeof ClientEvents];

/**
 * Type guard to check if a string is a valid client event name
 */
export function isClientEventName(name: string): name is ClientEventName {
  return Object.values<string>(ClientEvents).includes(name);
}
