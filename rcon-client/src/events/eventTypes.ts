// Event payloads emitted by RconClient

import { RequestId } from '../types.js';
import type { RconClientError } from '../errors.js';

export interface AuthenticatedEvent {
  readonly requestId: RequestId;
  readonly timestamp: Date;
}

export interface CommandCompletedEvent {
  readonly requestId: RequestId;
  readonly command: string;
  readonly fragmentCount: number;
  readonly timestamp: Date;
}

export type DisconnectedEvent =
  | { readonly reason: 'client'; readonly timestamp: Date }
  | { readonly reason: 'error'; readonly error: RconClientError; readonly timestamp: Date };

/**
 * Maps event names to their payloads
 */
export interface RconClientEventMap {
  authenticated: AuthenticatedEvent;
  commandCompleted: CommandCompletedEvent;
  disconnected: DisconnectedEvent;
}
