// Type-safe event emitter for RconClient
// Uses Node.js EventEmitter with TypeScript type safety

import { EventEmitter } from 'events';
import type { RconClientEventMap } from './eventTypes.js';

/**
 * Extends Node.js EventEmitter with typed event methods
 */
export class RconClientEventEmitter extends EventEmitter {
  emit<K extends keyof RconClientEventMap>(event: K, data: RconClientEventMap[K]): boolean {
    return super.emit(event, data);
  }

  on<K extends keyof RconClientEventMap>(event: K, listener: (data: RconClientEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  once<K extends keyof RconClientEventMap>(event: K, listener: (data: RconClientEventMap[K]) => void): this {
    return super.once(event, listener);
  }

  off<K extends keyof RconClientEventMap>(event: K, listener: (data: RconClientEventMap[K]) => void): this {
    return super.off(event, listener);
  }
}
