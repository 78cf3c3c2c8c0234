// Main RconClient class - public API for applications
// EventEmitter-based, Promise API; actions are queued and run one at a time

import { ClientConfigInput, ConnectionConfigInput, createConfig } from './config.js';
import { ByteStream } from './transport/stream.js';
import { SocketAddress, SocketByteStream } from './transport/socketStream.js';
import { Session } from './state/session.js';
import { HandshakeManager } from './state/handshake.js';
import { CommandExecutor } from './state/commandExecutor.js';
import { AsyncQueue } from './utils/asyncQueue.js';
import { ConnectionClosedError, RconClientError, isFatal } from './errors.js';
import { ClientEvents } from './events/eventNames.js';
import { RconClientEventEmitter } from './events/eventEmitter.js';
import type { DisconnectedEvent } from './events/eventTypes.js';
import { debugLog } from './utils/debug.js';

// ============================================================================
// Actions
// ============================================================================

type ClientAction = LogInAction | SendCommandAction | DisconnectAction;

interface LogInAction {
  readonly type: 'LogIn';
  readonly password: string;
  readonly resolve: () => void;
  readonly reject: (error: unknown) => void;
}

interface SendCommandAction {
  readonly type: 'SendCommand';
  readonly command: string;
  readonly resolve: (response: string) => void;
  readonly reject: (error: unknown) => void;
}

interface DisconnectAction {
  readonly type: 'Disconnect';
  readonly resolve: () => void;
  readonly reject: (error: unknown) => void;
}

export interface ConnectOptions extends ClientConfigInput, ConnectionConfigInput {}

// ============================================================================
// RconClient - Main Public API
// ============================================================================

/**
 * Minecraft RCON client
 *
 * Usage:
 * ```typescript
 * import { RconClient } from '@rcon-kit/client';
 *
 * const client = await RconClient.connect('localhost:25575');
 * await client.logIn('test-secret');
 * console.log(await client.sendCommand('seed'));
 * await client.disconnect();
 * ```
 *
 * Calls may be issued without awaiting the previous one; they are queued and
 * sent strictly in order, one exchange at a time.
 */
export class RconClient extends RconClientEventEmitter {
  private readonly session: Session;
  private readonly handshake = new HandshakeManager();
  private readonly executor = new CommandExecutor();
  private readonly actionQueue = new AsyncQueue<ClientAction>();
  private readonly eventLoopPromise: Promise<void>;
  private disconnectEmitted = false;
  private disconnecting = false;

  /**
   * Wrap an already-open stream. Use `RconClient.connect` for TCP.
   */
  constructor(stream: ByteStream, configInput: ClientConfigInput = {}) {
    super();
    this.session = new Session(stream, createConfig(configInput));
    this.eventLoopPromise = this.runEventLoop();
  }

  /**
   * Open a TCP connection to `host[:port]` (port defaults to 25575)
   */
  static async connect(address: string | SocketAddress, options: ConnectOptions = {}): Promise<RconClient> {
    const config = createConfig(options);
    const stream = await SocketByteStream.connect(address, options);
    return new RconClient(stream, config);
  }

  isLoggedIn(): boolean {
    return this.session.isAuthenticated();
  }

  /**
   * Authenticate. Rejects with AuthenticationFailedError on a wrong password;
   * the server may close the connection after that.
   */
  logIn(password: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.enqueue({ type: 'LogIn', password, resolve, reject });
    });
  }

  /**
   * Run a command and resolve with its full (reassembled) response text
   */
  sendCommand(command: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      this.enqueue({ type: 'SendCommand', command, resolve, reject });
    });
  }

  /**
   * Close the connection at once. An exchange in flight and calls still queued
   * reject with ConnectionClosedError. Safe to call twice.
   */
  async disconnect(): Promise<void> {
    if (!this.actionQueue.isClosed()) {
      this.disconnecting = true;
      const closed = new Promise<void>((resolve, reject) => {
        this.enqueue({ type: 'Disconnect', resolve, reject });
      });
      this.actionQueue.close();
      // Fails the pending read, if any, so the event loop reaches the Disconnect
      await this.session.close();
      await closed;
    }
    await this.eventLoopPromise;
  }

  private enqueue(action: ClientAction): void {
    if (this.actionQueue.isClosed()) {
      action.reject(new ConnectionClosedError('Client is disconnected'));
      return;
    }
    this.actionQueue.offer(action);
  }

  private async runEventLoop(): Promise<void> {
    for await (const action of this.actionQueue) {
      await this.handleAction(action);
    }
    debugLog('Event loop stopped');
  }

  private async handleAction(action: ClientAction): Promise<void> {
    try {
      switch (action.type) {
        case 'LogIn': {
          await this.handshake.logIn(this.session, action.password);
          action.resolve();
          this.emit(ClientEvents.AUTHENTICATED, {
            requestId: this.session.lastRequestId,
            timestamp: new Date(),
          });
          break;
        }

        case 'SendCommand': {
          const result = await this.executor.execute(this.session, action.command);
          action.resolve(result.response);
          this.emit(ClientEvents.COMMAND_COMPLETED, {
            requestId: result.requestId,
            command: action.command,
            fragmentCount: result.fragmentCount,
            timestamp: new Date(),
          });
          break;
        }

        case 'Disconnect': {
          await this.session.close();
          action.resolve();
          this.emitDisconnected({ reason: 'client', timestamp: new Date() });
          break;
        }
      }
    } catch (error) {
      action.reject(error);
      if (!this.disconnecting && error instanceof RconClientError && isFatal(error)) {
        this.emitDisconnected({ reason: 'error', error, timestamp: new Date() });
      }
    }
  }

  private emitDisconnected(event: DisconnectedEvent): void {
    if (this.disconnectEmitted) {
      return;
    }
    this.disconnectEmitted = true;
    this.emit(ClientEvents.DISCONNECTED, event);
  }
}
