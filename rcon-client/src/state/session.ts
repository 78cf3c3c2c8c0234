// Session - exclusive owner of one stream, its handshake state and request ids

import { RequestId } from '../types.js';
import { ClientConfig, ClientConfigInput, createConfig } from '../config.js';
import { ByteStream } from '../transport/stream.js';
import { Packet, describePacket } from '../protocol/packet.js';
import { readPacket, writePackets } from '../protocol/codecs.js';
import { ConnectionClosedError, isFatal } from '../errors.js';
import { RequestIdRef, createRequestIdRef } from '../utils/requestIdRef.js';
import { debugLog } from '../utils/debug.js';

/**
 * Handshake states, plus Closed once the stream is gone
 */
export type SessionState = 'Unauthenticated' | 'AwaitingAuthResponse' | 'Authenticated' | 'AuthFailed' | 'Closed';

/**
 * One connection's worth of protocol state.
 *
 * Not safe for concurrent use: exactly one exchange may run at a time.
 * RconClient enforces this by queueing; direct users must await each call.
 */
export class Session {
  public readonly config: ClientConfig;
  private readonly requestIds: RequestIdRef;
  private currentState: SessionState = 'Unauthenticated';

  constructor(
    private readonly stream: ByteStream,
    config: ClientConfigInput = {},
    firstRequestId: RequestId = RequestId.zero
  ) {
    this.config = createConfig(config);
    this.requestIds = createRequestIdRef(firstRequestId);
  }

  get state(): SessionState {
    return this.currentState;
  }

  isAuthenticated(): boolean {
    return this.currentState === 'Authenticated';
  }

  isClosed(): boolean {
    return this.currentState === 'Closed' || this.stream.closed;
  }

  transition(next: SessionState): void {
    if (this.currentState === 'Closed') {
      return;
    }
    debugLog(`Session ${this.currentState} -> ${next}`);
    this.currentState = next;
  }

  /**
   * Most recently allocated request id
   */
  get lastRequestId(): RequestId {
    return this.requestIds.current;
  }

  nextRequestId(): RequestId {
    return this.requestIds.next();
  }

  /**
   * @throws ConnectionClosedError if the session was closed or invalidated
   */
  ensureOpen(): void {
    if (this.isClosed()) {
      this.currentState = 'Closed';
      throw new ConnectionClosedError('Session is closed');
    }
  }

  async send(...packets: Packet[]): Promise<void> {
    for (const packet of packets) {
      debugLog(`>> ${describePacket(packet, 'out')}`);
    }
    await writePackets(this.stream, packets);
  }

  async receive(): Promise<Packet> {
    const packet = await readPacket(this.stream);
    debugLog(`<< ${describePacket(packet, 'in')}`);
    return packet;
  }

  /**
   * Run one request/response exchange. A fatal error closes the session
   * before it is rethrown; other errors leave the session as it is.
   */
  async exchange<T>(body: () => Promise<T>): Promise<T> {
    this.ensureOpen();
    try {
      return await body();
    } catch (error) {
      if (isFatal(error)) {
        debugLog('Closing session after fatal error:', error);
        await this.close();
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    this.currentState = 'Closed';
    await this.stream.close();
  }
}
