// Accumulator for the packets of one command response

import { RequestId } from '../types.js';
import { Packet } from '../protocol/packet.js';
import { PacketType } from '../protocol/constants.js';
import { ProtocolViolationError } from '../errors.js';

/**
 * Collects response fragments for the command sent with `requestId`.
 *
 * The command is followed by an empty sentinel command under the same id.
 * The server answers in order, so the first empty-payload packet is the
 * sentinel's echo and marks the end of the real response.
 */
export class FragmentedResponse {
  private readonly fragments: string[] = [];
  private complete = false;

  constructor(public readonly requestId: RequestId) {}

  /**
   * Feed the next packet from the stream
   * @returns true once the sentinel echo has arrived
   * @throws ProtocolViolationError for a foreign request id or packet type
   */
  accept(packet: Packet): boolean {
    if (this.complete) {
      throw new Error('Response is already complete');
    }

    if (packet.requestId === RequestId.authFailure) {
      throw new ProtocolViolationError('client became deauthenticated between packets', packet.requestId);
    }

    if (packet.requestId !== this.requestId) {
      throw new ProtocolViolationError(
        `response has request id ${packet.requestId}, expected ${this.requestId}`,
        packet.requestId
      );
    }

    if (packet.type !== PacketType.ResponseValue) {
      throw new ProtocolViolationError(
        `response has packet type ${packet.type}, expected ${PacketType.ResponseValue}`,
        packet.requestId
      );
    }

    if (packet.payload === '') {
      this.complete = true;
      return true;
    }

    this.fragments.push(packet.payload);
    return false;
  }

  get isComplete(): boolean {
    return this.complete;
  }

  get fragmentCount(): number {
    return this.fragments.length;
  }

  /**
   * Fragments joined in arrival order
   */
  text(): string {
    return this.fragments.join('');
  }
}
