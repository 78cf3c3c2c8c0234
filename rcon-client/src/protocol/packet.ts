// Packet type definition for the RCON wire unit

import { RequestId } from '../types.js';
import { PacketType } from './constants.js';

/**
 * One RCON packet. The length field and the two NUL terminators are
 * derived by the codec and never stored here.
 */
export interface Packet {
  readonly requestId: RequestId;
  readonly type: PacketType;
  readonly payload: string;
}

/**
 * Render a packet for logs. Auth payloads carry the password and are masked.
 */
export function describePacket(packet: Packet, direction: 'out' | 'in'): string {
  const payload = direction === 'out' && packet.type === PacketType.Auth ? '<hidden>' : packet.payload;
  return `Packet${JSON.stringify({
    id: RequestId.unwrap(packet.requestId),
    type: packet.type,
    payload,
  })}`;
}
