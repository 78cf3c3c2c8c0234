// Binary codec for RCON packets
// All integers are little-endian int32; payloads are UTF-8 followed by two NUL bytes

import { TextDecoder } from 'util';
import { RequestId } from '../types.js';
import { Packet } from './packet.js';
import {
  PacketType,
  isPacketType,
  LENGTH_PREFIX_SIZE,
  PACKET_HEADER_LENGTH,
  MAX_PAYLOAD_LENGTH,
  MAX_INCOMING_PACKET_LENGTH,
} from './constants.js';
import {
  InvalidEncodingError,
  InvalidPayloadError,
  MalformedPacketError,
  PayloadTooLargeError,
  ProtocolViolationError,
} from '../errors.js';
import type { ByteStream } from '../transport/stream.js';

const ENCODING: BufferEncoding = 'utf8';

// Fatal decoder: invalid sequences throw instead of becoming U+FFFD
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

// ============================================================================
// Validation
// ============================================================================

/**
 * Check that a payload can be framed and return its byte length
 * @throws InvalidPayloadError if it contains a NUL character
 * @throws PayloadTooLargeError if it is longer than `limit` bytes
 */
export function validatePayload(payload: string, limit: number = MAX_PAYLOAD_LENGTH): number {
  if (payload.includes('\0')) {
    throw new InvalidPayloadError('Payload must not contain NUL characters');
  }

  const size = Buffer.byteLength(payload, ENCODING);
  if (size > limit) {
    throw new PayloadTooLargeError(size, limit);
  }
  return size;
}

/**
 * Value of the length field for a payload
 */
export function packetLength(payload: string): number {
  return Buffer.byteLength(payload, ENCODING) + PACKET_HEADER_LENGTH;
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode one packet into a complete frame (length prefix included)
 */
export function encodePacket(requestId: RequestId, type: PacketType, payload: string): Buffer {
  const payloadSize = validatePayload(payload);
  const length = payloadSize + PACKET_HEADER_LENGTH;

  // Buffer.alloc zero-fills, which provides both terminators
  const buffer = Buffer.alloc(LENGTH_PREFIX_SIZE + length);
  buffer.writeInt32LE(length, 0);
  buffer.writeInt32LE(RequestId.unwrap(requestId), 4);
  buffer.writeInt32LE(type, 8);
  buffer.write(payload, 12, payloadSize, ENCODING);
  return buffer;
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode and range-check the length prefix
 */
export function decodeLength(prefix: Buffer): number {
  if (prefix.length < LENGTH_PREFIX_SIZE) {
    throw new MalformedPacketError(`length prefix needs ${LENGTH_PREFIX_SIZE} bytes, got ${prefix.length}`);
  }

  const length = prefix.readInt32LE(0);
  if (length < PACKET_HEADER_LENGTH) {
    throw new MalformedPacketError(`declared length ${length} is below the minimum of ${PACKET_HEADER_LENGTH}`);
  }
  if (length > MAX_INCOMING_PACKET_LENGTH) {
    throw new MalformedPacketError(`declared length ${length} exceeds the maximum of ${MAX_INCOMING_PACKET_LENGTH}`);
  }
  return length;
}

/**
 * Decode the bytes that follow the length prefix
 */
export function decodePacketBody(body: Buffer): Packet {
  if (body.length < PACKET_HEADER_LENGTH) {
    throw new MalformedPacketError(`packet body is ${body.length} bytes, minimum is ${PACKET_HEADER_LENGTH}`);
  }

  const end = body.length;
  if (body[end - 2] !== 0x00 || body[end - 1] !== 0x00) {
    throw new MalformedPacketError('packet does not end with two NUL terminators');
  }

  const requestId = RequestId.fromNumber(body.readInt32LE(0));
  const typeValue = body.readInt32LE(4);
  if (!isPacketType(typeValue)) {
    throw new ProtocolViolationError(`unknown packet type ${typeValue}`, requestId);
  }

  let payload: string;
  try {
    payload = utf8Decoder.decode(body.subarray(8, end - 2));
  } catch (error) {
    throw new InvalidEncodingError('Packet payload is not valid UTF-8', error);
  }

  return { requestId, type: typeValue, payload };
}

/**
 * Decode a complete frame (length prefix included)
 */
export function decodePacket(frame: Buffer): Packet {
  const length = decodeLength(frame);
  if (frame.length !== LENGTH_PREFIX_SIZE + length) {
    throw new MalformedPacketError(
      `frame is ${frame.length} bytes but declares ${LENGTH_PREFIX_SIZE + length}`
    );
  }
  return decodePacketBody(frame.subarray(LENGTH_PREFIX_SIZE));
}

/**
 * Split a buffer holding back-to-back frames into packets
 */
export function decodePackets(buffer: Buffer): Packet[] {
  const packets: Packet[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    const length = decodeLength(buffer.subarray(offset, offset + LENGTH_PREFIX_SIZE));
    const end = offset + LENGTH_PREFIX_SIZE + length;
    if (end > buffer.length) {
      throw new MalformedPacketError(`frame at offset ${offset} is truncated`);
    }
    packets.push(decodePacketBody(buffer.subarray(offset + LENGTH_PREFIX_SIZE, end)));
    offset = end;
  }

  return packets;
}

// ============================================================================
// Stream I/O
// ============================================================================

/**
 * Read exactly one packet: the 4-byte prefix, then `length` more bytes
 */
export async function readPacket(stream: ByteStream): Promise<Packet> {
  const prefix = await stream.readExactly(LENGTH_PREFIX_SIZE);
  const length = decodeLength(prefix);
  const body = await stream.readExactly(length);
  return decodePacketBody(body);
}

/**
 * Encode packets and write them to the stream in a single write
 */
export async function writePackets(stream: ByteStream, packets: readonly Packet[]): Promise<void> {
  const frames = packets.map((packet) => encodePacket(packet.requestId, packet.type, packet.payload));
  await stream.write(Buffer.concat(frames));
}
