// Protocol constants and enums for the RCON wire format

/**
 * Packet type discriminators (int32, little-endian)
 *
 * AuthResponse and ExecCommand share the value 2; direction tells them apart.
 */
export enum PacketType {
  ResponseValue = 0,
  ExecCommand = 2,
  AuthResponse = 2,
  Auth = 3,
}

const PACKET_TYPE_VALUES: ReadonlySet<number> = new Set([
  PacketType.ResponseValue,
  PacketType.ExecCommand,
  PacketType.Auth,
]);

export function isPacketType(value: number): value is PacketType {
  return PACKET_TYPE_VALUES.has(value);
}

/**
 * Default port Minecraft listens on for RCON
 */
export const DEFAULT_RCON_PORT = 25575;

/**
 * Size of the int32 length prefix
 */
export const LENGTH_PREFIX_SIZE = 4;

/**
 * Bytes counted by the length field besides the payload:
 * request id (4) + type (4) + payload terminator (1) + packet terminator (1)
 */
export const PACKET_HEADER_LENGTH = 10;

/**
 * Largest payload the codec will put on or accept from the wire
 */
export const MAX_PAYLOAD_LENGTH = 4096;

/**
 * Largest value of the length field accepted when decoding (1 MiB)
 *
 * Servers may send fragments above MAX_PAYLOAD_LENGTH: a multibyte character
 * cut at the 4096-byte boundary is re-encoded as U+FFFD and grows the packet.
 * This only bounds the buffer allocated for a corrupt length prefix.
 */
export const MAX_INCOMING_PACKET_LENGTH = 1024 * 1024;

/**
 * Largest password or command a vanilla Minecraft server accepts, in bytes
 */
export const MAX_OUTGOING_PAYLOAD_LENGTH = 1446;
