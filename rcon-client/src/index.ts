// Public API exports for @rcon-kit/client

// Main client class
export { RconClient } from './client.js';
export type { ConnectOptions } from './client.js';

// Configuration
export type { ClientConfig, ClientConfigInput, ConnectionConfig, ConnectionConfigInput } from './config.js';
export {
  createConfig,
  validateConfig,
  createConnectionConfig,
  validateConnectionConfig,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_READ_TIMEOUT,
  DEFAULT_MAX_COMMAND_LENGTH,
} from './config.js';

// Error types
export {
  RconClientError,
  ConnectionClosedError,
  TimeoutError,
  MalformedPacketError,
  InvalidEncodingError,
  InvalidPayloadError,
  PayloadTooLargeError,
  AuthenticationFailedError,
  ProtocolViolationError,
  NotAuthenticatedError,
  AlreadyAuthenticatedError,
  isFatal,
} from './errors.js';
export type { RconErrorKind } from './errors.js';

// Core types
export { RequestId } from './types.js';

// Protocol (for advanced usage / testing)
export type { Packet } from './protocol/packet.js';
export {
  PacketType,
  DEFAULT_RCON_PORT,
  MAX_PAYLOAD_LENGTH,
  MAX_OUTGOING_PAYLOAD_LENGTH,
} from './protocol/constants.js';
export {
  encodePacket,
  decodePacket,
  decodePackets,
  decodeLength,
  decodePacketBody,
  readPacket,
  writePackets,
  validatePayload,
  packetLength,
} from './protocol/codecs.js';

// Session-level building blocks
export { Session } from './state/session.js';
export type { SessionState } from './state/session.js';
export { HandshakeManager } from './state/handshake.js';
export { CommandExecutor } from './state/commandExecutor.js';
export type { CommandResult } from './state/commandExecutor.js';

// Transport
export type { ByteStream } from './transport/stream.js';
export { SocketByteStream, parseAddress } from './transport/socketStream.js';
export type { SocketAddress } from './transport/socketStream.js';

// Events
export { ClientEvents, isClientEventName } from './events/eventNames.js';
export type { ClientEventName } from './events/eventNames.js';
export type {
  AuthenticatedEvent,
  CommandCompletedEvent,
  DisconnectedEvent,
  RconClientEventMap,
} from './events/eventTypes.js';
