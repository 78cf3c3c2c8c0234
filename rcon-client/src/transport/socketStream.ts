// TCP transport for RCON built on node's net.Socket

import { Socket } from 'net';
import { ByteStream } from './stream.js';
import { ExactReader } from './exactReader.js';
import { ConnectionClosedError, TimeoutError } from '../errors.js';
import { ConnectionConfigInput, createConnectionConfig } from '../config.js';
import { DEFAULT_RCON_PORT } from '../protocol/constants.js';
import { debugLog } from '../utils/debug.js';

export interface SocketAddress {
  readonly host: string;
  readonly port: number;
}

/**
 * Parse "host", "host:port" or "[v6]:port" into an address.
 * The port defaults to 25575.
 */
export function parseAddress(address: string | SocketAddress): SocketAddress {
  if (typeof address !== 'string') {
    return address;
  }

  const trimmed = address.trim();
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed);
  if (bracketed) {
    return { host: bracketed[1], port: parsePort(bracketed[2], address) };
  }

  const parts = trimmed.split(':');
  if (parts.length === 1) {
    return { host: trimmed, port: DEFAULT_RCON_PORT };
  }
  if (parts.length === 2) {
    return { host: parts[0], port: parsePort(parts[1], address) };
  }
  // Bare IPv6 literal without a port
  return { host: trimmed, port: DEFAULT_RCON_PORT };
}

function parsePort(value: string | undefined, address: string): number {
  if (value === undefined) {
    return DEFAULT_RCON_PORT;
  }
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new Error(`Invalid port in address: ${address}`);
  }
  return port;
}

/**
 * net.Socket wrapped as a ByteStream
 */
export class SocketByteStream implements ByteStream {
  private readonly reader: ExactReader;

  private constructor(
    private readonly socket: Socket,
    readTimeout: number,
    public readonly endpoint: string
  ) {
    this.reader = new ExactReader(readTimeout);

    socket.on('data', (chunk: Buffer) => this.reader.push(chunk));
    socket.on('end', () => this.reader.fail(new ConnectionClosedError('Server closed the connection')));
    socket.on('error', (err: Error) =>
      this.reader.fail(new ConnectionClosedError(`Socket error on ${endpoint}: ${err.message}`, err))
    );
    socket.on('close', () => this.reader.fail(new ConnectionClosedError('Connection closed')));
  }

  /**
   * Open a TCP connection
   * @throws TimeoutError if the connection is not established within connectTimeout
   * @throws ConnectionClosedError if the connection is refused or fails
   */
  static connect(address: string | SocketAddress, options: ConnectionConfigInput = {}): Promise<SocketByteStream> {
    const { host, port } = parseAddress(address);
    const config = createConnectionConfig(options);
    const endpoint = `${host}:${port}`;

    return new Promise<SocketByteStream>((resolve, reject) => {
      const socket = new Socket();

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new TimeoutError(config.connectTimeout, `Timed out after ${config.connectTimeout}ms connecting to ${endpoint}`));
      }, config.connectTimeout);

      const handleConnectionError = (err: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(new ConnectionClosedError(`Failed to connect to ${endpoint}: ${err.message}`, err));
      };

      socket.once('error', handleConnectionError);
      socket.connect({ host, port, noDelay: true, keepAlive: true }, () => {
        clearTimeout(timer);
        socket.off('error', handleConnectionError);
        debugLog(`Connected to ${endpoint}`);
        resolve(new SocketByteStream(socket, config.readTimeout, endpoint));
      });
    });
  }

  get closed(): boolean {
    return this.reader.failed;
  }

  write(bytes: Buffer): Promise<void> {
    if (this.reader.failed || this.socket.destroyed) {
      return Promise.reject(new ConnectionClosedError(`Cannot write to closed connection ${this.endpoint}`));
    }

    return new Promise<void>((resolve, reject) => {
      this.socket.write(bytes, (err?: Error | null) => {
        if (err) {
          reject(new ConnectionClosedError(`Failed to write to ${this.endpoint}: ${err.message}`, err));
        } else {
          resolve();
        }
      });
    });
  }

  readExactly(size: number): Promise<Buffer> {
    return this.reader.read(size);
  }

  async close(): Promise<void> {
    this.reader.fail(new ConnectionClosedError('Connection closed by client'));
    if (!this.socket.destroyed) {
      this.socket.destroy();
      debugLog(`Disconnected from ${this.endpoint}`);
    }
  }
}
