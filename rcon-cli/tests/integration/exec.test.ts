/**
 * Integration tests for the exec command against an in-memory server
 */

import { describe, it, expect, vi } from 'vitest';
import { ConnectionClosedError, PacketType, RequestId } from '@rcon-kit/client';
import { MemoryByteStream } from '@rcon-kit/client/testing';
import { runExec } from '../../src/commands/exec.js';
import { captureOutput, cliOptions, connectTo, fakeServer } from '../helpers/fakeServer.js';

const responses = {
  seed: 'Seed: [-1137927873379713691]',
  list: '§6There are §c1§6 of a max of 20 players online: Alex',
  'time set day': '',
};

describe('Exec Command Integration', () => {
  it('should run each argument as one command and print the responses', async () => {
    const stream = new MemoryByteStream().respondWith(fakeServer(responses));
    const output = captureOutput();

    const code = await runExec(['seed', 'list'], cliOptions(), { connector: connectTo(stream), output });

    expect(code).toBe(0);
    expect(output.lines).toEqual([
      'Seed: [-1137927873379713691]',
      'There are 1 of a max of 20 players online: Alex',
    ]);
    expect(output.errors).toEqual([]);
    expect(stream.wasClosedByClient()).toBe(true);
  });

  it('should send commands without trimming them', async () => {
    const stream = new MemoryByteStream().respondWith(fakeServer(responses));
    const output = captureOutput();

    const code = await runExec(['say  hi  '], cliOptions(), { connector: connectTo(stream), output });

    expect(code).toBe(0);
    expect(stream.sentPackets.map((packet) => packet.payload)).toEqual(['test-secret', 'say  hi  ', '']);
    expect(output.lines).toEqual(['Unknown command: say  hi  ']);
  });

  it('should keep formatting codes with --raw', async () => {
    const stream = new MemoryByteStream().respondWith(fakeServer(responses));
    const output = captureOutput();

    await runExec(['list'], cliOptions({ raw: true }), { connector: connectTo(stream), output });

    expect(output.lines).toEqual(['§6There are §c1§6 of a max of 20 players online: Alex']);
  });

  it('should print nothing for a command with an empty response', async () => {
    const stream = new MemoryByteStream().respondWith(fakeServer(responses));
    const output = captureOutput();

    const code = await runExec(['time set day'], cliOptions(), { connector: connectTo(stream), output });

    expect(code).toBe(0);
    expect(output.lines).toEqual([]);
  });

  it('should exit 1 without connecting when input is invalid', async () => {
    const connector = vi.fn(connectTo(new MemoryByteStream()));
    const output = captureOutput();

    const code = await runExec(['seed'], cliOptions({ password: undefined }), { connector, output });

    expect(code).toBe(1);
    expect(output.errors).toEqual(['Error: Password is required (use --password or RCON_PASSWORD)']);
    expect(connector).not.toHaveBeenCalled();
  });

  it('should validate every command before sending any', async () => {
    const stream = new MemoryByteStream().respondWith(fakeServer(responses));
    const output = captureOutput();

    const code = await runExec(['seed', '   '], cliOptions(), { connector: connectTo(stream), output });

    expect(code).toBe(1);
    expect(output.errors).toEqual(['Error: Command cannot be empty']);
    expect(stream.writes).toHaveLength(0);
  });

  it('should exit 2 when the connection is refused', async () => {
    const output = captureOutput();
    const connector = () =>
      Promise.reject(new ConnectionClosedError('Failed to connect to localhost:25575: connect ECONNREFUSED'));

    const code = await runExec(['seed'], cliOptions(), { connector, output });

    expect(code).toBe(2);
    expect(output.errors).toEqual(['Error: Failed to connect to localhost:25575: connect ECONNREFUSED']);
  });

  it('should exit 2 when the server stops answering', async () => {
    const stream = new MemoryByteStream({ readTimeout: 20 }).respondWith((packet, server) => {
      if (packet.type === PacketType.Auth) {
        server.injectPacket({ requestId: packet.requestId, type: PacketType.AuthResponse, payload: '' });
      }
    });
    const output = captureOutput();

    const code = await runExec(['seed'], cliOptions(), { connector: connectTo(stream), output });

    expect(code).toBe(2);
    expect(output.errors).toEqual([
      'Error: Timed out after 20ms waiting for data (is the server reachable and RCON enabled?)',
    ]);
  });

  it('should exit 3 on a wrong password', async () => {
    const stream = new MemoryByteStream().respondWith(fakeServer(responses));
    const output = captureOutput();

    const code = await runExec(['seed'], cliOptions({ password: 'wrong-secret' }), {
      connector: connectTo(stream),
      output,
    });

    expect(code).toBe(3);
    expect(output.errors).toEqual(['Error: Authentication failed: incorrect password']);
    expect(stream.sentPackets).toHaveLength(1);
  });

  it('should exit 3 on a protocol violation and print earlier responses', async () => {
    const server = fakeServer(responses);
    const stream = new MemoryByteStream().respondWith((packet, srv) => {
      if (packet.payload === 'list') {
        srv.injectPacket({
          requestId: RequestId.fromNumber(RequestId.unwrap(packet.requestId) + 1),
          type: PacketType.ResponseValue,
          payload: 'stray',
        });
        return;
      }
      server(packet, srv);
    });
    const output = captureOutput();

    const code = await runExec(['seed', 'list'], cliOptions(), { connector: connectTo(stream), output });

    expect(code).toBe(3);
    expect(output.lines).toEqual(['Seed: [-1137927873379713691]']);
    expect(output.errors).toEqual(['Error: Protocol violation: response has request id 4, expected 3']);
  });
});
