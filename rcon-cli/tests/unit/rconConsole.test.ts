/**
 * Unit tests for RconConsole error mapping and cleanup
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConnectionClosedError, TimeoutError } from '@rcon-kit/client';
import { MemoryByteStream } from '@rcon-kit/client/testing';
import { RconConsole } from '../../src/rconConsole.js';
import { OperationError } from '../../src/errors.js';
import { PASSWORD, connectTo, fakeServer } from '../helpers/fakeServer.js';

const settings = { host: 'localhost', port: 25575, password: PASSWORD, timeout: 5000 };

describe('RconConsole', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should open a session and run commands', async () => {
    const stream = new MemoryByteStream().respondWith(fakeServer({ seed: 'Seed: [42]' }));
    const rcon = new RconConsole(settings, connectTo(stream));

    await rcon.open();
    await expect(rcon.run('seed')).resolves.toBe('Seed: [42]');
    await rcon.close();

    expect(stream.wasClosedByClient()).toBe(true);
  });

  it('should map a refused connection to a connection error', async () => {
    const rcon = new RconConsole(settings, () =>
      Promise.reject(new ConnectionClosedError('Failed to connect to localhost:25575: connect ECONNREFUSED'))
    );

    await expect(rcon.open()).rejects.toMatchObject({
      operation: 'connect',
      reason: 'connection',
      message: 'Failed to connect to localhost:25575: connect ECONNREFUSED',
    });
  });

  it('should map a connect timeout to a timeout error', async () => {
    const rcon = new RconConsole(settings, () => Promise.reject(new TimeoutError(5000)));

    await expect(rcon.open()).rejects.toMatchObject({ operation: 'connect', reason: 'timeout' });
  });

  it('should map a rejected password to an authentication error', async () => {
    const stream = new MemoryByteStream().respondWith(fakeServer());
    const rcon = new RconConsole({ ...settings, password: 'wrong-secret' }, connectTo(stream));

    const error = await rcon.open().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(OperationError);
    expect(error).toMatchObject({
      operation: 'login',
      reason: 'authentication',
      message: 'Authentication failed: incorrect password',
    });
    await rcon.close();
  });

  it('should pass through errors from outside the client', async () => {
    const failure = new Error('unexpected');
    const rcon = new RconConsole(settings, () => Promise.reject(failure));

    await expect(rcon.open()).rejects.toBe(failure);
  });

  it('should refuse to run commands before open', async () => {
    const rcon = new RconConsole(settings, connectTo(new MemoryByteStream()));

    await expect(rcon.run('seed')).rejects.toThrow('Not connected to localhost:25575');
  });

  it('should log, not throw, when disconnecting fails', async () => {
    class FailingCloseStream extends MemoryByteStream {
      async close(): Promise<void> {
        throw new Error('close failed');
      }
    }
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stream = new FailingCloseStream().respondWith(fakeServer());
    const rcon = new RconConsole(settings, connectTo(stream));
    await rcon.open();

    await expect(rcon.close()).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe('Warning: Failed to disconnect from localhost:25575:');
  });
});
