// Unit tests for custom error classes

import { describe, it, expect } from 'vitest';
import {
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
} from '../../src/errors.js';
import { RequestId } from '../../src/types.js';

describe('Error Classes', () => {
  describe('RconClientError', () => {
    it('should maintain instanceof chain through Object.setPrototypeOf', () => {
      const error = new ConnectionClosedError();

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(RconClientError);
      expect(error).toBeInstanceOf(ConnectionClosedError);
      expect(error.name).toBe('ConnectionClosedError');
      expect(error.kind).toBe('ConnectionClosed');
      expect(error.message).toBe('Connection closed');
    });

    it('should keep the underlying cause', () => {
      const cause = new Error('ECONNRESET');
      const error = new ConnectionClosedError('Socket error', cause);

      expect(error.cause).toBe(cause);
    });
  });

  describe('TimeoutError', () => {
    it('should report the deadline in its default message', () => {
      const error = new TimeoutError(250);

      expect(error.timeoutMs).toBe(250);
      expect(error.message).toBe('Timed out after 250ms waiting for data');
      expect(error.kind).toBe('Timeout');
    });
  });

  describe('Message prefixes', () => {
    it('should prefix malformed packet messages', () => {
      expect(new MalformedPacketError('bad length').message).toBe('Malformed packet: bad length');
    });

    it('should prefix protocol violations and keep the request id', () => {
      const requestId = RequestId.fromNumber(12);
      const error = new ProtocolViolationError('unexpected packet', requestId);

      expect(error.message).toBe('Protocol violation: unexpected packet');
      expect(error.requestId).toBe(requestId);
    });
  });

  describe('isFatal', () => {
    it('should treat stream-level failures as fatal', () => {
      expect(isFatal(new ConnectionClosedError())).toBe(true);
      expect(isFatal(new TimeoutError(1))).toBe(true);
      expect(isFatal(new MalformedPacketError('x'))).toBe(true);
      expect(isFatal(new InvalidEncodingError('x'))).toBe(true);
      expect(isFatal(new ProtocolViolationError('x'))).toBe(true);
    });

    it('should treat caller and auth errors as recoverable', () => {
      expect(isFatal(new InvalidPayloadError('x'))).toBe(false);
      expect(isFatal(new PayloadTooLargeError(5000, 4096))).toBe(false);
      expect(isFatal(new AuthenticationFailedError())).toBe(false);
      expect(isFatal(new NotAuthenticatedError())).toBe(false);
      expect(isFatal(new AlreadyAuthenticatedError())).toBe(false);
    });

    it('should ignore errors from outside the client', () => {
      expect(isFatal(new Error('boom'))).toBe(false);
      expect(isFatal('boom')).toBe(false);
    });
  });
});
