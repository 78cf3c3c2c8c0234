/**
 * Unit tests for output formatting and exit codes
 */

import { describe, it, expect } from 'vitest';
import { formatError, formatResponse, getExitCode, stripFormattingCodes } from '../../src/formatting.js';
import { OperationError, ValidationError } from '../../src/errors.js';

describe('Formatting', () => {
  describe('stripFormattingCodes', () => {
    it('should remove color and style codes', () => {
      expect(stripFormattingCodes('§6Gold §lbold§r plain')).toBe('Gold bold plain');
    });

    it('should accept upper-case code characters', () => {
      expect(stripFormattingCodes('§AGreen')).toBe('Green');
    });

    it('should leave a section sign without a code character alone', () => {
      expect(stripFormattingCodes('cost: 5§')).toBe('cost: 5§');
    });
  });

  describe('formatResponse', () => {
    it('should strip codes unless raw output is requested', () => {
      expect(formatResponse('§aThere are 0 players')).toBe('There are 0 players');
      expect(formatResponse('§aThere are 0 players', true)).toBe('§aThere are 0 players');
    });
  });

  describe('formatError', () => {
    it('should include sizes for validation errors that carry them', () => {
      const error = new ValidationError('command', 'Command exceeds maximum size', 2000, 1446);

      expect(formatError(error)).toBe('Error: Command exceeds maximum size (actual: 2000, expected: 1446)');
    });

    it('should print validation errors without sizes as is', () => {
      expect(formatError(new ValidationError('host', 'Host cannot be empty'))).toBe('Error: Host cannot be empty');
    });

    it('should add a hint to timeouts', () => {
      const error = new OperationError('login', 'timeout', 'Timed out after 5000ms waiting for data');

      expect(formatError(error)).toBe(
        'Error: Timed out after 5000ms waiting for data (is the server reachable and RCON enabled?)'
      );
    });

    it('should format other errors by message', () => {
      expect(formatError(new OperationError('login', 'authentication', 'Authentication failed: incorrect password'))).toBe(
        'Error: Authentication failed: incorrect password'
      );
      expect(formatError(new Error('boom'))).toBe('Error: boom');
      expect(formatError('boom')).toBe('Error: boom');
    });
  });

  describe('getExitCode', () => {
    it('should return 1 for validation errors', () => {
      expect(getExitCode(new ValidationError('port', 'bad port'))).toBe(1);
    });

    it('should return 2 for connection and timeout failures', () => {
      expect(getExitCode(new OperationError('connect', 'connection', 'refused'))).toBe(2);
      expect(getExitCode(new OperationError('command', 'timeout', 'slow'))).toBe(2);
    });

    it('should return 3 for everything else', () => {
      expect(getExitCode(new OperationError('login', 'authentication', 'denied'))).toBe(3);
      expect(getExitCode(new OperationError('command', 'protocol', 'bad id'))).toBe(3);
      expect(getExitCode(new Error('unexpected'))).toBe(3);
    });
  });
});
