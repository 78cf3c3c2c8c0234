// Handshake manager - authenticates a session with the server password

import { RequestId } from '../types.js';
import { Session } from './session.js';
import { Packet } from '../protocol/packet.js';
import { PacketType } from '../protocol/constants.js';
import { validatePayload } from '../protocol/codecs.js';
import {
  AlreadyAuthenticatedError,
  AuthenticationFailedError,
  ConnectionClosedError,
  ProtocolViolationError,
} from '../errors.js';

/**
 * Drives Unauthenticated -> AwaitingAuthResponse -> Authenticated (or AuthFailed).
 * Never retries; after AuthFailed the caller may call logIn again.
 */
export class HandshakeManager {
  async logIn(session: Session, password: string): Promise<void> {
    switch (session.state) {
      case 'Authenticated':
        throw new AlreadyAuthenticatedError();

      case 'Closed':
        throw new ConnectionClosedError('Session is closed');

      case 'AwaitingAuthResponse':
        throw new Error('A login is already in progress on this session');

      case 'Unauthenticated':
      case 'AuthFailed':
        break;
    }

    // Rejected locally, before anything is sent
    validatePayload(password, session.config.maxCommandLength);

    await session.exchange(async () => {
      const requestId = session.nextRequestId();
      session.transition('AwaitingAuthResponse');

      await session.send({ requestId, type: PacketType.Auth, payload: password });

      const response = await this.readAuthResponse(session, requestId);
      this.applyResponse(session, response, requestId);
    });
  }

  /**
   * Read the authoritative response, skipping one empty ResponseValue that
   * some servers send right before it
   */
  private async readAuthResponse(session: Session, requestId: RequestId): Promise<Packet> {
    const first = await session.receive();
    const isPreamble =
      first.requestId === requestId && first.type === PacketType.ResponseValue && first.payload === '';
    return isPreamble ? session.receive() : first;
  }

  private applyResponse(session: Session, response: Packet, requestId: RequestId): void {
    if (response.requestId === RequestId.authFailure) {
      if (response.type !== PacketType.AuthResponse && response.type !== PacketType.ResponseValue) {
        throw new ProtocolViolationError(
          `unexpected packet type ${response.type} in auth failure response`,
          response.requestId
        );
      }
      session.transition('AuthFailed');
      throw new AuthenticationFailedError();
    }

    if (response.requestId !== requestId) {
      throw new ProtocolViolationError(
        `auth response has request id ${response.requestId}, expected ${requestId}`,
        response.requestId
      );
    }

    if (response.type !== PacketType.AuthResponse) {
      throw new ProtocolViolationError(
        `auth response has packet type ${response.type}, expected ${PacketType.AuthResponse}`,
        response.requestId
      );
    }

    session.transition('Authenticated');
  }
}
