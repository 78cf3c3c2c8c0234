// Command executor - sends a command plus sentinel and reassembles the response

import { RequestId } from '../types.js';
import { Session } from './session.js';
import { FragmentedResponse } from './fragmentedResponse.js';
import { PacketType } from '../protocol/constants.js';
import { validatePayload } from '../protocol/codecs.js';
import { InvalidPayloadError, NotAuthenticatedError } from '../errors.js';

/**
 * Outcome of one command
 */
export interface CommandResult {
  readonly requestId: RequestId;
  readonly response: string;
  readonly fragmentCount: number;
}

/**
 * Executes commands on an authenticated session.
 *
 * Every command is followed by an empty command under the same request id.
 * Servers that cannot tell the two apart still run the empty one, so one
 * extra (no-op) command is observable server-side per call.
 */
export class CommandExecutor {
  async execute(session: Session, command: string): Promise<CommandResult> {
    session.ensureOpen();
    if (!session.isAuthenticated()) {
      throw new NotAuthenticatedError();
    }

    // Rejected locally, before anything is sent.
    // An empty command would be answered like the sentinel and end the response early.
    if (command === '') {
      throw new InvalidPayloadError('Command must not be empty');
    }
    validatePayload(command, session.config.maxCommandLength);

    return session.exchange(async () => {
      const requestId = session.nextRequestId();

      await session.send(
        { requestId, type: PacketType.ExecCommand, payload: command },
        { requestId, type: PacketType.ExecCommand, payload: '' }
      );

      const response = new FragmentedResponse(requestId);
      let done = false;
      while (!done) {
        done = response.accept(await session.receive());
      }

      return {
        requestId,
        response: response.text(),
        fragmentCount: response.fragmentCount,
      };
    });
  }
}
