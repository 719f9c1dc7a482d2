import { NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { SessionUnavailableReason } from '../../session/interfaces/session.interface';

/**
 * The session is unknown or has expired. Callers usually start a fresh one.
 */
export class SessionUnavailableError extends NotFoundException {
  constructor(
    readonly sessionId: string,
    readonly reason: SessionUnavailableReason,
  ) {
    super(`Session ${sessionId} is unavailable (${reason})`);
    this.name = 'SessionUnavailableError';
  }
}

/**
 * A valid session has no conversation window
 */
export class ConversationNotFoundError extends NotFoundException {
  constructor(readonly sessionId: string) {
    super(`No conversation found for session ${sessionId}`);
    this.name = 'ConversationNotFoundError';
  }
}

/**
 * The durable turn write failed after all retries. The in-memory turn has
 * already been rolled back when this is thrown.
 */
export class AppendPersistenceError extends ServiceUnavailableException {
  constructor(
    readonly sessionId: string,
    readonly failure: unknown,
  ) {
    super(`Failed to persist turn for session ${sessionId}`);
    this.name = 'AppendPersistenceError';
  }
}
