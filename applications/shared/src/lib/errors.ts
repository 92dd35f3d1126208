/**
 * Error taxonomy for catalog, playlist and transport operations.
 *
 * None of these end the session: the dispatcher turns them into a transient
 * status message. Backend failures are not thrown at all, they arrive as
 * `BackendError` events on the audio channel.
 */

export type SessionErrorCode = 'NotFound' | 'DuplicateName' | 'InvalidState';

export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
  }
}

export class NotFoundError extends SessionError {
  readonly subject: string;

  constructor(kind: 'playlist' | 'track', subject: string) {
    super('NotFound', `No ${kind} named "${subject}"`);
    this.name = 'NotFoundError';
    this.subject = subject;
  }
}

export class DuplicateNameError extends SessionError {
  readonly subject: string;

  constructor(subject: string) {
    super('DuplicateName', `A playlist named "${subject}" already exists`);
    this.name = 'DuplicateNameError';
    this.subject = subject;
  }
}

export class InvalidStateError extends SessionError {
  constructor(message: string) {
    super('InvalidState', message);
    this.name = 'InvalidStateError';
  }
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}
