/**
 * Domain error taxonomy shared by the thread store, job state machine,
 * dispatch service and both transports.
 */

export const DOMAIN_ERROR_CODES = [
  'NOT_FOUND',
  'FORBIDDEN',
  'THREAD_CLOSED',
  'INVALID_STATE',
  'INVALID_ARGUMENT',
  'UNAUTHENTICATED',
] as const;

export type DomainErrorCode = (typeof DOMAIN_ERROR_CODES)[number];

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unknown entity, or one the caller may not see. */
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';
}

export class ForbiddenError extends DomainError {
  readonly code = 'FORBIDDEN';
}

export class ThreadClosedError extends DomainError {
  readonly code = 'THREAD_CLOSED';

  constructor(message = 'This thread is closed.') {
    super(message);
  }
}

export class InvalidStateError extends DomainError {
  readonly code = 'INVALID_STATE';
}

export class InvalidArgumentError extends DomainError {
  readonly code = 'INVALID_ARGUMENT';
}

export class UnauthenticatedError extends DomainError {
  readonly code = 'UNAUTHENTICATED';

  constructor(message = 'Authentication required.') {
    super(message);
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
