import HttpError from './HttpError.js';

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message, undefined, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** The operation is not legal for the request's current status. */
export class InvalidStateError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details, 'INVALID_STATE');
    this.name = 'InvalidStateError';
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Admin access required') {
    super(403, message, undefined, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

/** The request still carries a temporary id and has no remote row yet. */
export class PendingSyncError extends HttpError {
  constructor(requestId: number) {
    super(409, `Request ${requestId} is still being synchronized`, { requestId }, 'PENDING_SYNC');
    this.name = 'PendingSyncError';
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message: string) {
    super(503, message, undefined, 'SERVICE_UNAVAILABLE');
    this.name = 'ServiceUnavailableError';
  }
}

/** Wraps a failure raised by the warehouse connection. */
export class RemoteUnavailableError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Remote ${operation} failed: ${reason}`, { cause });
    this.name = 'RemoteUnavailableError';
    this.operation = operation;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
