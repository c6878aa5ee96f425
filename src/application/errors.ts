/**
 * Errors raised by use cases. Each one knows the HTTP status and the
 * machine-readable code the API answers with; the message is shown to
 * the client as-is.
 */
export abstract class ApplicationError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Input that passed schema checks but breaks a rule, e.g. writing a record for a doctor. */
export class ValidationError extends ApplicationError {
  readonly status = 400;
  readonly code = 'VALIDATION_ERROR';

  constructor(message = 'Invalid request') {
    super(message);
  }
}

export class UnauthorizedError extends ApplicationError {
  readonly status = 401;
  readonly code = 'UNAUTHORIZED';

  constructor(message = 'Authentication required') {
    super(message);
  }
}

export class ForbiddenError extends ApplicationError {
  readonly status = 403;
  readonly code = 'FORBIDDEN';

  constructor(message = 'Access denied') {
    super(message);
  }
}

export class NotFoundError extends ApplicationError {
  readonly status = 404;
  readonly code = 'NOT_FOUND';

  constructor(message = 'Resource not found') {
    super(message);
  }
}

export class ConflictError extends ApplicationError {
  readonly status = 409;
  readonly code = 'CONFLICT';

  constructor(message = 'Conflict') {
    super(message);
  }
}
