/**
 * Application-level errors (outside the enrollment rule set) for HTTP
 * layer mapping. Each carries the stable code used in error responses.
 */
export class ApplicationError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends ApplicationError {
  constructor(message = 'Resource not found') {
    super('NOT_FOUND', message);
  }
}

export class UnauthorizedError extends ApplicationError {
  constructor(message = 'Unauthorized') {
    super('UNAUTHORIZED', message);
  }
}

export class ForbiddenError extends ApplicationError {
  constructor(message = 'Forbidden') {
    super('FORBIDDEN', message);
  }
}

export class ConflictError extends ApplicationError {
  constructor(message = 'Conflict') {
    super('CONFLICT', message);
  }
}
