import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { DomainError } from '../../../domain/enrollment/errors.js';
import { ApplicationError } from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

/**
 * HTTP status for every enrollment rule violation. All of them are client
 * errors; the caller decides whether to retry.
 */
const DOMAIN_ERROR_STATUS: Record<string, number> = {
  COURSE_NOT_FOUND: 404,
  ENROLLMENT_NOT_FOUND: 404,
  ALREADY_ENROLLED: 409,
  COURSE_FULL: 409,
  TIME_CONFLICT: 409,
  MAX_COURSE_LIMIT_REACHED: 422,
  MIN_COURSE_LIMIT_REACHED: 422,
  INVALID_TIME_SLOT: 400,
};

const APPLICATION_ERROR_STATUS: Record<string, number> = {
  NOT_FOUND: 404,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  CONFLICT: 409,
};

function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(400).json(response);
    return;
  }

  if (isMalformedJson(err)) {
    const response: ErrorResponse = {
      code: 'INVALID_JSON',
      message: 'Request body is not valid JSON',
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof DomainError) {
    const response: ErrorResponse = {
      code: err.code,
      message: err.message,
    };
    res.status(DOMAIN_ERROR_STATUS[err.code] ?? 400).json(response);
    return;
  }

  if (err instanceof ApplicationError) {
    const response: ErrorResponse = {
      code: err.code,
      message: err.message,
    };
    res.status(APPLICATION_ERROR_STATUS[err.code] ?? 400).json(response);
    return;
  }

  // Anything else is a bug or an infrastructure failure; the transaction
  // that raised it has already been rolled back
  console.error('Unhandled error:', err);

  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
