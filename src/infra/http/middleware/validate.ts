import type { Request, Response, NextFunction } from 'express';
import { z, ZodSchema } from 'zod';

// Course and enrollment ids are Postgres INT columns
const MAX_ROW_ID = 2_147_483_647;

/** Row id in a JSON body. */
export const idSchema = z.number().int().positive().max(MAX_ROW_ID);

/** Row id in a path segment. */
export const idParamSchema = z.coerce.number().int().positive().max(MAX_ROW_ID);

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Zod validation middleware. Replaces body, params and query with their
 * parsed values; a ZodError goes to the error handler as VALIDATION_ERROR.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}
