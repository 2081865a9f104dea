import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { USER_ROLES, UserRole } from '../../../domain/auth/user.js';
import { ForbiddenError, UnauthorizedError } from '../../../application/errors.js';

const jwtPayloadSchema = z.object({
  userId: z.string().uuid(),
  username: z.string(),
  role: z.enum(USER_ROLES),
});

export type AuthContext = z.infer<typeof jwtPayloadSchema>;

export interface AuthRequest extends Request {
  auth?: AuthContext;
}

/**
 * Verify the bearer token and attach its claims to the request.
 */
export function authMiddleware(jwtSecret: string) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    const token = authHeader.substring('Bearer '.length);

    let decoded: unknown;
    try {
      decoded = jwt.verify(token, jwtSecret);
    } catch {
      next(new UnauthorizedError('Invalid or expired token'));
      return;
    }

    const claims = jwtPayloadSchema.safeParse(decoded);
    if (!claims.success) {
      next(new UnauthorizedError('Invalid or expired token'));
      return;
    }

    req.auth = claims.data;
    next();
  };
}

/**
 * Only let through users holding one of the given roles.
 * Must run after authMiddleware.
 */
export function requireRole(...roles: UserRole[]) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    if (!req.auth) {
      next(new UnauthorizedError());
      return;
    }
    if (!roles.includes(req.auth.role)) {
      next(new ForbiddenError(`This action requires role: ${roles.join(' or ')}`));
      return;
    }
    next();
  };
}

/**
 * Claims of an authenticated request; throws when authMiddleware did not run.
 */
export function getAuth(req: AuthRequest): AuthContext {
  if (!req.auth) {
    throw new UnauthorizedError();
  }
  return req.auth;
}
