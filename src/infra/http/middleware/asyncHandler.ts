import type { RequestHandler, Response, NextFunction } from 'express';
import type { AuthRequest } from './auth.js';

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards rejections to next().
 */
export function asyncHandler(
  fn: (req: AuthRequest, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
