import type { NextFunction, Response } from 'express';
import type { AuthRequest } from './auth.js';

/**
 * Express 4 ignores the promise a handler returns; rejections go to next().
 */
export function asyncHandler(
  fn: (req: AuthRequest, res: Response, next: NextFunction) => Promise<unknown>
): (req: AuthRequest, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
