import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ApplicationError } from '../../../application/errors.js';
import { logger } from '../../logging/logger.js';

/**
 * Body of every non-2xx JSON response.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

/** express.json() tags malformed bodies with `type: 'entity.parse.failed'`. */
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

function toResponse(err: Error): { status: number; body: ErrorResponse } | null {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
      },
    };
  }
  if (isBodyParseError(err)) {
    return { status: 400, body: { code: 'VALIDATION_ERROR', message: 'Malformed request body' } };
  }
  if (err instanceof ApplicationError) {
    return { status: err.status, body: { code: err.code, message: err.message } };
  }
  return null;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const known = toResponse(err);
  if (known) {
    logger.debug({ err, path: req.path, status: known.status }, 'Request rejected');
    res.status(known.status).json(known.body);
    return;
  }

  // Unknown errors never leak their message
  logger.error({ err, method: req.method, path: req.path }, 'Unhandled error');
  const body: ErrorResponse = { code: 'INTERNAL_ERROR', message: 'Internal server error' };
  res.status(500).json(body);
}
