import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodIssue, ZodSchema } from 'zod';

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Parse the request parts that have a schema and replace them with the
 * parsed values. Issues from every part are reported together as one
 * ZodError, which errorHandler turns into 400 VALIDATION_ERROR.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const issues: ZodIssue[] = [];

    if (schemas.params) {
      const result = schemas.params.safeParse(req.params);
      if (result.success) req.params = result.data;
      else issues.push(...result.error.issues);
    }
    if (schemas.query) {
      const result = schemas.query.safeParse(req.query);
      if (result.success) req.query = result.data;
      else issues.push(...result.error.issues);
    }
    if (schemas.body) {
      const result = schemas.body.safeParse(req.body);
      if (result.success) req.body = result.data;
      else issues.push(...result.error.issues);
    }

    next(issues.length > 0 ? new ZodError(issues) : undefined);
  };
}
