import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema, ZodTypeDef } from 'zod';
import { AppError, ErrorCode } from '../utils/appError.js';

export function toValidationError(error: ZodError): AppError {
  const details = error.issues.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
  return AppError.badRequest('Validation failed', ErrorCode.VALIDATION_ERROR, {
    errors: details,
  });
}

/**
 * Validate request body or params using a Zod schema.
 */
export const validate = (schema: ZodSchema, source: 'body' | 'params' = 'body') => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      const data: unknown = schema.parse(req[source]);
      // In Express 5, req.params is getter-only; only reassign body
      if (source === 'body') {
        req.body = data;
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(toValidationError(error));
        return;
      }
      next(error);
    }
  };
};

/**
 * Parse req.query into a typed object. req.query is read-only in Express 5,
 * so controllers call this instead of relying on middleware to coerce it.
 */
export function parseQuery<T>(schema: ZodSchema<T, ZodTypeDef, unknown>, req: Request): T {
  const result = schema.safeParse(req.query);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
