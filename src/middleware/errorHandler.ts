import { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import { ZodError } from 'zod';
import { AppError, ErrorCode } from '../utils/appError.js';
import { logger } from '../utils/logger.js';
import { toValidationError } from './validate.js';

export function isDuplicateKeyError(err: Error): boolean {
  return err.name === 'MongoServerError' && 'code' in err && err.code === 11000;
}

export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  const appError = err instanceof ZodError ? toValidationError(err) : err;

  // AppError (operational)
  if (appError instanceof AppError) {
    if (!appError.isOperational) {
      logger.error({ err: appError, code: appError.code }, 'Non-operational AppError');
    }

    res.status(appError.statusCode).json({
      success: false,
      error: {
        code: appError.code,
        message: appError.message,
        details: appError.details,
      },
    });
    return;
  }

  // Mongoose validation error
  if (err instanceof mongoose.Error.ValidationError) {
    res.status(400).json({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Validation error',
        details: {
          errors: Object.entries(err.errors).map(([path, e]) => ({ path, message: e.message })),
        },
      },
    });
    return;
  }

  // Mongoose duplicate key
  if (isDuplicateKeyError(err)) {
    res.status(409).json({
      success: false,
      error: {
        code: ErrorCode.DUPLICATE_ENTRY,
        message: 'Duplicate entry',
      },
    });
    return;
  }

  // Mongoose cast error (invalid ObjectId)
  if (err instanceof mongoose.Error.CastError) {
    res.status(400).json({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Invalid ID format',
      },
    });
    return;
  }

  // Unknown error
  logger.error({ err }, 'Unhandled error');

  res.status(500).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'Internal server error',
    },
  });
};
