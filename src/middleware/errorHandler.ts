import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode } from '../utils/appError.js';
import { logger } from '../utils/logger.js';
import { validationError } from './validate.js';

export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  // Zod parse inside a controller (query strings, route params)
  const appError = err instanceof ZodError ? validationError(err) : err;

  if (appError instanceof AppError) {
    if (!appError.isOperational) {
      logger.error('Non-operational AppError:', {
        message: appError.message,
        code: appError.code,
        stack: appError.stack,
      });
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
  if (err.name === 'ValidationError') {
    res.status(400).json({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Validation error',
        details: err.message,
      },
    });
    return;
  }

  // Mongoose duplicate key
  if (err.name === 'MongoServerError' && 'code' in err && err.code === 11000) {
    res.status(409).json({
      success: false,
      error: {
        code: ErrorCode.DUPLICATE_ENTRY,
        message: 'Duplicate entry',
      },
    });
    return;
  }

  // Mongoose cast error
  if (err.name === 'CastError') {
    res.status(400).json({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Invalid value format',
      },
    });
    return;
  }

  // Unknown error
  logger.error('Unhandled error:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
  });

  res.status(500).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'Internal server error',
    },
  });
};
