import { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodSchema } from 'zod';
import { AppError, ErrorCode } from '../utils/appError.js';

/**
 * One entry per failing field, paths joined with dots ("requests.0.id")
 */
export function validationError(error: ZodError): AppError {
  return AppError.badRequest('Validation failed', ErrorCode.VALIDATION_ERROR, {
    errors: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}

/**
 * Parse the JSON body and replace it with the parsed value. Query strings
 * and route params are getter-only in Express 5; controllers parse those.
 */
export const validate = (schema: ZodSchema) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(validationError(result.error));
      return;
    }
    req.body = result.data;
    next();
  };
};
