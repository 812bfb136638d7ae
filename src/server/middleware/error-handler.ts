/**
 * Maps failures to JSON responses:
 *   ZodError   → 400 with the issues
 *   AppError   → its statusCode (400 for ValidationError, 500 otherwise)
 *   anything else → 500 with a generic message
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { AppError, ValidationError, errorMessage } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ZodError) {
      res.status(400).json({
        status: 'fail',
        message: 'Validation Error',
        errors: err.issues,
      });
      return;
    }

    if (err instanceof ValidationError) {
      res.status(err.statusCode).json({
        status: 'fail',
        message: err.message,
        errors: err.issues,
      });
      return;
    }

    logger.error(`${req.method} ${req.path} failed: ${errorMessage(err)}`);

    if (err instanceof AppError) {
      res.status(err.statusCode).json({
        status: 'error',
        message: err.message,
      });
      return;
    }

    res.status(500).json({
      status: 'error',
      message: 'Internal Server Error',
    });
  };
}
