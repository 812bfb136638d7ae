import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ZodType } from 'zod';

/**
 * Parse the JSON body with `schema`. On success the parsed value (with
 * defaults applied) replaces req.body; a ZodError goes to the error handler.
 */
export function validateRequest(schema: ZodType): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.body = await schema.parseAsync(req.body);
      next();
    } catch (error) {
      next(error);
    }
  };
}
