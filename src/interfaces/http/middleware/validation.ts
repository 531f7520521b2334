/**
 * Request Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * `validate(schema, source)` returns a middleware that checks one part of the
 * request against a Zod schema before the controller runs:
 *
 *   router.put('/fields/:fieldId', validate(fieldUpdateBody, 'body'), controller.update);
 *
 * On success the parsed data replaces `req[source]`; on failure a
 * ValidationError (400) goes to the error handler. Query strings are left to
 * the controllers: Express 5 exposes `req.query` as a read-only getter.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod/v4';

export function validate<T extends z.ZodType>(schema: T, source: 'body' | 'params') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      const messages = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ValidationError(messages);
    }

    Object.assign(req, { [source]: result.data });
    next();
  };
}
