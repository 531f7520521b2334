/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Last in the chain. Express 5 forwards rejected promises from async
 * handlers here, so controllers simply throw.
 *
 *   - Operational AppError: logged at warn, answered with its statusCode and
 *     message. Remote failures also expose the upstream status.
 *   - Anything else (including non-operational AppErrors such as a
 *     ConfigurationError): logged at error, answered with a generic 500.
 *
 * The four-argument signature is what marks this as an error handler.
 */
import { logger } from '@core/logger';
import { AppError, RemoteRequestError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    const remoteStatus = err instanceof RemoteRequestError ? err.remoteStatus : undefined;
    logger.warn({ statusCode: err.statusCode, remoteStatus, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
      ...(remoteStatus !== undefined && { remoteStatus }),
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
