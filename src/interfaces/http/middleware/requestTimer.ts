/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps req.requestStartTime on arrival; controllers report the elapsed
 * time as `meta.totalTimeMs`. Registered first so the measurement covers the
 * whole pipeline, upstream calls included.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
