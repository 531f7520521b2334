/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * Adds requestStartTime to Express Request. requestTimer sets it;
 * responseMeta() reads it back for `meta.totalTimeMs`.
 */
declare global {
  namespace Express {
    interface Request {
      /** Epoch milliseconds at which the request entered the pipeline. */
      requestStartTime?: number;
    }
  }
}

export {};
