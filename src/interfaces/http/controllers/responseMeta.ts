import type { ResponseMeta } from '@shared/types';
import type { Request } from 'express';

/** Wall-clock time since requestTimer stamped the request, plus an optional item count. */
export function responseMeta(req: Request, count?: number): ResponseMeta {
  const totalTimeMs =
    req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;
  return {
    ...(totalTimeMs != null && { totalTimeMs }),
    ...(count != null && { count }),
  };
}

/** Positive integer `?limit=`; anything else means "no limit". */
export function parseLimit(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const limit = Number.parseInt(value, 10);
  return limit > 0 ? limit : undefined;
}
