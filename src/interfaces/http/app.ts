/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh app per call: each cluster worker builds its own, and the
 * integration tests build one after overriding container registrations.
 *
 * Middleware order:
 *   1. requestTimer  — stamps req.requestStartTime for meta.totalTimeMs.
 *   2. helmet, cors, compression.
 *   3. express.json().
 *   4. requestLogger.
 *   5. Routes: health, Affinity, Notion.
 *   6. errorHandler  — must be last.
 *
 * The side-effect import of '@core/container' registers every dependency
 * before a controller resolves its service.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { affinityRoutes } from '@interfaces/http/routes/affinityRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { notionRoutes } from '@interfaces/http/routes/notionRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(express.json());

  app.use(requestLogger);

  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/affinity', affinityRoutes);
  app.use('/api/v1/notion', notionRoutes);

  app.use(errorHandler);

  return app;
}
