/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health  →  { status: 'ok', uptime, timestamp, upstreams: { affinity, notion } }
 *
 * Liveness only. `upstreams` names the hosts this worker is configured to
 * call; neither is contacted.
 */
import { config } from '@core/config';
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    upstreams: {
      affinity: new URL(config.affinity.baseUrl).host,
      notion: new URL(config.notion.baseUrl).host,
    },
  });
});

export { router as healthRoutes };
