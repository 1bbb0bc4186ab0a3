import { Router, Request, Response } from 'express';
import { logger } from '../../utils/logger';
import { HealthCheck } from '../context';

interface HealthCheckResult {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  services: Record<string, { status: 'healthy' | 'unhealthy'; latency?: number }>;
}

export function createHealthRouter(checks: HealthCheck[]): Router {
  const router = Router();

  // GET /health
  router.get('/', async (req: Request, res: Response) => {
    const health: HealthCheckResult = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: {},
    };

    for (const check of checks) {
      const start = Date.now();
      try {
        await check.check();
        health.services[check.name] = { status: 'healthy', latency: Date.now() - start };
      } catch (error) {
        health.services[check.name] = { status: 'unhealthy' };
        if (check.critical) {
          health.status = 'unhealthy';
        } else if (health.status === 'healthy') {
          health.status = 'degraded';
        }
        logger.error('Health check failed', { check: check.name, error });
      }
    }

    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  // GET /health/ready (readiness probe)
  router.get('/ready', async (req: Request, res: Response) => {
    try {
      for (const check of checks.filter((c) => c.critical)) {
        await check.check();
      }
      res.status(200).json({ status: 'ready' });
    } catch (error) {
      logger.error('Readiness check failed', { error });
      res.status(503).json({ status: 'not ready' });
    }
  });

  // GET /health/live (liveness probe)
  router.get('/live', (req: Request, res: Response) => {
    res.status(200).json({ status: 'alive', uptime: process.uptime() });
  });

  return router;
}
