import { Router, Request, Response, NextFunction } from 'express';
import { ServiceContext } from '../context';

export function createMetricsRouter(context: ServiceContext): Router {
  const router = Router();

  // GET /metrics
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await context.metrics.updateMetrics(context.registry);
      res.set('Content-Type', context.metrics.getContentType());
      res.send(await context.metrics.getMetrics());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
