import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { ServiceContext } from '../context';

export function createSyncRouter(context: ServiceContext, commandGuard: RequestHandler): Router {
  const router = Router();

  // GET /api/v1/sync
  router.get('/', (req: Request, res: Response) => {
    res.json(context.orchestrator.getStatus());
  });

  // POST /api/v1/sync
  router.post('/', commandGuard, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await context.orchestrator.fullSync('manual');
      res.status(outcome.state === 'Synced' ? 200 : 502).json(outcome);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
