import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { SeriesBucket } from '../../database/models';
import { NotFoundError } from '../../utils/errors';
import { ServiceContext } from '../context';
import { parseInput } from '../validation';

const HOUR_MS = 60 * 60 * 1000;

const RANGES = {
  '24h': { span: 24 * HOUR_MS, bucket: 'hour' },
  '7d': { span: 7 * 24 * HOUR_MS, bucket: 'day' },
  '30d': { span: 30 * 24 * HOUR_MS, bucket: 'day' },
} satisfies Record<string, { span: number; bucket: SeriesBucket }>;

const seriesQuerySchema = z.object({
  client: z.string().optional(),
  range: z.enum(['24h', '7d', '30d']).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  bucket: z.enum(['hour', 'day']).optional(),
});

const profileQuerySchema = z.object({
  client: z.string().optional(),
});

const sessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export function createStatsRouter(context: ServiceContext): Router {
  const router = Router();

  async function resolveClientId(name: string | undefined): Promise<number | undefined> {
    if (name === undefined) {
      return undefined;
    }
    const client = await context.registry.getClientByName(name);
    if (!client) {
      throw new NotFoundError(`Client '${name}' not found`);
    }
    return client.id;
  }

  // GET /api/v1/stats/totals
  router.get('/totals', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const totals = await context.registry.getTotalTrafficByClient();
      const totalReceived = totals.reduce((sum, row) => sum + row.totalReceived, 0);
      const totalSent = totals.reduce((sum, row) => sum + row.totalSent, 0);
      res.json({ clients: totals, totalReceived, totalSent });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/stats/series?client&range | from&to&bucket
  router.get('/series', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(seriesQuerySchema, req.query);
      const range = RANGES[query.range ?? '24h'];
      const to = query.to ?? new Date();
      const from = query.from ?? new Date(to.getTime() - range.span);
      const bucket: SeriesBucket = query.bucket ?? range.bucket;
      const clientId = await resolveClientId(query.client);

      const points = await context.registry.getTrafficSeries({ clientId, from, to, bucket });
      res.json({ from, to, bucket, points });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/stats/profile/hourly?client
  router.get('/profile/hourly', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(profileQuerySchema, req.query);
      const clientId = await resolveClientId(query.client);
      res.json({ profile: await context.registry.getHourlyProfile(clientId) });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/stats/profile/weekly?client
  router.get('/profile/weekly', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(profileQuerySchema, req.query);
      const clientId = await resolveClientId(query.client);
      res.json({ profile: await context.registry.getWeekdayProfile(clientId) });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/stats/sessions/:name
  router.get('/sessions/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parseInput(sessionsQuerySchema, req.query);
      const clientId = await resolveClientId(req.params.name);
      if (clientId === undefined) {
        throw new NotFoundError(`Client '${req.params.name}' not found`);
      }
      res.json({ sessions: await context.registry.getSessions(clientId, limit) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
