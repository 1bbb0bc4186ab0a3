import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import http from 'http';
import { logger } from '../utils/logger';
import { errorHandler } from '../utils/errors';
import { ServiceContext } from './context';
import { createApiRateLimiter } from './middleware/rateLimit';
import { createAuthenticator, createCommandGuard } from './middleware/auth';
import { createClientsRouter } from './routes/clients';
import { createStatsRouter } from './routes/stats';
import { createSyncRouter } from './routes/sync';
import { createInterfaceRouter } from './routes/interface';
import { createServerRouter } from './routes/server';
import { createHealthRouter } from './routes/health';
import { createMetricsRouter } from './routes/metrics';

export function createApp(context: ServiceContext): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info('HTTP request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration,
        ip: req.ip,
      });
      const endpoint = req.route ? `${req.baseUrl}${String(req.route.path)}` : req.baseUrl || req.path;
      context.metrics.recordApiRequest(req.method, endpoint, res.statusCode);
      if (res.statusCode >= 500) {
        context.metrics.recordApiError(req.method, endpoint, String(res.statusCode));
      }
    });
    next();
  });

  app.use('/health', createHealthRouter(context.healthChecks));
  app.use('/metrics', createMetricsRouter(context));

  const authenticate = createAuthenticator(context.guard, context.auth.jwtSecret);
  const commandGuard = createCommandGuard(context.guard);

  app.use('/api', createApiRateLimiter(context.rateLimit), authenticate);
  app.use('/api/v1/clients', createClientsRouter(context, commandGuard));
  app.use('/api/v1/stats', createStatsRouter(context));
  app.use('/api/v1/sync', createSyncRouter(context, commandGuard));
  app.use('/api/v1/interface', createInterfaceRouter(context, commandGuard));
  app.use('/api/v1/server', createServerRouter(context));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Not found' } });
  });

  app.use(errorHandler);

  return app;
}

export class ApiGateway {
  private app: Express;
  private server: http.Server;

  constructor(
    context: ServiceContext,
    private settings: { host: string; port: number }
  ) {
    this.app = createApp(context);
    this.server = http.createServer(this.app);
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', (error) => {
        logger.error('Server error', { error });
        reject(error);
      });
      this.server.listen(this.settings.port, this.settings.host, () => {
        logger.info(`API Gateway started on ${this.settings.host}:${this.settings.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('API Gateway stopped');
        resolve();
      });
    });
  }
}
