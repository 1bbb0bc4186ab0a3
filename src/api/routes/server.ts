import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import { formatUptime } from '../../services/monitor/ServerMonitor';
import { InterfaceInfo } from '../../services/wireguard/InterfaceController';
import { ServiceContext } from '../context';

export function createServerRouter(context: ServiceContext): Router {
  const router = Router();

  // GET /api/v1/server
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      // Null until the monitor's first poll.
      const metrics = context.monitor ? context.monitor.getLatest() : null;

      let iface: (InterfaceInfo & { up: boolean }) | { up: boolean } = { up: false };
      if (await context.controller.isInterfaceUp()) {
        try {
          const info = await context.controller.showInterface();
          iface = info ? { ...info, up: true } : { up: true };
        } catch (error) {
          logger.warn('Could not read interface info', { error: describeError(error) });
          iface = { up: true };
        }
      }

      res.json({
        interfaceName: context.controller.interfaceName,
        interface: iface,
        metrics,
        uptime: metrics ? formatUptime(metrics.uptimeSeconds) : null,
        sync: context.orchestrator.getStatus(),
        configuredPeers: await context.orchestrator.readConfiguredPeerCount(),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
