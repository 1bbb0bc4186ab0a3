import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { Client } from '../../database/models';
import { ServiceContext } from '../context';
import { parseInput } from '../validation';

const createClientSchema = z.object({
  name: z.string(),
});

export type ClientView = Omit<Client, 'privateKey'>;

export function toClientView(client: Client): ClientView {
  return {
    id: client.id,
    name: client.name,
    publicKey: client.publicKey,
    address: client.address,
    createdAt: client.createdAt,
    isActive: client.isActive,
  };
}

export function createClientsRouter(context: ServiceContext, commandGuard: RequestHandler): Router {
  const router = Router();

  // GET /api/v1/clients
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const clients = await context.registry.getAllClients(true);
      res.json({ clients: clients.map(toClientView), total: clients.length });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/clients
  router.post('/', commandGuard, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = parseInput(createClientSchema, req.body);
      const created = await context.provisioning.createClient(name);
      res.status(201).json({
        client: toClientView(created.client),
        clientConfig: created.clientConfig,
        vpnLink: created.vpnLink,
        sync: created.sync,
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/clients/:name
  router.get('/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const details = await context.provisioning.describeClient(req.params.name);
      res.json({
        client: toClientView(details.client),
        peer: details.peer,
        activeSession: details.activeSession,
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/clients/:name/config
  router.get('/:name/config', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const artifacts = await context.provisioning.getClientArtifacts(req.params.name);
      if (req.query.format === 'conf') {
        res.type('text/plain');
        res.setHeader('Content-Disposition', `attachment; filename="${artifacts.client.name}.conf"`);
        res.send(artifacts.clientConfig);
        return;
      }
      res.json({
        client: toClientView(artifacts.client),
        clientConfig: artifacts.clientConfig,
        vpnLink: artifacts.vpnLink,
      });
    } catch (error) {
      next(error);
    }
  });

  // DELETE /api/v1/clients/:name
  router.delete('/:name', commandGuard, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const deleted = await context.provisioning.deleteClient(req.params.name);
      res.json({ client: toClientView(deleted.client), sync: deleted.sync });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
