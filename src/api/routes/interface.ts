import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { InterfaceCommandError } from '../../utils/errors';
import { CommandFailed } from '../../utils/result';
import { ServiceContext } from '../context';
import { parseInput } from '../validation';

const publicKeySchema = z.string().regex(/^[A-Za-z0-9+/]{43}=$/, 'must be a base64 public key');

const hotAddSchema = z.object({
  publicKey: publicKeySchema,
  allowedIps: z.string().regex(/^\d{1,3}(\.\d{1,3}){3}\/\d{1,2}(,\s*\d{1,3}(\.\d{1,3}){3}\/\d{1,2})*$/, 'must be a CIDR list'),
});

function toError(failure: CommandFailed): InterfaceCommandError {
  return new InterfaceCommandError(`${failure.command} failed: ${failure.stderr}`, failure.exitCode, failure.stderr);
}

/**
 * Direct peer changes on the live interface. They bypass the registry and
 * are overwritten by the next full sync.
 */
export function createInterfaceRouter(context: ServiceContext, commandGuard: RequestHandler): Router {
  const router = Router();

  // GET /api/v1/interface/peers
  router.get('/peers', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const peers = await context.controller.dumpPeers();
      res.json({ interfaceName: context.controller.interfaceName, peers });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/interface/peers
  router.post('/peers', commandGuard, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { publicKey, allowedIps } = parseInput(hotAddSchema, req.body);
      const result = await context.controller.hotAddPeer(publicKey, allowedIps);
      if (!result.ok) {
        throw toError(result.error);
      }
      res.status(201).json({ publicKey, allowedIps });
    } catch (error) {
      next(error);
    }
  });

  // DELETE /api/v1/interface/peers/:publicKey
  router.delete('/peers/:publicKey', commandGuard, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const publicKey = parseInput(publicKeySchema, req.params.publicKey);
      const result = await context.controller.hotRemovePeer(publicKey);
      if (!result.ok) {
        throw toError(result.error);
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
