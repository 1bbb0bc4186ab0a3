import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { OperatorGuard } from '../../services/access/OperatorGuard';
import {
  ConfigurationError,
  ForbiddenError,
  RateLimitError,
  UnauthorizedError,
} from '../../utils/errors';

export interface OperatorRequest extends Request {
  operator?: {
    operatorId: string;
  };
}

const DURATION_UNITS: Record<string, number> = { '': 1, s: 1, m: 60, h: 3600, d: 86400 };

/** `3600`, `90s`, `15m`, `12h`, `30d` to seconds. */
export function parseDurationSeconds(value: string): number {
  const match = /^(\d+)\s*([smhd]?)$/.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid duration: ${value}`);
  }
  return parseInt(match[1], 10) * DURATION_UNITS[match[2]];
}

export function signOperatorToken(operatorId: string, secret: string, expiresIn: string): string {
  return jwt.sign({ operatorId }, secret, { expiresIn: parseDurationSeconds(expiresIn) });
}

/**
 * Bearer JWT carrying `operatorId`; the operator must be on the allow-list.
 */
export function createAuthenticator(guard: OperatorGuard, secret: string): RequestHandler {
  return (req: OperatorRequest, res: Response, next: NextFunction): void => {
    try {
      const authHeader = req.headers.authorization;
      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        throw new UnauthorizedError('Missing or invalid authorization header');
      }

      const decoded = jwt.verify(authHeader.substring(7), secret);
      if (typeof decoded !== 'object' || typeof decoded.operatorId !== 'string') {
        throw new UnauthorizedError('Token carries no operator');
      }
      if (!guard.isAllowListed(decoded.operatorId)) {
        throw new ForbiddenError('Operator is not allowed');
      }

      req.operator = { operatorId: decoded.operatorId };
      next();
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        next(new UnauthorizedError('Invalid token'));
      } else {
        next(error);
      }
    }
  };
}

/** Runs the operator guard in front of a mutating command. */
export function createCommandGuard(guard: OperatorGuard): RequestHandler {
  return (req: OperatorRequest, res: Response, next: NextFunction): void => {
    const operatorId = req.operator?.operatorId;
    if (!operatorId) {
      next(new UnauthorizedError());
      return;
    }

    const decision = guard.check(operatorId);
    if (decision.kind === 'Allowed') {
      next();
      return;
    }
    if (decision.reason === 'RateLimited') {
      next(new RateLimitError('Too many commands, slow down', decision.retryAfterMs));
      return;
    }
    next(new ForbiddenError('Operator is not allowed'));
  };
}
