import rateLimit from 'express-rate-limit';
import { ServiceContext } from '../context';

export function createApiRateLimiter(settings: ServiceContext['rateLimit']) {
  return rateLimit({
    windowMs: settings.windowMs,
    limit: settings.maxRequests,
    message: { error: { code: 'RATE_LIMITED', message: 'Too many requests from this IP, please try again later.' } },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
