import { CommandRateLimiter } from './CommandRateLimiter';

export type GuardDecision =
  | { kind: 'Allowed' }
  | { kind: 'Denied'; reason: 'NotAllowListed' }
  | { kind: 'Denied'; reason: 'RateLimited'; retryAfterMs: number };

export class OperatorGuard {
  private allowList: ReadonlySet<string>;

  constructor(adminIds: readonly string[], private limiter: CommandRateLimiter) {
    this.allowList = new Set(adminIds);
  }

  isAllowListed(operatorId: string): boolean {
    return this.allowList.has(operatorId);
  }

  /** Allow-list first, so unknown operators never take up limiter slots. */
  check(operatorId: string, now: number = Date.now()): GuardDecision {
    if (!this.isAllowListed(operatorId)) {
      return { kind: 'Denied', reason: 'NotAllowListed' };
    }
    const decision = this.limiter.check(operatorId, now);
    if (!decision.allowed) {
      return { kind: 'Denied', reason: 'RateLimited', retryAfterMs: decision.retryAfterMs };
    }
    return { kind: 'Allowed' };
  }
}
