import { CommandRateLimiter } from '../../../../src/services/access/CommandRateLimiter';

describe('CommandRateLimiter', () => {
  it('should allow the first command and refuse a second within the interval', () => {
    const limiter = new CommandRateLimiter({ minIntervalMs: 1000 });

    expect(limiter.check('op-1', 10_000)).toEqual({ allowed: true });
    expect(limiter.check('op-1', 10_400)).toEqual({ allowed: false, retryAfterMs: 600 });
  });

  it('should allow again once the interval has passed', () => {
    const limiter = new CommandRateLimiter({ minIntervalMs: 1000 });
    limiter.check('op-1', 10_000);

    expect(limiter.check('op-1', 11_000)).toEqual({ allowed: true });
  });

  it('should measure from the last accepted command, not the refused one', () => {
    const limiter = new CommandRateLimiter({ minIntervalMs: 1000 });
    limiter.check('op-1', 10_000);
    limiter.check('op-1', 10_900);

    expect(limiter.check('op-1', 11_000)).toEqual({ allowed: true });
  });

  it('should track operators independently', () => {
    const limiter = new CommandRateLimiter({ minIntervalMs: 1000 });
    limiter.check('op-1', 10_000);

    expect(limiter.check('op-2', 10_100)).toEqual({ allowed: true });
  });

  it('should forget the least recently active operator when full', () => {
    const limiter = new CommandRateLimiter({ minIntervalMs: 1000, maxEntries: 2 });
    limiter.check('op-1', 10_000);
    limiter.check('op-2', 10_100);
    limiter.check('op-1', 11_000);
    limiter.check('op-3', 11_200);

    expect(limiter.size()).toBe(2);
    // op-2 was evicted, so it is treated as new
    expect(limiter.check('op-2', 11_300)).toEqual({ allowed: true });
    expect(limiter.check('op-3', 11_300)).toEqual({ allowed: false, retryAfterMs: 900 });
  });
});
