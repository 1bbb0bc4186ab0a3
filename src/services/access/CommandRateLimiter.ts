export type RateDecision = { allowed: true } | { allowed: false; retryAfterMs: number };

export interface CommandRateLimiterOptions {
  minIntervalMs: number;
  /** Operators remembered at once; the least recently seen is forgotten first. */
  maxEntries?: number;
}

/**
 * One command per operator per interval. Map insertion order doubles as the
 * eviction order, so an operator is re-inserted on every accepted command.
 */
export class CommandRateLimiter {
  private lastCommandAt = new Map<string, number>();
  private readonly maxEntries: number;

  constructor(private options: CommandRateLimiterOptions) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  check(operatorId: string, now: number = Date.now()): RateDecision {
    const last = this.lastCommandAt.get(operatorId);
    if (last !== undefined) {
      const elapsed = now - last;
      if (elapsed < this.options.minIntervalMs) {
        return { allowed: false, retryAfterMs: this.options.minIntervalMs - elapsed };
      }
      this.lastCommandAt.delete(operatorId);
    }

    this.lastCommandAt.set(operatorId, now);
    while (this.lastCommandAt.size > this.maxEntries) {
      const oldest = this.lastCommandAt.keys().next();
      if (oldest.done) {
        break;
      }
      this.lastCommandAt.delete(oldest.value);
    }
    return { allowed: true };
  }

  size(): number {
    return this.lastCommandAt.size;
  }
}
