import { systemClock, type Clock } from "./clock";
import { ConfigError } from "./errors";
import { log } from "./logger";

export type RateLimitBudget = { windowMs: number; maxRequests: number };

export interface RateLimiter {
  acquire(sourceId: string): Promise<void>;
}

export type SlidingWindowOptions = RateLimitBudget & {
  perSource?: Record<string, RateLimitBudget>;
  clock?: Clock;
};

function checkBudget(label: string, b: RateLimitBudget): string[] {
  const problems: string[] = [];
  if (!Number.isFinite(b.maxRequests) || b.maxRequests <= 0) problems.push(`${label}.maxRequests must be positive (got ${b.maxRequests})`);
  if (!Number.isFinite(b.windowMs) || b.windowMs <= 0) problems.push(`${label}.windowMs must be positive (got ${b.windowMs})`);
  return problems;
}

/**
 * Per-source sliding window. acquire() never rejects: at budget it sleeps until
 * the oldest request leaves the window, then checks again.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly history = new Map<string, number[]>();
  private readonly clock: Clock;
  private readonly defaults: RateLimitBudget;
  private readonly perSource: Record<string, RateLimitBudget>;

  constructor(opts: SlidingWindowOptions) {
    this.defaults = { windowMs: opts.windowMs, maxRequests: opts.maxRequests };
    this.perSource = { ...(opts.perSource ?? {}) };

    const problems = [
      ...checkBudget("rateLimit", this.defaults),
      ...Object.entries(this.perSource).flatMap(([id, b]) => checkBudget(`rateLimit[${id}]`, b)),
    ];
    if (problems.length) throw new ConfigError(problems);

    this.clock = opts.clock ?? systemClock;
  }

  budgetFor(sourceId: string): RateLimitBudget {
    return this.perSource[sourceId] ?? this.defaults;
  }

  /** Requests recorded for the source inside the current window. */
  usage(sourceId: string): number {
    return this.prune(sourceId, this.clock.now()).length;
  }

  async acquire(sourceId: string): Promise<void> {
    const { windowMs, maxRequests } = this.budgetFor(sourceId);
    for (;;) {
      const now = this.clock.now();
      const stamps = this.prune(sourceId, now);
      if (stamps.length < maxRequests) {
        stamps.push(now);
        return;
      }
      const waitMs = stamps[0] + windowMs - now;
      log.debug("[RateLimiter] at budget; waiting", { sourceId, waitMs });
      await this.clock.sleep(waitMs);
    }
  }

  private prune(sourceId: string, now: number): number[] {
    const { windowMs } = this.budgetFor(sourceId);
    const stamps = (this.history.get(sourceId) ?? []).filter((t) => now - t < windowMs);
    this.history.set(sourceId, stamps);
    return stamps;
  }
}
