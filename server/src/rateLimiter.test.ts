import { describe, it, expect } from "vitest";
import { ConfigError } from "./errors";
import { SlidingWindowRateLimiter } from "./rateLimiter";
import { FakeClock } from "./testFixtures";

function maxInAnyWindow(grants: number[], windowMs: number): number {
  let max = 0;
  for (const start of grants) {
    const inWindow = grants.filter((t) => t >= start && t < start + windowMs).length;
    max = Math.max(max, inWindow);
  }
  return max;
}

describe("SlidingWindowRateLimiter", () => {
  it("never grants more than the budget inside any rolling window", async () => {
    const clock = new FakeClock(0);
    const limiter = new SlidingWindowRateLimiter({ windowMs: 1000, maxRequests: 3, clock });

    const grants: number[] = [];
    for (let i = 0; i < 7; i++) {
      await limiter.acquire("profiles");
      grants.push(clock.now());
    }

    expect(grants).toEqual([0, 0, 0, 1000, 1000, 1000, 2000]);
    expect(maxInAnyWindow(grants, 1000)).toBe(3);
  });

  it("waits only until the oldest request leaves the window", async () => {
    const clock = new FakeClock(0);
    const limiter = new SlidingWindowRateLimiter({ windowMs: 1000, maxRequests: 2, clock });

    await limiter.acquire("profiles");
    clock.t = 400;
    await limiter.acquire("profiles");
    clock.t = 600;
    await limiter.acquire("profiles");

    expect(clock.sleeps).toEqual([400]);
    expect(clock.now()).toBe(1000);
    expect(limiter.usage("profiles")).toBe(2);
  });

  it("keeps separate windows per source, with overrides", async () => {
    const clock = new FakeClock(0);
    const limiter = new SlidingWindowRateLimiter({
      windowMs: 1000,
      maxRequests: 5,
      perSource: { slow: { windowMs: 1000, maxRequests: 1 } },
      clock,
    });

    for (let i = 0; i < 5; i++) await limiter.acquire("fast");
    expect(clock.sleeps).toEqual([]);
    expect(limiter.usage("fast")).toBe(5);

    await limiter.acquire("slow");
    await limiter.acquire("slow");
    expect(clock.sleeps).toEqual([1000]);
    expect(limiter.budgetFor("slow")).toEqual({ windowMs: 1000, maxRequests: 1 });
  });

  it("rejects a non-positive budget at construction", () => {
    expect(() => new SlidingWindowRateLimiter({ windowMs: 1000, maxRequests: 0 })).toThrow(ConfigError);
    expect(() => new SlidingWindowRateLimiter({ windowMs: -1, maxRequests: 5 })).toThrow(ConfigError);
    expect(
      () => new SlidingWindowRateLimiter({ windowMs: 1000, maxRequests: 5, perSource: { bad: { windowMs: 0, maxRequests: 1 } } })
    ).toThrow(/rateLimit\[bad\]\.windowMs must be positive/);
  });
});
