import { describe, it, expect } from "vitest";
import { CacheComputeError } from "./errors";
import { SimilarityCache } from "./similarityCache";
import { ConstantEncoder, FailingEncoder, FakeClock, GatedEncoder } from "./testFixtures";
import type { Encoder } from "./encoders";
import type { Vector } from "./types";

class CountingEncoder implements Encoder {
  readonly name = "counting";
  readonly calls: string[] = [];

  async encode(text: string): Promise<Vector> {
    this.calls.push(text);
    return [text.length, 1];
  }
}

describe("SimilarityCache", () => {
  it("keys by normalized text and encodes once", async () => {
    const enc = new CountingEncoder();
    const cache = new SimilarityCache(enc, { capacity: 10, maxTextLength: 100 });

    const a = await cache.getOrCompute("Hello   World");
    const b = await cache.getOrCompute(" hello world ");

    expect(a).toEqual(b);
    expect(enc.calls).toEqual(["hello world"]);
    expect(cache.stats()).toMatchObject({ size: 1, hits: 1, misses: 1, computations: 1 });
  });

  it("truncates keys to the max text length", async () => {
    const enc = new CountingEncoder();
    const cache = new SimilarityCache(enc, { capacity: 10, maxTextLength: 5 });

    expect(cache.keyFor("Hello World")).toBe("hello");
    await cache.getOrCompute("hello there");
    await cache.getOrCompute("HELLO world");
    expect(enc.calls).toEqual(["hello"]);
  });

  it("collapses concurrent misses for one key into a single encoder call", async () => {
    const enc = new GatedEncoder();
    const cache = new SimilarityCache(enc, { capacity: 10, maxTextLength: 100 });

    const pending = [cache.getOrCompute("same text"), cache.getOrCompute("Same  Text"), cache.getOrCompute("same text")];
    enc.release();
    const vectors = await Promise.all(pending);

    expect(enc.calls).toEqual(["same text"]);
    expect(vectors[0]).toEqual([9, 1]);
    expect(vectors[1]).toBe(vectors[0]);
    expect(vectors[2]).toBe(vectors[0]);
    expect(cache.stats()).toMatchObject({ misses: 1, joined: 2, hits: 0, computations: 1 });
  });

  it("evicts the least recently used entry beyond capacity", async () => {
    const enc = new CountingEncoder();
    const cache = new SimilarityCache(enc, { capacity: 2, maxTextLength: 100 });

    await cache.getOrCompute("a");
    await cache.getOrCompute("b");
    await cache.getOrCompute("a"); // refreshes a
    await cache.getOrCompute("c"); // evicts b
    await cache.getOrCompute("a");
    await cache.getOrCompute("b");

    expect(enc.calls).toEqual(["a", "b", "c", "b"]);
    expect(cache.stats()).toMatchObject({ size: 2, evictions: 2 });
  });

  it("drops entries once the TTL has passed", async () => {
    const enc = new CountingEncoder();
    const clock = new FakeClock(0);
    const cache = new SimilarityCache(enc, { capacity: 10, ttlMs: 1000, maxTextLength: 100, clock });

    await cache.getOrCompute("thesis");
    clock.t = 999;
    await cache.getOrCompute("thesis");
    expect(enc.calls).toHaveLength(1);

    clock.t = 1000;
    await cache.getOrCompute("thesis");
    expect(enc.calls).toHaveLength(2);
  });

  it("keeps entries forever when the TTL is 0", async () => {
    const enc = new ConstantEncoder();
    const clock = new FakeClock(0);
    const cache = new SimilarityCache(enc, { capacity: 10, ttlMs: 0, maxTextLength: 100, clock });

    await cache.getOrCompute("thesis");
    clock.t = 10 ** 12;
    await cache.getOrCompute("thesis");
    expect(enc.calls).toBe(1);
  });

  it("does not cache encoder failures and rejects every waiter", async () => {
    const enc = new FailingEncoder();
    const cache = new SimilarityCache(enc, { capacity: 10, maxTextLength: 100 });

    const first = cache.getOrCompute("flaky");
    const second = cache.getOrCompute("flaky");
    await Promise.all([
      expect(first).rejects.toBeInstanceOf(CacheComputeError),
      expect(second).rejects.toBeInstanceOf(CacheComputeError),
    ]);
    expect(enc.calls).toBe(1);

    await expect(cache.getOrCompute("flaky")).rejects.toThrow(/embedding service unavailable/);
    expect(enc.calls).toBe(2);
    // the second caller shared the failed flight; it is not a hit
    expect(cache.stats()).toMatchObject({ size: 0, hits: 0, misses: 2, joined: 1, failures: 2 });
  });

  it("clear() empties entries and counters", async () => {
    const cache = new SimilarityCache(new ConstantEncoder(), { capacity: 10, maxTextLength: 100 });
    await cache.getOrCompute("x");
    cache.clear();
    expect(cache.stats()).toEqual({ size: 0, hits: 0, misses: 0, joined: 0, computations: 0, failures: 0, evictions: 0 });
  });
});
