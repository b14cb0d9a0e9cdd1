import { systemClock, type Clock } from "./clock";
import type { Encoder } from "./encoders";
import { CacheComputeError } from "./errors";
import { log } from "./logger";
import { normalizeText } from "./normalize";
import type { Vector } from "./types";

export type SimilarityCacheOptions = {
  capacity: number;
  ttlMs?: number;          // 0 or undefined: entries never expire
  maxTextLength: number;
  clock?: Pick<Clock, "now">;
};

export type CacheStats = {
  size: number;
  hits: number;
  misses: number;
  joined: number; // callers that shared another caller's in-flight computation
  computations: number;
  failures: number;
  evictions: number;
};

type CacheEntry = { vector: Vector; storedAt: number };

/**
 * Memoizes encoder output by normalized text. The Map's insertion order is the
 * LRU order: a hit re-inserts its entry, eviction takes from the front.
 * Concurrent misses for one key share a single in-flight encoder call.
 */
export class SimilarityCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<Vector>>();
  private readonly clock: Pick<Clock, "now">;
  private counters = { hits: 0, misses: 0, joined: 0, computations: 0, failures: 0, evictions: 0 };

  constructor(
    private readonly encoder: Encoder,
    private readonly opts: SimilarityCacheOptions
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  keyFor(text: string): string {
    return normalizeText(text).slice(0, this.opts.maxTextLength);
  }

  async getOrCompute(text: string): Promise<Vector> {
    const key = this.keyFor(text);

    const live = this.lookup(key);
    if (live) {
      this.counters.hits += 1;
      return live;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.counters.joined += 1;
      return pending;
    }

    this.counters.misses += 1;
    const flight = this.compute(key);
    this.inFlight.set(key, flight);
    try {
      return await flight;
    } finally {
      this.inFlight.delete(key);
    }
  }

  stats(): CacheStats {
    return { size: this.entries.size, ...this.counters };
  }

  clear(): void {
    this.entries.clear();
    this.counters = { hits: 0, misses: 0, joined: 0, computations: 0, failures: 0, evictions: 0 };
  }

  private lookup(key: string): Vector | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    const ttl = this.opts.ttlMs ?? 0;
    if (ttl > 0 && this.clock.now() - entry.storedAt >= ttl) {
      this.entries.delete(key);
      return null;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.vector;
  }

  private async compute(key: string): Promise<Vector> {
    this.counters.computations += 1;
    let vector: Vector;
    try {
      vector = await this.encoder.encode(key);
    } catch (e) {
      this.counters.failures += 1;
      const err = new CacheComputeError(key, e);
      log.warn("[SimilarityCache] encoder failed; not caching", { message: err.message });
      throw err;
    }

    this.entries.set(key, { vector, storedAt: this.clock.now() });
    while (this.entries.size > this.opts.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.counters.evictions += 1;
    }
    return vector;
  }
}
