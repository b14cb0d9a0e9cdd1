import { BatchScoringCoordinator } from "./batchCoordinator";
import { systemClock, type Clock } from "./clock";
import type { EngineConfig } from "./config";
import { ConflictAnalyzer } from "./conflictAnalyzer";
import { createEncoder, type Encoder } from "./encoders";
import { FitScorer } from "./fitScorer";
import { log } from "./logger";
import { SlidingWindowRateLimiter } from "./rateLimiter";
import { RunStore } from "./runs";
import type { ScoringTables } from "./scoringTables";
import { SimilarityCache } from "./similarityCache";

export type Engine = {
  config: EngineConfig;
  tables: ScoringTables;
  encoder: Encoder;
  cache: SimilarityCache;
  rateLimiter: SlidingWindowRateLimiter;
  fitScorer: FitScorer;
  conflictAnalyzer: ConflictAnalyzer;
  coordinator: BatchScoringCoordinator;
  runs: RunStore;
};

export type EngineOverrides = {
  encoder?: Encoder;
  clock?: Clock;
  now?: () => Date;
};

/** Wires one shared cache and limiter into every scorer. */
export function createEngine(config: EngineConfig, tables: ScoringTables, overrides: EngineOverrides = {}): Engine {
  const clock = overrides.clock ?? systemClock;
  const rateLimiter = new SlidingWindowRateLimiter({ ...config.rateLimit, clock });
  const encoder = overrides.encoder ?? createEncoder(config, rateLimiter);
  const cache = new SimilarityCache(encoder, { ...config.cache, clock });
  const fitScorer = new FitScorer(cache, tables);
  const conflictAnalyzer = new ConflictAnalyzer(cache, tables, config.conflictThreshold);
  const coordinator = new BatchScoringCoordinator({
    tables,
    fitScorer,
    conflictAnalyzer,
    rateLimiter,
    concurrency: config.concurrency,
    now: overrides.now,
  });

  log.info("Engine ready", {
    encoder: encoder.name,
    cacheCapacity: config.cache.capacity,
    concurrency: config.concurrency,
    rateLimitedSources: Object.keys(config.rateLimit.perSource),
    conflictThreshold: config.conflictThreshold,
  });

  return { config, tables, encoder, cache, rateLimiter, fitScorer, conflictAnalyzer, coordinator, runs: new RunStore() };
}
