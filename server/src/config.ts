import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { RateLimitBudget } from "./rateLimiter";

const SourceBudgetsSchema = z.record(
  z.object({
    windowMs: z.number().int().positive(),
    maxRequests: z.number().int().positive(),
  })
);

// RATE_LIMIT_SOURCES='{"openai":{"windowMs":60000,"maxRequests":50}}'
const SourceBudgets = z
  .string()
  .optional()
  .transform((raw, ctx): Record<string, RateLimitBudget> => {
    if (!raw || !raw.trim()) return {};
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object of {windowMs, maxRequests} by source" });
      return z.NEVER;
    }
    const parsed = SourceBudgetsSchema.safeParse(json);
    if (!parsed.success) {
      for (const i of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${i.path.join(".") || "(root)"} ${i.message}` });
      }
      return z.NEVER;
    }
    return parsed.data;
  });

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CACHE_CAPACITY: z.coerce.number().int().positive().default(1000),
  CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(60 * 60 * 1000), // 0 = never expires
  CACHE_MAX_TEXT_LENGTH: z.coerce.number().int().positive().default(2000),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(20),
  RATE_LIMIT_SOURCES: SourceBudgets,
  SCORING_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  CONFLICT_THRESHOLD: z.coerce.number().min(0).max(100).default(60),
  EMBEDDING_PROVIDER: z.enum(["hashing", "openai"]).default("hashing"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  OPENAI_API_KEY: z.string().optional(),
  SCORING_TABLES_PATH: z.string().optional(),
});

export type EngineConfig = {
  port: number;
  cache: { capacity: number; ttlMs: number; maxTextLength: number };
  rateLimit: RateLimitBudget & { perSource: Record<string, RateLimitBudget> };
  concurrency: number;
  conflictThreshold: number;
  embedding: { provider: "hashing" | "openai"; model: string; apiKey?: string };
  scoringTablesPath: string;
};

export function defaultScoringTablesPath(): string {
  return path.resolve(process.cwd(), "server", "data", "scoring-tables.json");
}

export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;
  const apiKey = (e.OPENAI_API_KEY || "").trim();

  return {
    port: e.PORT,
    cache: { capacity: e.CACHE_CAPACITY, ttlMs: e.CACHE_TTL_MS, maxTextLength: e.CACHE_MAX_TEXT_LENGTH },
    rateLimit: {
      windowMs: e.RATE_LIMIT_WINDOW_MS,
      maxRequests: e.RATE_LIMIT_MAX_REQUESTS,
      perSource: e.RATE_LIMIT_SOURCES,
    },
    concurrency: e.SCORING_CONCURRENCY,
    conflictThreshold: e.CONFLICT_THRESHOLD,
    embedding: { provider: e.EMBEDDING_PROVIDER, model: e.EMBEDDING_MODEL, apiKey: apiKey || undefined },
    scoringTablesPath: e.SCORING_TABLES_PATH?.trim() || defaultScoringTablesPath(),
  };
}
