import { createHash } from "node:crypto";
import OpenAI from "openai";
import type { EngineConfig } from "./config";
import { log } from "./logger";
import { tokenize } from "./normalize";
import type { RateLimiter } from "./rateLimiter";
import type { Vector } from "./types";

export interface Encoder {
  readonly name: string;
  encode(text: string): Promise<Vector>;
}

export const OPENAI_SOURCE_ID = "openai";

/**
 * Deterministic, offline encoder: unigrams and bigrams are hashed into signed
 * buckets of a fixed-size vector, which is then L2-normalized.
 */
export class HashingEncoder implements Encoder {
  readonly name = "hashing";

  constructor(private readonly dimensions = 384) {}

  async encode(text: string): Promise<Vector> {
    const vec = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);
    const features = [...tokens];
    for (let i = 0; i + 1 < tokens.length; i++) features.push(`${tokens[i]} ${tokens[i + 1]}`);

    for (const f of features) {
      const digest = createHash("md5").update(f).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest[4] & 1) === 0 ? 1 : -1;
      vec[bucket] += sign;
    }

    const norm = Math.sqrt(vec.reduce((s, v) => s + v * v, 0));
    return norm === 0 ? vec : vec.map((v) => v / norm);
  }
}

export class OpenAiEncoder implements Encoder {
  readonly name = "openai";
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(
    opts: { apiKey: string; model: string },
    private readonly limiter?: RateLimiter
  ) {
    this.client = new OpenAI({ apiKey: opts.apiKey });
    this.model = opts.model;
  }

  async encode(text: string): Promise<Vector> {
    if (this.limiter) await this.limiter.acquire(OPENAI_SOURCE_ID);
    const startedAt = Date.now();
    const res = await this.client.embeddings.create({ model: this.model, input: text });
    const embedding = res.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new Error(`OpenAI returned no embedding (model=${this.model})`);
    }
    log.debug("[OpenAiEncoder] embedding ok", { model: this.model, ms: Date.now() - startedAt });
    return embedding;
  }
}

export function createEncoder(config: EngineConfig, limiter?: RateLimiter): Encoder {
  const { provider, model, apiKey } = config.embedding;
  if (provider === "openai") {
    if (apiKey) return new OpenAiEncoder({ apiKey, model }, limiter);
    // Don't crash at startup, but make it obvious in logs.
    log.warn("[Encoder] EMBEDDING_PROVIDER=openai but OPENAI_API_KEY is missing. Falling back to hashing encoder.");
  }
  return new HashingEncoder();
}
