import { CacheComputeError } from "./errors";
import { clampScore, normalizeText, round2 } from "./normalize";
import type { SimilarityCache } from "./similarityCache";
import type { Vector } from "./types";

export function cosineSimilarity(a: Vector, b: Vector): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export type SimilarityResult = { score: number; note?: string };

/**
 * Cosine similarity of two texts through the cache, on a 0–100 scale.
 * Empty text and encoder failures both give the neutral 0; the failure also
 * comes back as a note for the caller's diagnostics.
 */
export async function textSimilarity(cache: SimilarityCache, a: string, b: string): Promise<SimilarityResult> {
  if (!normalizeText(a) || !normalizeText(b)) return { score: 0 };
  try {
    const [va, vb] = await Promise.all([cache.getOrCompute(a), cache.getOrCompute(b)]);
    return { score: clampScore(round2(cosineSimilarity(va, vb) * 100)) };
  } catch (e) {
    if (e instanceof CacheComputeError) {
      return { score: 0, note: `Text similarity unavailable: ${e.message}` };
    }
    throw e;
  }
}
