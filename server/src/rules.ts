/**
 * Declarative keyword rules: a term (matched on word boundaries against
 * lowercased text) carries a weight, and tiered thresholds map a number to
 * points. Every heuristic in the scorers is expressed through these helpers.
 */

export type TermWeights = Record<string, number>;
export type MinTier = { min: number; points: number };

const patternCache = new Map<string, RegExp>();

function termPattern(term: string): RegExp {
  const key = term.toLowerCase();
  let re = patternCache.get(key);
  if (!re) {
    const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    re = new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`);
    patternCache.set(key, re);
  }
  return re;
}

/** `text` must already be lowercased. */
export function hasTerm(text: string, term: string): boolean {
  if (!text) return false;
  return termPattern(term).test(text);
}

export function matchedTerms(text: string, terms: readonly string[]): string[] {
  return terms.filter((t) => hasTerm(text, t));
}

export function sumTermWeights(text: string, weights: Readonly<TermWeights>): number {
  let total = 0;
  for (const [term, points] of Object.entries(weights)) {
    if (hasTerm(text, term)) total += points;
  }
  return total;
}

export function sumTermGroup(text: string, group: { weight: number; terms: readonly string[] }): number {
  return matchedTerms(text, group.terms).length * group.weight;
}

/** Tiers are ordered; the first one whose `min` the value reaches wins. */
export function tierPoints(value: number, tiers: readonly MinTier[]): number {
  for (const t of tiers) {
    if (value >= t.min) return t.points;
  }
  return 0;
}
