import { clampScore, normalizeText, round2 } from "./normalize";
import type { ScoringTables } from "./scoringTables";
import { textSimilarity } from "./similarity";
import type { SimilarityCache } from "./similarityCache";
import type {
  CompanyProfile,
  ConflictAnalysis,
  ConflictSeverity,
  ConflictType,
  HoldingConflict,
  PortfolioHolding,
} from "./types";

function bigrams(s: string): Map<string, number> {
  const out = new Map<string, number>();
  for (let i = 0; i + 1 < s.length; i++) {
    const g = s.slice(i, i + 2);
    out.set(g, (out.get(g) ?? 0) + 1);
  }
  return out;
}

/** Sørensen–Dice coefficient over character bigrams of the alphanumeric name. */
export function nameSimilarity(a: string, b: string): number {
  const x = normalizeText(a).replace(/[^a-z0-9]/g, "");
  const y = normalizeText(b).replace(/[^a-z0-9]/g, "");
  if (!x || !y) return 0;
  if (x === y) return 1;
  if (x.length < 2 || y.length < 2) return 0;

  const bx = bigrams(x);
  const by = bigrams(y);
  let overlap = 0;
  for (const [g, count] of bx) overlap += Math.min(count, by.get(g) ?? 0);
  return (2 * overlap) / (x.length - 1 + (y.length - 1));
}

function joinText(...parts: Array<string | undefined>): string {
  return parts.filter((p): p is string => !!p && !!p.trim()).join(" ");
}

export function holdingText(h: PortfolioHolding): string {
  return joinText(h.description, h.industry) || h.name;
}

export function severityFor(conflictCount: number): ConflictSeverity {
  if (conflictCount > 2) return "high";
  if (conflictCount > 0) return "medium";
  return "none";
}

/**
 * Overlap between a candidate and the organization's existing holdings.
 * Each holding scores the strongest of three signals; the candidate's
 * conflict score is the worst holding.
 */
export class ConflictAnalyzer {
  constructor(
    private readonly cache: SimilarityCache,
    private readonly tables: ScoringTables,
    private readonly threshold: number
  ) {}

  async analyze(company: CompanyProfile, holdings: PortfolioHolding[]): Promise<ConflictAnalysis> {
    const notes: string[] = [];
    if (holdings.length === 0) {
      return { conflictScore: 0, portfolioFitScore: 100, conflictingNames: [], conflicts: [], severity: "none", notes };
    }

    const candidateText = joinText(company.description, company.industry);
    const industry = normalizeText(company.industry);
    const c = this.tables.conflict;

    let conflictScore = 0;
    const conflicts: HoldingConflict[] = [];

    for (const h of holdings) {
      const signals: Array<{ type: ConflictType; score: number }> = [];

      const sim = await textSimilarity(this.cache, candidateText, holdingText(h));
      if (sim.note && !notes.includes(sim.note)) notes.push(sim.note);
      signals.push({ type: "business_model", score: sim.score });

      const ratio = nameSimilarity(company.name, h.name);
      if (ratio >= c.nameSimilarityMin) signals.push({ type: "name_similarity", score: round2(ratio * 100) });

      if (industry && industry === normalizeText(h.industry)) {
        signals.push({ type: "industry_overlap", score: c.industryOverlapScore });
      }

      const score = clampScore(Math.max(...signals.map((s) => s.score)));
      conflictScore = Math.max(conflictScore, score);

      if (score > this.threshold) {
        conflicts.push({
          holding: h.name,
          score,
          types: signals.filter((s) => s.score > this.threshold).map((s) => s.type),
        });
      }
    }

    const portfolioFitScore = conflictScore > this.threshold ? clampScore(round2(100 - conflictScore)) : 100;

    return {
      conflictScore,
      portfolioFitScore,
      conflictingNames: conflicts.map((x) => x.holding),
      conflicts,
      severity: severityFor(conflicts.length),
      notes,
    };
  }
}
