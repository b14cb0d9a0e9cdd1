import { clampScore, normalizeStage, normalizeText, round2, tokenize } from "./normalize";
import { networkScore } from "./qualityScorer";
import { hasTerm } from "./rules";
import type { ScoringTables } from "./scoringTables";
import { textSimilarity } from "./similarity";
import type { SimilarityCache } from "./similarityCache";
import type { CompanyProfile, FitBreakdown, OrganizationProfile } from "./types";

type FitTables = ScoringTables["fit"];
type MatchLevel = "exact" | "partial" | "none";

function sharesKeyword(a: string, b: string): boolean {
  const tb = new Set(tokenize(b).filter((t) => t.length > 2));
  return tokenize(a).some((t) => t.length > 2 && tb.has(t));
}

function credit(level: MatchLevel, t: FitTables): number {
  if (level === "exact") return t.matchCredit.exact;
  if (level === "partial") return t.matchCredit.partial;
  return 0;
}

export function industryLevel(industry: string, preferred: string[], t: FitTables): MatchLevel {
  const ind = normalizeText(industry);
  const prefs = preferred.map(normalizeText).filter(Boolean);
  if (!ind || prefs.length === 0) return "none";
  if (prefs.includes(ind)) return "exact";

  for (const p of prefs) {
    if (ind.includes(p) || p.includes(ind) || sharesKeyword(ind, p)) return "partial";
  }

  // related industries, looked up in both directions
  const related = t.relatedIndustries[ind] ?? [];
  if (related.some((r) => prefs.includes(r))) return "partial";
  if (prefs.some((p) => (t.relatedIndustries[p] ?? []).includes(ind))) return "partial";
  return "none";
}

function regionOf(location: string, t: FitTables): string | null {
  for (const [region, places] of Object.entries(t.regions)) {
    if (places.some((p) => hasTerm(location, p))) return region;
  }
  return null;
}

export function locationLevel(location: string, preferred: string[], t: FitTables): MatchLevel {
  const loc = normalizeText(location);
  const prefs = preferred.map(normalizeText).filter(Boolean);
  if (!loc || prefs.length === 0) return "none";
  if (prefs.includes(loc)) return "exact";

  const parts = loc.split(",").map((p) => p.trim()).filter(Boolean);
  if (parts.some((p) => prefs.includes(p))) return "partial";
  if (prefs.some((p) => sharesKeyword(loc, p))) return "partial";

  const region = regionOf(loc, t);
  if (region && prefs.some((p) => regionOf(p, t) === region)) return "partial";
  return "none";
}

export function inferStage(company: CompanyProfile, t: FitTables): string | null {
  if (company.fundingStage && company.fundingStage.trim()) return normalizeStage(company.fundingStage);
  const text = normalizeText(company.description);
  if (!text) return null;
  for (const stage of t.stageOrder) {
    const keywords = t.stageKeywords[stage] ?? [];
    if (keywords.some((k) => hasTerm(text, k))) return stage;
  }
  return null;
}

export function stageLevel(stage: string | null, preferred: string[], t: FitTables): MatchLevel {
  const prefs = preferred.map(normalizeStage).filter(Boolean);
  if (!stage || prefs.length === 0) return "none";
  if (prefs.includes(stage)) return "exact";

  const pos = t.stageOrder.indexOf(stage);
  if (pos === -1) return "none";
  const adjacent = prefs.some((p) => {
    const pp = t.stageOrder.indexOf(p);
    return pp !== -1 && Math.abs(pp - pos) === 1;
  });
  return adjacent ? "partial" : "none";
}

export function candidateText(company: CompanyProfile, t: FitTables): string {
  const parts = [company.description, company.industry];
  for (const f of company.founders.slice(0, t.candidateTextFounders)) {
    parts.push(f.title, f.experience.slice(0, t.founderExperienceChars));
  }
  return parts.filter((p) => p && p.trim()).join(" ");
}

export function organizationText(org: OrganizationProfile): string {
  return [org.thesis, ...org.preferredIndustries.slice(0, 5)].filter((p) => p && p.trim()).join(" ");
}

/** Alignment between a candidate and an organization's stated criteria. */
export class FitScorer {
  constructor(
    private readonly cache: SimilarityCache,
    private readonly tables: ScoringTables
  ) {}

  async score(company: CompanyProfile, org: OrganizationProfile): Promise<FitBreakdown> {
    const t = this.tables.fit;
    const notes: string[] = [];

    const sim = await textSimilarity(this.cache, candidateText(company, t), organizationText(org));
    if (sim.note) notes.push(sim.note);

    const industryMatch = credit(industryLevel(company.industry, org.preferredIndustries, t), t);
    const locationMatch = credit(locationLevel(company.location, org.preferredLocations, t), t);
    const inferredStage = inferStage(company, t);
    const stageMatch = credit(stageLevel(inferredStage, org.preferredStages, t), t);

    const networkCap = this.tables.quality.network.cap;
    const networkProximity =
      company.founders.length === 0 || networkCap === 0
        ? 0
        : round2(
            (company.founders.reduce((s, f) => s + networkScore(f, this.tables.quality), 0) / company.founders.length) *
              (100 / networkCap)
          );

    const w = t.weights;
    const fitScore = clampScore(
      round2(
        sim.score * w.textSimilarity +
          industryMatch * w.industry +
          stageMatch * w.stage +
          locationMatch * w.location +
          networkProximity * w.network
      )
    );

    return {
      fitScore,
      textSimilarity: sim.score,
      industryMatch,
      stageMatch,
      locationMatch,
      networkProximity,
      inferredStage,
      notes,
    };
  }
}
