import type { ConflictAnalyzer } from "./conflictAnalyzer";
import { errorMessage } from "./errors";
import type { FitScorer } from "./fitScorer";
import { log } from "./logger";
import { clampScore, round2 } from "./normalize";
import { parseCandidates } from "./profileSchemas";
import { scoreQuality } from "./qualityScorer";
import type { RateLimiter } from "./rateLimiter";
import type { ScoringTables } from "./scoringTables";
import type {
  BatchReport,
  BatchSummary,
  CompanyProfile,
  ConflictAnalysis,
  FitBreakdown,
  OrganizationProfile,
  QualityBreakdown,
  Recommendation,
  ScoreBreakdown,
} from "./types";

/** Optional per-candidate fetch performed before scoring, behind the rate limiter. */
export type Enrichment = {
  sourceId: string;
  load(company: CompanyProfile, signal: AbortSignal): Promise<CompanyProfile>;
};

export type ScoreAllOptions = {
  signal?: AbortSignal;
  concurrency?: number;
  enrichment?: Enrichment;
};

export type CoordinatorDeps = {
  tables: ScoringTables;
  fitScorer: FitScorer;
  conflictAnalyzer: ConflictAnalyzer;
  rateLimiter: RateLimiter;
  concurrency: number;
  now?: () => Date;
};

const ABANDONED = Symbol("abandoned");

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T | typeof ABANDONED> {
  if (signal.aborted) return Promise.resolve(ABANDONED);
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(ABANDONED);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      }
    );
  });
}

export function compareBreakdowns(a: ScoreBreakdown, b: ScoreBreakdown): number {
  if (a.overallScore !== b.overallScore) return b.overallScore - a.overallScore;
  if (a.companyName < b.companyName) return -1;
  if (a.companyName > b.companyName) return 1;
  return 0;
}

export function recommendationFor(overall: number, tables: ScoringTables): Recommendation {
  const tier = tables.overall.recommendationTiers.find((t) => overall >= t.min);
  return tier ? tier.label : tables.overall.fallbackLabel;
}

export function prosAndCons(
  scores: { fitScore: number; qualityScore: number; portfolioFitScore: number },
  conflictCount: number
): { pros: string[]; cons: string[] } {
  const pros: string[] = [];
  const cons: string[] = [];

  if (scores.fitScore > 80) pros.push("Excellent fit with investment criteria");
  else if (scores.fitScore > 60) pros.push("Good fit with investment criteria");
  else cons.push("Poor fit with investment criteria");

  if (scores.qualityScore > 80) pros.push("High quality founders");
  else if (scores.qualityScore < 50) cons.push("Low quality founders");

  if (scores.portfolioFitScore > 70) pros.push("Good portfolio fit");
  else if (scores.portfolioFitScore < 40) cons.push("Poor portfolio fit");

  if (conflictCount > 0) cons.push(`Conflicts with ${conflictCount} portfolio companies`);
  return { pros, cons };
}

function emptyCounts(): Record<Recommendation, number> {
  return { "Strong Match": 0, "Good Match": 0, "Moderate Match": 0, "Weak Match": 0 };
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return round2(values.reduce((s, v) => s + v, 0) / values.length);
}

export function summarize(results: ScoreBreakdown[], total: number, cancelled: boolean): BatchSummary {
  const scored = results.filter((r) => !r.failed);
  const recommendations = emptyCounts();
  for (const r of results) recommendations[r.recommendation] += 1;
  return {
    total,
    scored: scored.length,
    failed: results.length - scored.length,
    cancelled,
    averageQuality: average(scored.map((r) => r.qualityScore)),
    averageFit: average(scored.map((r) => r.fitScore)),
    averagePortfolioFit: average(scored.map((r) => r.portfolioFitScore)),
    averageOverall: average(scored.map((r) => r.overallScore)),
    recommendations,
  };
}

/**
 * Scores a batch of candidates against one organization with a bounded pool of
 * workers. Each worker pulls the next index, scores that candidate and writes
 * the frozen result into its slot; ranking happens once all workers are done.
 */
export class BatchScoringCoordinator {
  private readonly now: () => Date;

  constructor(private readonly deps: CoordinatorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async scoreAll(
    candidates: readonly unknown[],
    organization: OrganizationProfile,
    opts: ScoreAllOptions = {}
  ): Promise<BatchReport> {
    // throws MalformedInputError before any work starts
    const companies = parseCandidates(candidates);
    const signal = opts.signal ?? new AbortController().signal;
    const width = Math.max(1, Math.min(opts.concurrency ?? this.deps.concurrency, companies.length || 1));

    log.info("[Batch] scoring started", {
      organization: organization.name,
      candidates: companies.length,
      concurrency: width,
    });

    const slots = new Array<ScoreBreakdown | undefined>(companies.length);
    let cursor = 0;

    const worker = async () => {
      while (!signal.aborted && cursor < companies.length) {
        const index = cursor++;
        const outcome = await untilAborted(this.scoreOne(companies[index], organization, signal, opts.enrichment), signal);
        if (outcome === ABANDONED) return;
        slots[index] = outcome;
      }
    };

    await Promise.all(Array.from({ length: width }, () => worker()));

    const results = slots.filter((r): r is ScoreBreakdown => r !== undefined).sort(compareBreakdowns);
    const cancelled = signal.aborted && results.length < companies.length;
    const summary = summarize(results, companies.length, cancelled);

    if (cancelled) {
      log.warn("[Batch] scoring cancelled", { completed: results.length, total: companies.length });
    } else {
      log.info("[Batch] scoring finished", { scored: summary.scored, failed: summary.failed });
    }

    return { organization: organization.name, results, summary };
  }

  /** Never rejects: a failure becomes a zeroed, flagged breakdown. */
  private async scoreOne(
    company: CompanyProfile,
    organization: OrganizationProfile,
    signal: AbortSignal,
    enrichment?: Enrichment
  ): Promise<ScoreBreakdown> {
    try {
      // an abandoned candidate stops at the next step instead of spending encoder calls
      let candidate = company;
      if (enrichment) {
        await this.deps.rateLimiter.acquire(enrichment.sourceId);
        if (signal.aborted) return this.failed(company.name, "cancelled");
        candidate = await enrichment.load(company, signal);
      }

      if (signal.aborted) return this.failed(company.name, "cancelled");
      const quality = scoreQuality(candidate, this.deps.tables, this.now());
      const fit = await this.deps.fitScorer.score(candidate, organization);
      if (signal.aborted) return this.failed(company.name, "cancelled");
      const conflict = await this.deps.conflictAnalyzer.analyze(candidate, organization.portfolio);
      return this.breakdown(company.name, quality, fit, conflict);
    } catch (e) {
      const message = errorMessage(e);
      if (signal.aborted) {
        log.debug("[Batch] abandoned candidate failed", { company: company.name, message });
      } else {
        log.error("[Batch] candidate scoring failed", { company: company.name, message });
      }
      return this.failed(company.name, message);
    }
  }

  private breakdown(
    companyName: string,
    quality: QualityBreakdown,
    fit: FitBreakdown,
    conflict: ConflictAnalysis
  ): ScoreBreakdown {
    const w = this.deps.tables.overall.weights;
    const overallScore = clampScore(
      round2(fit.fitScore * w.fit + quality.qualityScore * w.quality + conflict.portfolioFitScore * w.portfolioFit)
    );
    const scores = {
      fitScore: fit.fitScore,
      qualityScore: quality.qualityScore,
      portfolioFitScore: conflict.portfolioFitScore,
    };
    const { pros, cons } = prosAndCons(scores, conflict.conflictingNames.length);

    return Object.freeze({
      companyName,
      ...scores,
      overallScore,
      recommendation: recommendationFor(overallScore, this.deps.tables),
      pros,
      cons,
      notes: [...fit.notes, ...conflict.notes.filter((n) => !fit.notes.includes(n))],
      failed: false,
      quality,
      fit,
      conflict,
    });
  }

  private failed(companyName: string, message: string): ScoreBreakdown {
    return Object.freeze({
      companyName,
      qualityScore: 0,
      fitScore: 0,
      portfolioFitScore: 0,
      overallScore: 0,
      recommendation: this.deps.tables.overall.fallbackLabel,
      pros: [],
      cons: [],
      notes: [`Scoring failed: ${message}`],
      failed: true,
    });
  }
}
