import { randomUUID } from "node:crypto";
import type { BatchReport } from "./types";

export type ScoringRun = {
  id: string;
  createdAt: string; // ISO
  organization: string;
  candidates: number;
  ms: number; // wall-clock; kept off the report so reports stay deterministic
  report: BatchReport;
};

export type RunSummary = Omit<ScoringRun, "report"> & { cancelled: boolean };

export class RunStore {
  private readonly runs = new Map<string, ScoringRun>();

  constructor(private readonly maxRuns = 100) {}

  record(report: BatchReport, ms: number): ScoringRun {
    const run: ScoringRun = {
      id: randomUUID(),
      createdAt: new Date().toISOString(),
      organization: report.organization,
      candidates: report.summary.total,
      ms,
      report,
    };
    this.runs.set(run.id, run);
    // oldest first in insertion order
    while (this.runs.size > this.maxRuns) {
      const oldest = this.runs.keys().next();
      if (oldest.done) break;
      this.runs.delete(oldest.value);
    }
    return run;
  }

  get(id: string): ScoringRun | null {
    return this.runs.get(id) ?? null;
  }

  /** Newest first. */
  list(): RunSummary[] {
    return [...this.runs.values()].reverse().map(({ report, ...rest }) => ({
      ...rest,
      cancelled: report.summary.cancelled,
    }));
  }

  get size(): number {
    return this.runs.size;
  }
}
