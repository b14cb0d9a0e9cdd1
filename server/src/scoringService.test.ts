import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";
import { createEngine } from "./engine";
import { RunStore } from "./runs";
import { loadScoringTables } from "./scoringTables";
import { runScoring, scoreQualityRequest } from "./scoringService";
import { FIXED_NOW, acme } from "./testFixtures";
import type { BatchReport } from "./types";

const tables = loadScoringTables();

function engine() {
  return createEngine(loadConfig({}), tables, { now: () => FIXED_NOW });
}

describe("runScoring", () => {
  it("scores a request and records the run", async () => {
    const e = engine();
    const result = await runScoring(e, {
      organization: { name: "Northwind Capital", thesis: "AI for logistics", portfolio: ["Shipwise"] },
      candidates: [acme(), { name: "Bare Co" }],
      concurrency: "2",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.run.organization).toBe("Northwind Capital");
    expect(result.run.candidates).toBe(2);
    expect(result.run.report.results).toHaveLength(2);
    expect(e.runs.get(result.run.id)).toBe(result.run);
    expect(e.runs.list()).toHaveLength(1);
  });

  it("reports malformed candidates with their indices", async () => {
    const result = await runScoring(engine(), {
      organization: { name: "Northwind Capital" },
      candidates: [{ name: "Fine" }, { name: "  " }],
    });

    expect(result).toEqual({
      ok: false,
      error: expect.stringMatching(/^Malformed candidate input/),
      issues: [{ index: 1, path: "name", message: "name is required" }],
    });
  });

  it("rejects an organization without a name", async () => {
    const result = await runScoring(engine(), { organization: { thesis: "x" }, candidates: [] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toEqual([{ index: -1, path: "organization.name", message: "name is required" }]);
  });

  it("rejects a body without candidates", async () => {
    const result = await runScoring(engine(), { organization: { name: "Northwind Capital" } });
    expect(result).toMatchObject({ ok: false, error: "Invalid request body" });
  });
});

describe("scoreQualityRequest", () => {
  it("scores one company", () => {
    const result = scoreQualityRequest(engine(), { company: acme() }, FIXED_NOW);
    expect(result.ok && result.quality.qualityScore).toBe(71.25);
  });

  it("scores a company with no founders as 0", () => {
    const result = scoreQualityRequest(engine(), { company: { name: "Solo" } }, FIXED_NOW);
    expect(result.ok && result.quality.qualityScore).toBe(0);
  });
});

describe("RunStore", () => {
  function report(organization: string): BatchReport {
    return {
      organization,
      results: [],
      summary: {
        total: 0,
        scored: 0,
        failed: 0,
        cancelled: false,
        averageQuality: 0,
        averageFit: 0,
        averagePortfolioFit: 0,
        averageOverall: 0,
        recommendations: { "Strong Match": 0, "Good Match": 0, "Moderate Match": 0, "Weak Match": 0 },
      },
    };
  }

  it("lists newest first and drops the oldest beyond its bound", () => {
    const store = new RunStore(2);
    const a = store.record(report("A"), 5);
    store.record(report("B"), 5);
    store.record(report("C"), 5);

    expect(store.size).toBe(2);
    expect(store.get(a.id)).toBeNull();
    expect(store.list().map((r) => r.organization)).toEqual(["C", "B"]);
    expect(store.list()[0]).not.toHaveProperty("report");
  });
});
