import { describe, it, expect } from "vitest";
import { HashingEncoder } from "./encoders";
import { FitScorer, candidateText, industryLevel, inferStage, locationLevel, stageLevel } from "./fitScorer";
import { loadScoringTables } from "./scoringTables";
import { SimilarityCache } from "./similarityCache";
import { ConstantEncoder, FailingEncoder, company, founder, organization } from "./testFixtures";
import type { Encoder } from "./encoders";

const tables = loadScoringTables();
const fit = tables.fit;

function scorer(encoder: Encoder) {
  return new FitScorer(new SimilarityCache(encoder, { capacity: 100, maxTextLength: 2000 }), tables);
}

const fintechSeed = company({
  name: "Ledgerly",
  description: "Seed stage payments startup for freelancers",
  industry: "Fintech",
  location: "Austin, TX",
  founders: [founder({ title: "CEO", linkedinConnections: 1500, endorsements: 60 })],
});

const fintechFund = organization({
  thesis: "Backing fintech infrastructure",
  preferredIndustries: ["fintech"],
  preferredStages: ["Series A"],
  preferredLocations: ["Austin"],
});

describe("FitScorer.score", () => {
  it("combines similarity, industry, stage, location and network", async () => {
    const out = await scorer(new ConstantEncoder()).score(fintechSeed, fintechFund);

    expect(out).toMatchObject({
      textSimilarity: 100,
      industryMatch: 100,
      stageMatch: 50, // seed is adjacent to series-a
      locationMatch: 50, // "austin" is one part of "austin, tx"
      networkProximity: 100,
      inferredStage: "seed",
      notes: [],
    });
    // 40 + 20 + 7.5 + 5 + 15
    expect(out.fitScore).toBe(87.5);
  });

  it("falls back to 0 similarity with a note when the encoder fails", async () => {
    const out = await scorer(new FailingEncoder()).score(fintechSeed, fintechFund);

    expect(out.textSimilarity).toBe(0);
    expect(out.fitScore).toBe(47.5);
    expect(out.notes).toHaveLength(1);
    expect(out.notes[0]).toMatch(/^Text similarity unavailable/);
  });

  it("scores 0 for every criterion the organization leaves empty", async () => {
    const out = await scorer(new HashingEncoder()).score(company({ description: "Anything at all", industry: "SaaS" }), organization());
    expect(out).toMatchObject({
      fitScore: 0,
      textSimilarity: 0,
      industryMatch: 0,
      stageMatch: 0,
      locationMatch: 0,
      networkProximity: 0,
    });
  });

  it("keeps the score in range for very long text", async () => {
    const long = "payments ".repeat(20000);
    const out = await scorer(new HashingEncoder()).score(company({ description: long, industry: long }), fintechFund);
    expect(out.fitScore).toBeGreaterThanOrEqual(0);
    expect(out.fitScore).toBeLessThanOrEqual(100);
  });
});

describe("match levels", () => {
  it("matches industries exactly, by keyword and through related industries", () => {
    expect(industryLevel("FinTech", ["fintech"], fit)).toBe("exact");
    expect(industryLevel("Healthcare AI", ["healthcare"], fit)).toBe("partial");
    expect(industryLevel("Payments", ["Fintech"], fit)).toBe("partial");
    expect(industryLevel("Gaming", ["Fintech"], fit)).toBe("none");
    expect(industryLevel("Gaming", [], fit)).toBe("none");
  });

  it("matches locations by part and by metro region", () => {
    expect(locationLevel("New York", ["new york"], fit)).toBe("exact");
    expect(locationLevel("Austin, TX", ["Austin"], fit)).toBe("partial");
    expect(locationLevel("Palo Alto, CA", ["San Francisco"], fit)).toBe("partial");
    expect(locationLevel("Denver, CO", ["Austin"], fit)).toBe("none");
  });

  it("prefers an explicit funding stage over the description", () => {
    expect(inferStage(company({ fundingStage: "Series B", description: "seed round" }), fit)).toBe("series-b");
    expect(inferStage(company({ description: "We just closed our Series A" }), fit)).toBe("series-a");
    expect(inferStage(company({ description: "Raising a pre-seed round" }), fit)).toBe("pre-seed");
    expect(inferStage(company({ description: "Profitable and bootstrapped" }), fit)).toBeNull();
  });

  it("gives adjacent stages half credit", () => {
    expect(stageLevel("series-a", ["Series A"], fit)).toBe("exact");
    expect(stageLevel("series-c", ["growth"], fit)).toBe("partial");
    expect(stageLevel("growth", ["seed"], fit)).toBe("none");
    expect(stageLevel(null, ["seed"], fit)).toBe("none");
  });

  it("builds candidate text from the first founders only", () => {
    const c = company({
      description: "Robots",
      industry: "Hardware",
      founders: [
        founder({ title: "CEO", experience: "x".repeat(300) }),
        founder({ title: "CTO" }),
        founder({ title: "COO", experience: "ignored" }),
      ],
    });
    expect(candidateText(c, fit)).toBe(`Robots Hardware CEO ${"x".repeat(200)} CTO`);
  });
});
