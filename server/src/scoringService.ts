import { z } from "zod";
import type { Engine } from "./engine";
import { MalformedInputError, type InputIssue } from "./errors";
import { parseCandidates, parseOrganization } from "./profileSchemas";
import { scoreQuality } from "./qualityScorer";
import type { ScoringRun } from "./runs";
import type { QualityBreakdown } from "./types";

const ScoreRequestSchema = z.object({
  organization: z.unknown(),
  candidates: z.array(z.unknown()),
  concurrency: z.coerce.number().int().min(1).max(64).optional(),
});

const QualityRequestSchema = z.object({
  company: z.unknown(),
});

type Failure = { ok: false; error: string; issues: InputIssue[] };

function fromZod(error: z.ZodError): Failure {
  return {
    ok: false,
    error: "Invalid request body",
    issues: error.issues.map((i) => ({ index: -1, path: i.path.join("."), message: i.message })),
  };
}

function fromMalformed(e: MalformedInputError): Failure {
  return { ok: false, error: e.message, issues: e.issues };
}

export async function runScoring(
  engine: Engine,
  reqBody: unknown,
  signal?: AbortSignal
): Promise<{ ok: true; run: ScoringRun } | Failure> {
  const parsed = ScoreRequestSchema.safeParse(reqBody);
  if (!parsed.success) return fromZod(parsed.error);

  const startedAt = Date.now();
  try {
    const organization = parseOrganization(parsed.data.organization);
    const report = await engine.coordinator.scoreAll(parsed.data.candidates, organization, {
      signal,
      concurrency: parsed.data.concurrency,
    });
    const run = engine.runs.record(report, Date.now() - startedAt);
    return { ok: true, run };
  } catch (e) {
    if (e instanceof MalformedInputError) return fromMalformed(e);
    throw e;
  }
}

export function scoreQualityRequest(
  engine: Engine,
  reqBody: unknown,
  now: Date = new Date()
): { ok: true; quality: QualityBreakdown } | Failure {
  const parsed = QualityRequestSchema.safeParse(reqBody);
  if (!parsed.success) return fromZod(parsed.error);
  try {
    const [company] = parseCandidates([parsed.data.company]);
    return { ok: true, quality: scoreQuality(company, engine.tables, now) };
  } catch (e) {
    if (e instanceof MalformedInputError) return fromMalformed(e);
    throw e;
  }
}
